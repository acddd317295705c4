export interface IAnswerGenerator {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}
