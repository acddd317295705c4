import { AppError } from "@manualrag/errors";

export type Command =
  | { name: "ingest" }
  | { name: "query"; query: string | undefined };

export const USAGE = "Usage: manual-rag <ingest | query [text...]>";

export function parseCommand(argv: readonly string[]): Command {
  const [name, ...rest] = argv;
  switch (name) {
    case "ingest":
      return { name: "ingest" };
    case "query": {
      const query = rest.join(" ").trim();
      return { name: "query", query: query.length > 0 ? query : undefined };
    }
    default:
      throw new AppError({
        message: name === undefined ? USAGE : `Unknown command "${name}". ${USAGE}`,
        code: "INVALID_COMMAND",
        isOperational: false,
      });
  }
}
