export function buildSolutionCardPrompt(query: string, context: string): string {
  return [
    "You are a CNC technical support assistant.",
    "",
    "User Problem:",
    query,
    "",
    "Relevant Manual Extract:",
    context,
    "",
    "Create a concise solution card.",
    "",
    "Keep:",
    "- Cause: 2-3 short sentences",
    "- Solution: 4-5 clear steps",
    "- Professional tone",
  ].join("\n");
}
