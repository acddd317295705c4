import "dotenv/config";
import { parseEnv } from "@manualrag/config";
import { AppError, ConfigurationError, errorMessage } from "@manualrag/errors";
import { createLogger } from "@manualrag/logger";
import { SERVICE_NAME, createContainer } from "./container.js";
import { parseCommand } from "./commands/parse-command.js";
import { runIngest, summarizeIngestion } from "./commands/ingest.js";
import { formatAnswer, promptForQuery, runQuery } from "./commands/query.js";

async function main(): Promise<void> {
  const command = parseCommand(process.argv.slice(2));
  const config = parseEnv();
  const container = createContainer(config);

  if (command.name === "ingest") {
    const result = await runIngest(container);
    process.stdout.write(`${summarizeIngestion(result)}\n`);
    return;
  }

  const query = command.query ?? (await promptForQuery());
  const answer = await runQuery(container, query);
  process.stdout.write(`${formatAnswer(answer)}\n`);
}

main().catch((err: unknown) => {
  // Configuration may be what failed, so this logger cannot depend on it
  const logger = createLogger({ service: SERVICE_NAME });
  if (err instanceof ConfigurationError) {
    logger.fatal({ code: err.code, fields: err.fields }, err.message);
  } else if (AppError.isAppError(err)) {
    logger.fatal({ code: err.code, details: err.details }, err.message);
  } else {
    logger.fatal({ err }, `Fatal error: ${errorMessage(err)}`);
  }
  process.exit(1);
});
