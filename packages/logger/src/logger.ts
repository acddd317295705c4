import pino, {
  type DestinationStream,
  type Logger as PinoLogger,
  type LevelWithSilent,
} from "pino";
import { REDACT_PATHS, REDACTED } from "./redaction.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  /** Bound as `name` on every line. */
  service?: string;
  /** Human-readable output through pino-pretty; JSON lines otherwise. */
  pretty?: boolean;
  /** JSON output target; ignored when `pretty` is set. Defaults to stdout. */
  destination?: DestinationStream;
}

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
  },
};

/**
 * Root logger for a CLI run. Secret-bearing keys are censored before a line
 * is written, in both output modes.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { level = "info", service = "manual-rag", pretty = false } = options;

  const base: pino.LoggerOptions = {
    level,
    name: service,
    redact: { paths: REDACT_PATHS, censor: REDACTED },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino({ ...base, transport: PRETTY_TRANSPORT });
  }
  return options.destination ? pino(base, options.destination) : pino(base);
}
