/**
 * Secret redaction for log output.
 */

export const REDACTED = "[REDACTED]";

const SENSITIVE_KEYS = [
  "apiKey",
  "api_key",
  "password",
  "secret",
  "token",
  "authorization",
  "databaseUrl",
  "connectionString",
] as const;

/**
 * Paths for Pino's `redact` option: each sensitive key at the top level and
 * one level down (e.g. `gemini.apiKey`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_KEYS,
  ...SENSITIVE_KEYS.map((key) => `*.${key}`),
];

/**
 * Mask the password of a connection URL so the target host can still be logged.
 * Unparseable input is redacted entirely.
 */
export function redactConnectionString(connectionString: string): string {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    return REDACTED;
  }

  if (!url.password) {
    return connectionString;
  }
  return `${url.protocol}//${url.username}:${REDACTED}@${url.host}${url.pathname}${url.search}`;
}
