/**
 * Secret redaction for log output.
 *
 * API keys for the literature search, embedding and generation services travel
 * through config objects and request headers; none of them may reach a log line.
 */

const REDACTED = "[REDACTED]";

/**
 * Property names (as they appear in config objects) whose values are always redacted.
 */
const SENSITIVE_FIELDS = [
  "apiKey",
  "api_key",
  "cohereApiKey",
  "token",
  "authorization",
  "password",
  "secret",
] as const;

const SENSITIVE_HEADERS = ["x-api-key", "authorization"] as const;

const SENSITIVE_KEYS: ReadonlySet<string> = new Set(
  [...SENSITIVE_FIELDS, ...SENSITIVE_HEADERS].map((field) => field.toLowerCase()),
);

/**
 * Extracted paper text often carries corresponding-author e-mail addresses.
 */
const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * - Sensitive keys (case-insensitive) have their whole value replaced.
 * - E-mail addresses inside string values are replaced in place.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(EMAIL_REGEX, REDACTED);
  }

  return value;
}

/**
 * Paths for Pino's `redact` option: every sensitive field at the top level and one
 * level down (e.g. `source.apiKey`), plus outgoing request headers.
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_FIELDS,
  ...SENSITIVE_FIELDS.map((field) => `*.${field}`),
  ...SENSITIVE_HEADERS.map((header) => `headers["${header}"]`),
];
