/**
 * Secret Redaction
 *
 * Keeps credentials for the vector index and embedding backends out of log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "api-key",
  "qdrantapikey",
  "cohereapikey",
  "qdrant_api_key",
  "cohere_api_key",
  "authorization",
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Strip `user:password@` credentials from a URL string. Non-URL strings are
 * returned as-is.
 */
export function redactUrl(value: string): string {
  if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(value)) return value;
  try {
    const url = new URL(value);
    if (!url.username && !url.password) return value;
    url.username = REDACTED;
    url.password = "";
    return url.toString();
  } catch {
    return value;
  }
}

/**
 * Redact a single key/value pair.
 *
 * - Sensitive keys have their whole value replaced with "[REDACTED]".
 * - String values that look like URLs lose any embedded credentials.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return value === undefined ? undefined : REDACTED;
  }

  if (typeof value === "string") {
    return redactUrl(value);
  }

  return value;
}

/**
 * Deep copy of a plain object with {@link redactValue} applied to every
 * property. Nested keys are covered at any depth, unlike {@link REDACT_PATHS}.
 */
export function redactObject(input: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== null && typeof value === "object" && !Array.isArray(value) && !isSensitiveKey(key)) {
      output[key] = redactObject({ ...value });
    } else {
      output[key] = redactValue(key, value);
    }
  }
  return output;
}

/**
 * List of JSON-path strings suitable for Pino's `redact` option.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "authorization",
  "qdrantApiKey",
  "cohereApiKey",
  // One level of nesting (e.g. config.apiKey, headers.authorization)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.authorization",
  "*.qdrantApiKey",
  "*.cohereApiKey",
];
