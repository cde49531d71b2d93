/**
 * Secret Redaction Configuration
 *
 * Path-based redaction catches known locations; heuristic patterns are used
 * in tests to catch unexpected leaks.
 *
 * @module logging/redactors
 */

/**
 * Paths to redact from log objects (Pino redaction path syntax).
 * Matched values are replaced with [REDACTED].
 */
export const REDACT_PATHS = [
  // Environment variables
  "env.GITHUB_TOKEN",
  "env.GITHUB_PAT",

  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",

  // Common secret field names
  "token",
  "*.token",
  "*.password",
  "*.secret",
  "*.pat",
  "*.accessToken",
  "*.access_token",
  "*.credentials",
];

/**
 * Pino redaction options
 * See: https://getpino.io/#/docs/redaction
 */
export const REDACT_OPTIONS = {
  paths: REDACT_PATHS,
  censor: "[REDACTED]",
  // Keep the key, replace the value
  remove: false,
};

/**
 * Heuristic patterns to detect potential secrets in string values.
 * Applied to the extra properties of logged errors.
 */
export const SECRET_PATTERNS = {
  /** GitHub Personal Access Token (classic): ghp_... */
  githubPat: /^ghp_[A-Za-z0-9]{36,}$/,

  /** GitHub Fine-Grained PAT: github_pat_... */
  githubFinePat: /^github_pat_[A-Za-z0-9_]{82}$/,

  /** GitHub OAuth / app tokens: gho_, ghs_, ghu_ */
  githubOther: /^gh[osu]_[A-Za-z0-9]{36,}$/,

  /** Generic long alphanumeric key */
  genericApiKey: /^[A-Za-z0-9_-]{32,}$/,
} as const;

/**
 * Check if a string value looks like a secret
 *
 * @example
 * ```typescript
 * looksLikeSecret("hello world") // false
 * ```
 */
export function looksLikeSecret(value: string): boolean {
  return Object.values(SECRET_PATTERNS).some((pattern) => pattern.test(value));
}

/**
 * Flatten an error (and its cause chain) into a plain object for logging.
 *
 * Extra string properties that look like secrets are replaced with `[REDACTED]`.
 * Messages and stacks are NOT scanned; keep secrets out of them.
 */
export function sanitizeError(error: Error): Record<string, unknown> {
  const cause = error.cause;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: cause instanceof Error ? sanitizeError(cause) : cause,
    ...Object.fromEntries(
      Object.entries(error)
        .filter(([key]) => !["name", "message", "stack", "cause"].includes(key))
        .map(([key, value]) => [
          key,
          typeof value === "string" && looksLikeSecret(value) ? REDACT_OPTIONS.censor : value,
        ])
    ),
  };
}

/**
 * Pino `err` serializer: errors go through {@link sanitizeError}, other values pass as-is
 */
export function serializeError(value: unknown): unknown {
  return value instanceof Error ? sanitizeError(value) : value;
}
