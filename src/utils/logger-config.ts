/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 *
 * SECURITY: All sensitive fields must be listed here to prevent
 * accidental exposure in logs. Update this file when adding new
 * credential fields to config or client options.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Credentials (at any depth)
  "apiKey",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.secret",
  "*.token",

  // OpenAI client headers
  "*.headers.authorization",
  '*.headers["openai-organization"]',
  '*.headers["openai-project"]',
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
