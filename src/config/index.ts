/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to the environment variables the
 * pipeline reads. Invalid configurations fail fast when parsed; a missing
 * API key only fails when a client is actually constructed
 * (see createOpenAIClient).
 */

import { z } from "zod";

/**
 * Optional string that treats empty values as undefined
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

/**
 * Optional URL string that treats empty/undefined as undefined
 */
const optionalUrl = optionalString.refine(
  (val) => {
    if (val === undefined) return true;
    try {
      new URL(val);
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid url" },
);

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  // OpenAI client
  openai: z.object({
    apiKey: optionalString,
    organization: optionalString,
    project: optionalString,
    baseUrl: optionalUrl,
    timeoutMs: z.coerce.number().int().positive().default(90_000),
    maxRetries: z.coerce.number().int().min(0).default(2),
  }),

  // Attachment ingestion polling
  polling: z.object({
    maxAttempts: z.coerce.number().int().min(0).default(10),
    intervalMs: z.coerce.number().int().min(0).default(1_000),
    maxWaitMs: z.coerce.number().int().positive().optional(), // Unbounded unless set
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OpenAIConfig = Config["openai"];
export type PollingConfig = Config["polling"];

type Env = Record<string, string | undefined>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Parse and validate configuration from environment variables
 */
export function parseConfig(env: Env = process.env): Readonly<Config> {
  const rawConfig = {
    openai: {
      apiKey: env.OPENAI_API_KEY,
      organization: env.OPENAI_ORG_ID,
      project: env.OPENAI_PROJECT_ID,
      baseUrl: env.OPENAI_BASE_URL,
      timeoutMs: emptyToUndefined(env.OPENAI_TIMEOUT_MS),
      maxRetries: emptyToUndefined(env.OPENAI_MAX_RETRIES),
    },
    polling: {
      maxAttempts: emptyToUndefined(env.POLL_MAX_ATTEMPTS),
      intervalMs: emptyToUndefined(env.POLL_INTERVAL_MS),
      maxWaitMs: emptyToUndefined(env.POLL_MAX_WAIT_MS),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. ${details}`);
  }

  return Object.freeze({
    openai: Object.freeze(result.data.openai),
    polling: Object.freeze(result.data.polling),
  });
}

/**
 * Configuration is parsed once on first access and cached thereafter,
 * so tests can set environment variables before anything reads it.
 */
let _cachedConfig: Readonly<Config> | null = null;

export function getConfig(): Readonly<Config> {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
