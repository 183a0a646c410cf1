import OpenAI from "openai";
import type { OpenAIConfig } from "../../config/index.js";
import { MissingCredentialError } from "../../utils/errors.js";
import { log } from "../../utils/telemetry.js";

/**
 * Single construction point for the OpenAI SDK client.
 *
 * Throws MissingCredentialError when no API key is configured. That is a
 * startup failure, not something a pipeline stage should ever see.
 */
export function createOpenAIClient(config: OpenAIConfig): OpenAI {
  if (!config.apiKey) {
    throw new MissingCredentialError("Missing OpenAI API key in config (set OPENAI_API_KEY)");
  }

  log.debug(
    {
      organization: config.organization ?? null,
      project: config.project ?? null,
      timeout_ms: config.timeoutMs,
      max_retries: config.maxRetries,
    },
    "Creating OpenAI client",
  );

  return new OpenAI({
    apiKey: config.apiKey,
    organization: config.organization ?? null,
    project: config.project ?? null,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  });
}
