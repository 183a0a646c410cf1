/**
 * Chat Completions entry point.
 *
 * Requests written against Responses-style parameter names are rewritten
 * for the Chat Completions endpoint before they are sent:
 *
 * - max_output_tokens → max_completion_tokens
 * - max_input_tokens is dropped (not accepted by the endpoint)
 * - stop is dropped for gpt-5 models (reasoning models reject it)
 */

import type OpenAI from "openai";

type ChatParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export type ChatRequest = ChatParams & {
  max_output_tokens?: number | null;
  max_input_tokens?: number | null;
};

/** The slice of the SDK used here; an `OpenAI` instance satisfies it. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatParams): PromiseLike<OpenAI.Chat.ChatCompletion>;
    };
  };
}

const STOP_UNSUPPORTED_PREFIX = "gpt-5";

/**
 * Returns a new request; the input is left untouched.
 */
export function normalizeChatRequest(request: ChatRequest): ChatParams {
  const { max_output_tokens: maxOutputTokens, max_input_tokens: _maxInputTokens, ...rest } = request;

  const normalized: ChatParams =
    maxOutputTokens !== undefined ? { ...rest, max_completion_tokens: maxOutputTokens } : rest;

  if (normalized.model.startsWith(STOP_UNSUPPORTED_PREFIX)) {
    const { stop: _stop, ...withoutStop } = normalized;
    return withoutStop;
  }
  return normalized;
}

export async function createChatCompletion(
  client: ChatCompletionsClient,
  request: ChatRequest,
): Promise<OpenAI.Chat.ChatCompletion> {
  return client.chat.completions.create(normalizeChatRequest(request));
}
