/**
 * Upstream error wrapping for the OpenAI document client.
 * Every SDK failure is turned into one reason string that says which call
 * failed and on which resource.
 */

import OpenAI from "openai";
import { describeError } from "../../utils/errors.js";

export interface UpstreamFailure {
  status: number | null;
  code: string | null;
  requestId: string | null;
  message: string;
  timedOut: boolean;
}

/**
 * Extract the fields worth logging from an SDK error.
 */
export function classifyUpstreamError(error: unknown): UpstreamFailure {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { status: null, code: "timeout", requestId: null, message: error.message, timedOut: true };
  }

  if (error instanceof OpenAI.APIError) {
    return {
      status: typeof error.status === "number" ? error.status : null,
      code: typeof error.code === "string" ? error.code : null,
      requestId: error.requestID ?? null,
      message: error.message,
      timedOut: false,
    };
  }

  return { status: null, code: null, requestId: null, message: describeError(error), timedOut: false };
}

/**
 * Build the reason string for a failed call, e.g.
 * `OpenAI API call failed: 404 No such file on file file-abc`.
 */
export function upstreamReason(error: unknown, resource: string): string {
  // SDK messages already lead with the HTTP status
  return `OpenAI API call failed: ${classifyUpstreamError(error).message} on ${resource}`;
}
