/**
 * Error helpers shared by stages and adapters.
 *
 * Stages never let an exception cross their boundary; everything thrown
 * inside a stage is converted to a message with describeError().
 */

/**
 * Raised when the client cannot be constructed from configuration.
 * Fatal: callers are expected to let it crash startup.
 */
export class MissingCredentialError extends Error {
  readonly name = "MissingCredentialError";

  constructor(message: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MissingCredentialError);
    }
  }
}

/**
 * Turn any thrown value into a single-line, human-readable message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
