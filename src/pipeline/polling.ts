/**
 * Attachment ingestion polling.
 *
 * Drives an attachment's status to a terminal state:
 *
 *   queued       → sleep, re-poll, attempt counter back to 0
 *   in_progress  → sleep, re-poll with attempt + 1, until maxAttempts
 *   completed    → done
 *   failed / cancelled / expired → done, each reported with its own message
 *
 * The queued reset means a server that keeps flipping between queued and
 * in_progress is never timed out by the attempt budget alone; set
 * `maxWaitMs` to bound the total wait.
 */

import type { PollingConfig } from "../config/index.js";
import {
  apiError,
  apiOk,
  type ApiResult,
  type Attachment,
  type AttachmentStatusT,
  type DocumentApiClient,
} from "../adapters/openai/types.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";

export const MAX_POLL_ATTEMPTS = 10;
export const POLL_INTERVAL_MS = 1_000;

export type SleepFn = (ms: number) => Promise<void>;

export type TerminalStatus = Extract<AttachmentStatusT, "completed" | "failed" | "cancelled" | "expired">;

export interface PollingOptions {
  maxAttempts: number;
  intervalMs: number;
  /** Overall wall-clock bound; undefined = attempt budget only */
  maxWaitMs?: number;
  sleep: SleepFn;
  now: () => number;
}

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_POLLING_OPTIONS: PollingOptions = {
  maxAttempts: MAX_POLL_ATTEMPTS,
  intervalMs: POLL_INTERVAL_MS,
  sleep: defaultSleep,
  now: Date.now,
};

export function resolvePollingOptions(overrides: Partial<PollingOptions> = {}): PollingOptions {
  return { ...DEFAULT_POLLING_OPTIONS, ...overrides };
}

export function pollingOptionsFromConfig(config: PollingConfig): Partial<PollingOptions> {
  return {
    maxAttempts: config.maxAttempts,
    intervalMs: config.intervalMs,
    ...(config.maxWaitMs !== undefined ? { maxWaitMs: config.maxWaitMs } : {}),
  };
}

export function timeoutMessage(fileId: string): string {
  return `Timeout waiting for attachment ingestion of file ${fileId}`;
}

const TERMINAL_FAILURE_MESSAGES: Record<Exclude<TerminalStatus, "completed">, (fileId: string) => string> = {
  failed: (fileId) => `Attachment ingestion failed for file ${fileId}`,
  cancelled: (fileId) => `Attachment ingestion was cancelled for file ${fileId}`,
  expired: (fileId) => `Attachment ingestion expired for file ${fileId}`,
};

/**
 * Poll until the attachment reaches a terminal status.
 * Returns the terminal status, or a failure on timeout or remote error.
 */
export async function pollAttachmentStatus(
  client: DocumentApiClient,
  fileId: string,
  collectionId: string,
  overrides: Partial<PollingOptions> = {},
): Promise<ApiResult<TerminalStatus>> {
  const options = resolvePollingOptions(overrides);
  const startedAt = options.now();
  let attempts = 0;

  const overDeadline = () =>
    options.maxWaitMs !== undefined && options.now() - startedAt >= options.maxWaitMs;

  for (;;) {
    const polled = await client.getAttachmentStatus(fileId, collectionId, attempts);
    if (!polled.ok) return polled;

    const status = polled.value;
    emit(TelemetryEvents.AttachmentPolled, { file_id: fileId, attempt: attempts, status });

    switch (status) {
      case "completed":
      case "failed":
      case "cancelled":
      case "expired":
        return apiOk(status);

      case "queued":
        if (overDeadline()) return apiError(timeoutMessage(fileId));
        await options.sleep(options.intervalMs);
        attempts = 0;
        break;

      case "in_progress":
        if (attempts >= options.maxAttempts || overDeadline()) {
          return apiError(timeoutMessage(fileId));
        }
        log.info({ file_id: fileId, attempt: attempts }, "Waiting for attachment ingestion to complete");
        await options.sleep(options.intervalMs);
        attempts += 1;
        break;
    }
  }
}

/**
 * Poll to a terminal status, then fetch the final attachment record.
 * Non-completed terminal statuses come back as distinct failures.
 */
export async function waitForAttachment(
  client: DocumentApiClient,
  fileId: string,
  collectionId: string,
  overrides: Partial<PollingOptions> = {},
): Promise<ApiResult<Attachment>> {
  const polled = await pollAttachmentStatus(client, fileId, collectionId, overrides);

  if (!polled.ok) {
    emit(TelemetryEvents.AttachmentFailed, { file_id: fileId, status: "error", reason: polled.reason });
    return polled;
  }

  if (polled.value !== "completed") {
    emit(TelemetryEvents.AttachmentFailed, { file_id: fileId, status: polled.value });
    return apiError(TERMINAL_FAILURE_MESSAGES[polled.value](fileId));
  }

  emit(TelemetryEvents.AttachmentCompleted, { file_id: fileId, status: "completed" });
  return client.getAttachment(fileId, collectionId);
}
