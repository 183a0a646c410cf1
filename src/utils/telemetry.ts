import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with credential redaction
 *
 * Redaction paths are centralized in src/utils/logger-config.ts.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TestSink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only used when NODE_ENV=test or VITEST=true
 */
let testSink: TestSink | null = null;

export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  CollectionCreated: "pipeline.collection.created",

  FileUploaded: "pipeline.file.uploaded",
  FileUploadFailed: "pipeline.file.upload_failed",
  FileAttached: "pipeline.file.attached",

  AttachmentPolled: "pipeline.attachment.polled",
  AttachmentCompleted: "pipeline.attachment.completed",
  AttachmentFailed: "pipeline.attachment.failed",

  BatchUploadCompleted: "pipeline.batch_upload.completed",
  BatchRollback: "pipeline.batch_upload.rolled_back",

  TurnCreated: "pipeline.turn.created",
  TurnFailed: "pipeline.turn.failed",

  ResourceDeleted: "pipeline.cleanup.resource_deleted",
  ResourceDeleteFailed: "pipeline.cleanup.resource_delete_failed",
  CleanupCompleted: "pipeline.cleanup.completed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "document_pipeline.",
    globalTags: {
      service: env.DD_SERVICE || "document-pipeline",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryShape[string], fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

/**
 * Emit a structured telemetry event.
 *
 * Always logs through pino; forwards a metric to Datadog when configured.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) return;

  try {
    switch (event) {
      case TelemetryEvents.FileUploaded:
      case TelemetryEvents.FileUploadFailed:
        datadogClient.increment("files.upload", 1, {
          outcome: event === TelemetryEvents.FileUploaded ? "ok" : "error",
        });
        break;

      case TelemetryEvents.AttachmentCompleted:
      case TelemetryEvents.AttachmentFailed:
        datadogClient.increment("attachment.outcome", 1, {
          status: tag(eventData.status, "unknown"),
        });
        break;

      case TelemetryEvents.AttachmentPolled:
        datadogClient.increment("attachment.polls", 1, {
          status: tag(eventData.status, "unknown"),
        });
        break;

      case TelemetryEvents.TurnCreated:
        if (typeof eventData.input_tokens === "number") {
          datadogClient.histogram("turn.input_tokens", eventData.input_tokens);
        }
        if (typeof eventData.output_tokens === "number") {
          datadogClient.histogram("turn.output_tokens", eventData.output_tokens);
        }
        datadogClient.increment("turn.created", 1, { model: tag(eventData.model, "unknown") });
        break;

      case TelemetryEvents.ResourceDeleteFailed:
        datadogClient.increment("cleanup.delete_failed", 1, {
          resource: tag(eventData.resource, "unknown"),
        });
        break;

      default:
        // Event-only: logged above, no metric
        break;
    }
  } catch (error) {
    // Never let telemetry break a pipeline run
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (call before process exit)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) return;

  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}
