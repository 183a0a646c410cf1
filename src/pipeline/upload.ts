/**
 * Upload + Attach Stages
 *
 * uploadFile is the unit every batch variant is built from:
 *
 *   label already stored → no-op
 *   path not a regular file → failure, no remote call
 *   upload → attach to the collection (when one exists) → wait for ingestion
 *
 * A file that uploaded but could not be attached is deleted again before
 * the stage fails. When that delete fails too, the failure names the file id.
 */

import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join, resolve } from "node:path";
import type { ApiResult, Attachment, DocumentApiClient } from "../adapters/openai/types.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { isBlank } from "../utils/text.js";
import { deleteFiles } from "./cleanup.js";
import { waitForAttachment, type PollingOptions } from "./polling.js";
import { defineStage, fail, fromEnd, ok, removeHistory, removeOutput } from "./result.js";
import type { HistorySelector, PipelineResult, PipelineState, StoredFile } from "./types.js";

export interface UploadOptions {
  /** Attach to the active collection; ignored when there is none (default true) */
  attach?: boolean;
  /** Block until ingestion reaches a terminal status (default true) */
  waitForIngestion?: boolean;
  polling?: Partial<PollingOptions>;
}

export async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    log.debug({ path, error }, "File not accessible");
    return false;
  }
}

async function attachToCollection(
  client: DocumentApiClient,
  fileId: string,
  collectionId: string,
  options: UploadOptions,
): Promise<ApiResult<Attachment>> {
  const attached = await client.attachFile(fileId, collectionId);
  if (!attached.ok) return attached;

  emit(TelemetryEvents.FileAttached, {
    file_id: fileId,
    collection_id: collectionId,
    status: attached.value.status,
  });

  if (options.waitForIngestion === false) {
    return attached;
  }
  return waitForAttachment(client, fileId, collectionId, options.polling);
}

export const uploadFile = defineStage(
  "upload_file",
  async (state: PipelineState, label: string, path: string, options: UploadOptions = {}) => {
    if (Object.hasOwn(state.files, label)) {
      log.debug({ label }, "File already uploaded, skipping");
      return ok(state);
    }

    const absolutePath = resolve(path);
    if (!(await isRegularFile(absolutePath))) {
      return fail(state, `File does not exist: ${path}`);
    }

    const { client, collection } = state;
    const uploaded = await client.uploadFile(absolutePath);
    if (!uploaded.ok) {
      emit(TelemetryEvents.FileUploadFailed, { label, reason: uploaded.reason });
      return fail(state, uploaded.reason);
    }

    emit(TelemetryEvents.FileUploaded, {
      label,
      file_id: uploaded.value.id,
      bytes: uploaded.value.bytes,
    });

    let stored: StoredFile = uploaded.value;

    if (collection && options.attach !== false) {
      const attachment = await attachToCollection(client, stored.id, collection.id, options);
      if (!attachment.ok) {
        const deleted = await deleteFiles(client, [stored]);
        return deleted === 0
          ? fail(state, `${attachment.reason} (uploaded file ${stored.id} could not be deleted)`)
          : fail(state, attachment.reason);
      }
      stored = { ...stored, attachment: attachment.value };
    }

    return ok({ ...state, files: { ...state.files, [label]: stored } });
  },
);

/** Like uploadFile, but a blank or absent path is a successful no-op. */
export const uploadOptionalFile = defineStage(
  "upload_optional_file",
  async (state: PipelineState, label: string, path: string | null | undefined, options: UploadOptions = {}) => {
    if (path === null || path === undefined || isBlank(path)) {
      log.info({ label }, "No path given for optional file, skipping");
      return ok(state);
    }
    return uploadFile(ok(state), label, path, options);
  },
);

/**
 * Wait until every attached file has finished ingestion. Meant to follow
 * uploads made with `waitForIngestion: false`. Stops at the first file
 * that does not complete; the state is then left as it was before.
 */
export const confirmIngestion = defineStage(
  "confirm_ingestion",
  async (state: PipelineState, options: Pick<UploadOptions, "polling"> = {}) => {
    const { client, collection } = state;
    if (!collection) return ok(state);

    const files: Record<string, StoredFile> = { ...state.files };

    for (const [label, file] of Object.entries(state.files)) {
      if (!file.attachment || file.attachment.status === "completed") continue;

      const attachment = await waitForAttachment(client, file.id, collection.id, options.polling);
      if (!attachment.ok) {
        return fail(state, attachment.reason);
      }

      log.info({ label, file_id: file.id }, "File ingested into collection");
      files[label] = { ...file, attachment: attachment.value };
    }

    return ok({ ...state, files });
  },
);

export interface OutputUploadOptions extends UploadOptions {
  /** History entries to drop once the output is stored as a file */
  removeFromHistory?: HistorySelector;
  /** Drop the uploaded output from `outputs` (default false) */
  removeOutput?: boolean;
}

/**
 * Store one of the turn outputs as a remote file labelled `fileKey`.
 * `fileKey` is also the uploaded filename, so it needs an extension the
 * API accepts (e.g. "summary.md") and no directory part.
 * A negative `outputIndex` counts from the latest output.
 */
export const uploadOutputAsFile = defineStage(
  "upload_output_as_file",
  async (state: PipelineState, fileKey: string, outputIndex: number, options: OutputUploadOptions = {}) => {
    const index = fromEnd(outputIndex, state.outputs.length);
    const output = Number.isInteger(index) && index >= 0 ? state.outputs[index] : undefined;
    if (output === undefined) {
      return fail(state, `Invalid output message index: ${outputIndex}`);
    }
    if (isBlank(fileKey) || fileKey === "." || fileKey === ".." || basename(fileKey) !== fileKey) {
      return fail(state, `Invalid file key: ${fileKey}`);
    }

    const dir = await mkdtemp(join(tmpdir(), "pipeline-output-"));
    let uploaded: PipelineResult;
    try {
      const path = join(dir, fileKey);
      await writeFile(path, output, "utf8");
      uploaded = await uploadFile(ok(state), fileKey, path, options);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }

    if (options.removeFromHistory !== undefined) {
      uploaded = removeHistory(uploaded, options.removeFromHistory);
    }
    if (options.removeOutput) {
      uploaded = removeOutput(uploaded, index);
    }
    return uploaded;
  },
);
