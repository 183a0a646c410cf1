/**
 * Batch Upload Orchestration
 *
 * uploadFiles fans out one upload per request and joins on all of them
 * (no fail-fast). Results are merged in request order, never completion
 * order, so the final state and the reported failure are deterministic.
 *
 * uploadOptionalFilesSequentially is the all-or-nothing variant: one at a
 * time, and on the first failure everything this batch uploaded is
 * deleted again.
 */

import { basename } from "node:path";
import { describeError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { isBlank } from "../utils/text.js";
import { deleteFiles } from "./cleanup.js";
import { defineStage, fail, ok } from "./result.js";
import type { PipelineResult, PipelineState, StoredFile } from "./types.js";
import { isRegularFile, uploadFile, uploadOptionalFile, type UploadOptions } from "./upload.js";

export interface UploadRequest {
  label: string;
  path?: string | null;
  /** Blank path is skipped instead of failing */
  optional?: boolean;
}

function runRequest(state: PipelineState, request: UploadRequest, options: UploadOptions): Promise<PipelineResult> {
  if (request.optional) {
    return uploadOptionalFile(ok(state), request.label, request.path, options);
  }
  return uploadFile(ok(state), request.label, request.path ?? "", options);
}

export const uploadFiles = defineStage(
  "upload_files",
  async (state: PipelineState, requests: readonly UploadRequest[], options: UploadOptions = {}) => {
    const settled = await Promise.allSettled(requests.map((request) => runRequest(state, request, options)));

    let files: Record<string, StoredFile> = { ...state.files };
    let firstFailure: string | null = null;

    for (const [index, outcome] of settled.entries()) {
      if (outcome.status === "rejected") {
        firstFailure ??= describeError(outcome.reason);
        continue;
      }
      const { state: uploaded } = outcome.value;
      files = { ...files, ...uploaded.files };
      if (!outcome.value.ok) {
        firstFailure ??= outcome.value.state.error;
        log.warn({ label: requests[index]?.label, error: outcome.value.state.error }, "Upload in batch failed");
      }
    }

    const merged: PipelineState = { ...state, files };
    emit(TelemetryEvents.BatchUploadCompleted, {
      requested: requests.length,
      stored: Object.keys(files).length - Object.keys(state.files).length,
      failed: firstFailure !== null,
    });

    if (firstFailure !== null) {
      return fail(merged, firstFailure);
    }
    log.info({ count: requests.length }, "All files uploaded successfully");
    return ok(merged);
  },
);

/**
 * Upload whichever of `paths` are present on disk, labelled by basename.
 * Blank and missing paths are dropped before anything is uploaded.
 */
export const uploadOptionalFiles = defineStage(
  "upload_optional_files",
  async (
    state: PipelineState,
    paths: readonly (string | null | undefined)[],
    options: UploadOptions = {},
  ) => {
    const requests: UploadRequest[] = [];
    for (const path of paths) {
      if (path === null || path === undefined || isBlank(path)) continue;
      if (!(await isRegularFile(path))) {
        log.info({ path }, "Optional file not found, skipping");
        continue;
      }
      requests.push({ label: basename(path), path });
    }
    return uploadFiles(ok(state), requests, options);
  },
);

/**
 * Upload `paths` one by one, labelled by basename. On the first failure
 * every file uploaded by this call is deleted and the failure carries the
 * file map as it was before the call. Labels that were already stored are
 * left alone in both directions.
 */
export const uploadOptionalFilesSequentially = defineStage(
  "upload_optional_files_sequentially",
  async (
    state: PipelineState,
    paths: readonly (string | null | undefined)[],
    options: UploadOptions = {},
  ) => {
    let current = state;
    const uploaded: StoredFile[] = [];

    for (const path of paths) {
      if (path === null || path === undefined || isBlank(path)) continue;

      const label = basename(path);
      const alreadyStored = Object.hasOwn(current.files, label);
      const result = await uploadFile(ok(current), label, path, options);

      if (!result.ok) {
        const deleted = await deleteFiles(state.client, uploaded);
        emit(TelemetryEvents.BatchRollback, {
          failed_label: label,
          uploaded: uploaded.length,
          deleted,
        });
        return fail(state, result.state.error);
      }

      const stored = result.state.files[label];
      if (!alreadyStored && stored) {
        uploaded.push(stored);
      }
      current = result.state;
    }

    return ok(current);
  },
);
