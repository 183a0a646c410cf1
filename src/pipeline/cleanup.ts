/**
 * Rollback / cleanup.
 *
 * Best-effort deletion of everything a run created remotely. Unlike the
 * stages, nothing here short-circuits: each deletion is attempted on its
 * own and a failure is logged, never propagated.
 */

import type { ApiResult, DocumentApiClient } from "../adapters/openai/types.js";
import { describeError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import type { PipelineResult, StoredFile } from "./types.js";

type ResourceKind = "collection" | "file" | "turn";

/**
 * Run one deletion; report the outcome instead of raising.
 */
async function attemptDelete(
  resource: ResourceKind,
  id: string,
  remove: () => Promise<ApiResult<void>>,
): Promise<boolean> {
  let reason: string;
  try {
    const result = await remove();
    if (result.ok) {
      emit(TelemetryEvents.ResourceDeleted, { resource, id });
      return true;
    }
    reason = result.reason;
  } catch (error) {
    reason = describeError(error);
  }

  log.warn({ resource, id, reason }, "Cleanup could not delete resource");
  emit(TelemetryEvents.ResourceDeleteFailed, { resource, id, reason });
  return false;
}

/**
 * Delete every given file, continuing past failures.
 * Resolves to the number of files actually deleted.
 */
export async function deleteFiles(
  client: DocumentApiClient,
  files: Iterable<Pick<StoredFile, "id">>,
): Promise<number> {
  let deleted = 0;
  for (const file of files) {
    if (await attemptDelete("file", file.id, () => client.deleteFile(file.id))) {
      deleted += 1;
    }
  }
  return deleted;
}

/**
 * Delete the collection, then every file, then every turn. Works on both
 * arms and hands back the very same result it was given.
 */
export async function cleanupResources(result: PipelineResult): Promise<PipelineResult> {
  const { client, collection, files, turns } = result.state;
  let failures = 0;

  if (collection) {
    const removed = await attemptDelete("collection", collection.id, () =>
      client.deleteCollection(collection.id),
    );
    if (!removed) failures += 1;
  }

  const fileList = Object.values(files);
  failures += fileList.length - (await deleteFiles(client, fileList));

  for (const turn of turns) {
    if (!(await attemptDelete("turn", turn.id, () => client.deleteTurn(turn.id)))) {
      failures += 1;
    }
  }

  emit(TelemetryEvents.CleanupCompleted, {
    collection: collection !== null,
    files: fileList.length,
    turns: turns.length,
    failures,
    pipeline_ok: result.ok,
  });

  return result;
}
