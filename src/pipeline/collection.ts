import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { defineStage, fail, ok } from "./result.js";
import type { PipelineState } from "./types.js";

/**
 * Create the run's document collection (an OpenAI vector store).
 * A run owns at most one collection.
 */
export const createCollection = defineStage(
  "create_collection",
  async (state: PipelineState, name: string) => {
    if (state.collection) {
      return fail(state, "Collection already exists");
    }

    const created = await state.client.createCollection(name);
    if (!created.ok) {
      return fail(state, created.reason);
    }

    emit(TelemetryEvents.CollectionCreated, { collection_id: created.value.id, name });
    return ok({ ...state, collection: created.value });
  },
);
