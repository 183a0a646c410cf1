/**
 * Result Pipeline Combinator
 *
 * Every stage has the shape `(result, ...args) => result`. A failed result
 * passes through every later stage untouched: no remote call, no state
 * change, no logging. Failures are data; anything a stage body throws is
 * caught here and turned into the failure arm.
 */

import type { DocumentApiClient } from "../adapters/openai/types.js";
import { describeError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import type {
  ErrorResult,
  HistorySelector,
  OkResult,
  PipelineResult,
  PipelineState,
  PipelineStep,
  Stage,
  StageBody,
} from "./types.js";

export function initState(client: DocumentApiClient): PipelineState {
  return {
    client,
    files: {},
    collection: null,
    turns: [],
    history: [],
    outputs: [],
    error: null,
    extra: {},
  };
}

export function ok(state: PipelineState): OkResult {
  return { ok: true, state: state.error === null ? state : { ...state, error: null } };
}

export function fail(state: PipelineState, error: string): ErrorResult {
  return { ok: false, state: { ...state, error } };
}

/** Entry point of a workflow run: a healthy, empty state. */
export function startPipeline(client: DocumentApiClient): OkResult {
  return ok(initState(client));
}

/**
 * Wrap a stage body with the short-circuit and catch-to-failure rules.
 */
export function defineStage<A extends unknown[]>(name: string, body: StageBody<A>): Stage<A> {
  return async (result, ...args) => {
    if (!result.ok) return result;

    try {
      return await body(result.state, ...args);
    } catch (error) {
      const message = describeError(error);
      log.error({ stage: name, error: message }, "Pipeline stage threw");
      return fail(result.state, message);
    }
  };
}

/**
 * Thread a result through steps left to right.
 *
 * Short-circuiting lives in the stages themselves, so every step is still
 * called; a failed result simply flows through them unchanged.
 */
export async function runPipeline(
  initial: PipelineResult | Promise<PipelineResult>,
  ...steps: PipelineStep[]
): Promise<PipelineResult> {
  let result = await initial;
  for (const step of steps) {
    result = await step(result);
  }
  return result;
}

/** Merge caller-defined values into `extra`. */
export function updateExtra(result: PipelineResult, patch: Record<string, unknown>): PipelineResult {
  if (!result.ok) return result;
  const { state } = result;
  return ok({ ...state, extra: { ...state.extra, ...patch } });
}

/** Negative indexes count from the end: -1 is the last element. */
export function fromEnd(index: number, length: number): number {
  return index < 0 ? length + index : index;
}

export function removeOutput(result: PipelineResult, index: number): PipelineResult {
  if (!result.ok) return result;
  const { state } = result;
  const target = fromEnd(index, state.outputs.length);
  return ok({ ...state, outputs: state.outputs.filter((_, i) => i !== target) });
}

function isSelected(selector: HistorySelector, index: number, length: number): boolean {
  return typeof selector === "number"
    ? index === fromEnd(selector, length)
    : index >= selector.from && index <= selector.to;
}

export function removeHistory(result: PipelineResult, selector: HistorySelector): PipelineResult {
  if (!result.ok) return result;
  const { state } = result;
  const { length } = state.history;
  return ok({ ...state, history: state.history.filter((_, i) => !isSelected(selector, i, length)) });
}

export type OutputsResult = { ok: true; outputs: readonly string[] } | { ok: false; error: string };

export function getOutputs(result: PipelineResult): OutputsResult {
  return result.ok
    ? { ok: true, outputs: result.state.outputs }
    : { ok: false, error: result.state.error };
}

/**
 * Combine two states: history, outputs and turns are concatenated
 * (base first); every other field comes from `base`.
 */
export function mergeStates(base: PipelineState, incoming: PipelineState): PipelineState {
  return {
    ...base,
    history: [...base.history, ...incoming.history],
    outputs: [...base.outputs, ...incoming.outputs],
    turns: [...base.turns, ...incoming.turns],
  };
}
