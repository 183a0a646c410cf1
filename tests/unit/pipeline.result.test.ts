import { describe, it, expect, vi } from "vitest";
import {
  defineStage,
  fail,
  getOutputs,
  initState,
  mergeStates,
  ok,
  removeHistory,
  removeOutput,
  runPipeline,
  startPipeline,
  updateExtra,
} from "../../src/pipeline/result.js";
import { createCollection } from "../../src/pipeline/collection.js";
import type { PipelineState } from "../../src/pipeline/types.js";
import { createFakeClient } from "../helpers/fake-client.js";

function message(content: string) {
  return { role: "user" as const, content };
}

describe("Result pipeline", () => {
  it("starts from an empty, healthy state", () => {
    const client = createFakeClient();
    const result = startPipeline(client);

    expect(result.ok).toBe(true);
    expect(result.state).toEqual({
      client,
      files: {},
      collection: null,
      turns: [],
      history: [],
      outputs: [],
      error: null,
      extra: {},
    });
  });

  it("passes a failed result through without running the stage body", async () => {
    const body = vi.fn(async (state: PipelineState) => ok(state));
    const stage = defineStage("noop", body);
    const failed = fail(initState(createFakeClient()), "earlier failure");

    const result = await stage(failed);

    expect(result).toBe(failed);
    expect(body).not.toHaveBeenCalled();
  });

  it("converts a throwing stage body into the failure arm", async () => {
    const stage = defineStage("explode", async (_state: PipelineState, reason: string) => {
      throw new Error(reason);
    });
    const start = updateExtra(startPipeline(createFakeClient()), { run: 7 });

    const result = await stage(start, "boom");

    expect(result.ok).toBe(false);
    expect(result.state.error).toBe("boom");
    expect(result.state.extra).toEqual({ run: 7 });
  });

  it("makes no remote calls after the first failure", async () => {
    const client = createFakeClient();

    const result = await runPipeline(
      startPipeline(client),
      (r) => createCollection(r, "first"),
      (r) => createCollection(r, "second"),
      (r) => createCollection(r, "third"),
    );

    expect(result.ok).toBe(false);
    expect(result.state.error).toBe("Collection already exists");
    expect(client.createCollection).toHaveBeenCalledTimes(1);
    expect(result.state.collection).toEqual({ id: "vs_test", name: "first" });
  });

  it("clears a stale error when a state is wrapped as ok", () => {
    const failed = fail(initState(createFakeClient()), "old");
    expect(ok(failed.state).state.error).toBeNull();
  });
});

describe("State edits", () => {
  const client = createFakeClient();
  const base: PipelineState = {
    ...initState(client),
    history: [message("zero"), message("one"), message("two"), message("three")],
    outputs: ["a", "b", "c"],
  };

  it("merges extra instead of replacing it", () => {
    const once = updateExtra(ok(base), { topic: "pricing" });
    const twice = updateExtra(once, { round: 2 });
    expect(twice.state.extra).toEqual({ topic: "pricing", round: 2 });
  });

  it("removes one output by index", () => {
    expect(removeOutput(ok(base), 1).state.outputs).toEqual(["a", "c"]);
  });

  it("counts negative indexes from the end", () => {
    expect(removeOutput(ok(base), -1).state.outputs).toEqual(["a", "b"]);
    expect(removeHistory(ok(base), -1).state.history).toEqual([message("zero"), message("one"), message("two")]);
  });

  it("leaves everything in place for an index past either end", () => {
    expect(removeOutput(ok(base), 3).state.outputs).toEqual(["a", "b", "c"]);
    expect(removeOutput(ok(base), -4).state.outputs).toEqual(["a", "b", "c"]);
    expect(removeHistory(ok(base), -5).state.history).toHaveLength(4);
  });

  it("removes a single history entry", () => {
    const result = removeHistory(ok(base), 0);
    expect(result.state.history).toEqual([message("one"), message("two"), message("three")]);
  });

  it("removes an inclusive history range", () => {
    const result = removeHistory(ok(base), { from: 1, to: 2 });
    expect(result.state.history).toEqual([message("zero"), message("three")]);
  });

  it("leaves failed results untouched", () => {
    const failed = fail(base, "stop");
    expect(updateExtra(failed, { a: 1 })).toBe(failed);
    expect(removeOutput(failed, 0)).toBe(failed);
    expect(removeHistory(failed, 0)).toBe(failed);
  });

  it("exposes outputs or the error", () => {
    expect(getOutputs(ok(base))).toEqual({ ok: true, outputs: ["a", "b", "c"] });
    expect(getOutputs(fail(base, "stop"))).toEqual({ ok: false, error: "stop" });
  });

  it("concatenates history, outputs and turns when merging", () => {
    const incoming: PipelineState = {
      ...initState(client),
      history: [message("four")],
      outputs: ["d"],
      extra: { ignored: true },
    };

    const merged = mergeStates(base, incoming);

    expect(merged.history).toHaveLength(5);
    expect(merged.history[4]).toEqual(message("four"));
    expect(merged.outputs).toEqual(["a", "b", "c", "d"]);
    expect(merged.turns).toEqual([]);
    expect(merged.extra).toEqual({});
  });
});
