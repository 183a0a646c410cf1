import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { apiError, apiOk, type ApiResult, type RemoteFile } from "../../src/adapters/openai/types.js";
import {
  uploadFiles,
  uploadOptionalFiles,
  uploadOptionalFilesSequentially,
} from "../../src/pipeline/batch-upload.js";
import { fail, initState, startPipeline } from "../../src/pipeline/result.js";
import { uploadFile } from "../../src/pipeline/upload.js";
import { setTestSink, TelemetryEvents, type TelemetryShape } from "../../src/utils/telemetry.js";
import { createFakeClient, fileIdFor, type FakeClient } from "../helpers/fake-client.js";

function uploaded(path: string): ApiResult<RemoteFile> {
  return apiOk({ id: fileIdFor(path), filename: basename(path), bytes: 5 });
}

describe("batch uploads", () => {
  let dir: string;
  let client: FakeClient;
  const path = (name: string) => join(dir, name);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "batch-test-"));
    for (const name of ["a.txt", "b.txt", "c.txt"]) {
      await writeFile(join(dir, name), name);
    }
    client = createFakeClient();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("uploadFiles", () => {
    it("uploads every request and stores each under its label", async () => {
      const result = await uploadFiles(startPipeline(client), [
        { label: "A", path: path("a.txt") },
        { label: "B", path: path("b.txt") },
        { label: "C", path: path("c.txt") },
      ]);

      expect(result.ok).toBe(true);
      expect(client.uploadFile).toHaveBeenCalledTimes(3);
      expect(Object.keys(result.state.files).sort()).toEqual(["A", "B", "C"]);
      expect(result.state.files["B"]?.id).toBe("file-b.txt");
    });

    it("waits for every upload and reports the first failure in request order", async () => {
      const pending = new Map<string, (result: ApiResult<RemoteFile>) => void>();
      client.uploadFile.mockImplementation(
        (filePath) =>
          new Promise((settle) => {
            pending.set(basename(filePath), settle);
          }),
      );

      const running = uploadFiles(startPipeline(client), [
        { label: "A", path: path("a.txt") },
        { label: "B", path: path("b.txt") },
        { label: "C", path: path("c.txt") },
      ]);
      await vi.waitFor(() => expect(pending.size).toBe(3));

      // Complete out of order: C, then B (failing), then A
      pending.get("c.txt")?.(apiError("Y"));
      pending.get("b.txt")?.(apiError("X"));
      pending.get("a.txt")?.(uploaded(path("a.txt")));
      const result = await running;

      expect(result.ok).toBe(false);
      expect(result.state.error).toBe("X");
      expect(Object.keys(result.state.files)).toEqual(["A"]);
    });

    it("keeps the files that did upload next to the failure", async () => {
      client.uploadFile.mockImplementation(async (filePath) =>
        filePath.endsWith("b.txt") ? apiError("X") : uploaded(filePath),
      );

      const result = await uploadFiles(startPipeline(client), [
        { label: "A", path: path("a.txt") },
        { label: "B", path: path("b.txt") },
        { label: "C", path: path("c.txt") },
      ]);

      expect(result.ok).toBe(false);
      expect(result.state.error).toBe("X");
      expect(Object.keys(result.state.files).sort()).toEqual(["A", "C"]);
    });

    it("skips optional requests without a path", async () => {
      const result = await uploadFiles(startPipeline(client), [
        { label: "A", path: path("a.txt") },
        { label: "appendix", path: "", optional: true },
        { label: "notes", optional: true },
      ]);

      expect(result.ok).toBe(true);
      expect(client.uploadFile).toHaveBeenCalledTimes(1);
      expect(Object.keys(result.state.files)).toEqual(["A"]);
    });

    it("fails on a required request whose file is missing", async () => {
      const missing = path("missing.txt");
      const result = await uploadFiles(startPipeline(client), [
        { label: "A", path: path("a.txt") },
        { label: "M", path: missing },
      ]);

      expect(result.state.error).toBe(`File does not exist: ${missing}`);
      expect(Object.keys(result.state.files)).toEqual(["A"]);
    });

    it("short-circuits on a failed result", async () => {
      const failed = fail(initState(client), "earlier");

      const result = await uploadFiles(failed, [{ label: "A", path: path("a.txt") }]);

      expect(result).toBe(failed);
      expect(client.uploadFile).not.toHaveBeenCalled();
    });
  });

  describe("uploadOptionalFiles", () => {
    it("drops blank and missing paths and labels the rest by basename", async () => {
      const result = await uploadOptionalFiles(startPipeline(client), [
        path("a.txt"),
        "",
        null,
        path("missing.txt"),
        undefined,
        path("b.txt"),
      ]);

      expect(result.ok).toBe(true);
      expect(client.uploadFile).toHaveBeenCalledTimes(2);
      expect(Object.keys(result.state.files).sort()).toEqual(["a.txt", "b.txt"]);
    });
  });

  describe("uploadOptionalFilesSequentially", () => {
    it("uploads one file at a time in order", async () => {
      const result = await uploadOptionalFilesSequentially(startPipeline(client), [
        path("a.txt"),
        " ",
        path("b.txt"),
      ]);

      expect(result.ok).toBe(true);
      expect(client.uploadFile.mock.calls.map(([filePath]) => basename(filePath))).toEqual(["a.txt", "b.txt"]);
      expect(Object.keys(result.state.files)).toEqual(["a.txt", "b.txt"]);
    });

    it("deletes what the batch uploaded and returns the pre-batch files on failure", async () => {
      const events: Array<{ event: string; data: TelemetryShape }> = [];
      setTestSink((event, data) => {
        events.push({ event, data });
      });
      client.uploadFile.mockImplementation(async (filePath) =>
        filePath.endsWith("b.txt") ? apiError("X") : uploaded(filePath),
      );

      const result = await uploadOptionalFilesSequentially(startPipeline(client), [
        path("a.txt"),
        path("b.txt"),
        path("c.txt"),
      ]);

      expect(result.ok).toBe(false);
      expect(result.state.error).toBe("X");
      expect(result.state.files).toEqual({});
      expect(client.deleteFile.mock.calls).toEqual([["file-a.txt"]]);
      expect(client.uploadFile).toHaveBeenCalledTimes(2);
      expect(events.find((e) => e.event === TelemetryEvents.BatchRollback)?.data).toEqual({
        failed_label: "b.txt",
        uploaded: 1,
        deleted: 1,
      });
    });

    it("never deletes a file that was stored before the batch", async () => {
      const before = await uploadFile(startPipeline(client), "a.txt", path("a.txt"));
      client.uploadFile.mockResolvedValueOnce(apiError("X"));

      const result = await uploadOptionalFilesSequentially(before, [path("a.txt"), path("b.txt")]);

      expect(result.state.error).toBe("X");
      expect(result.state.files).toEqual(before.state.files);
      expect(client.uploadFile).toHaveBeenCalledTimes(2);
      expect(client.deleteFile).not.toHaveBeenCalled();
    });
  });
});
