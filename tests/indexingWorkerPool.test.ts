import { describe, expect, it, vi } from "vitest";
import { IndexingOutcome } from "../src/pipelines/indexing.js";
import { IndexingWorkerPool } from "../src/services/indexingWorkerPool.js";
import { KeywordEmbeddingProvider, createIndexingHarness } from "./helpers/fakes.js";

describe("IndexingWorkerPool", () => {
  it("drains the queue and stops cleanly", async () => {
    const harness = createIndexingHarness({
      provider: new KeywordEmbeddingProvider(["cat", "dog"]),
      dimension: 2,
    });
    await harness.ingest("doc-1", "A cat sat.");
    await harness.ingest("doc-2", "A dog ran. A cat sat down.");

    const outcomes: IndexingOutcome[] = [];
    const pool = new IndexingWorkerPool(harness.pipeline, {
      concurrency: 2,
      pollIntervalMs: 5,
      onOutcome: (outcome) => outcomes.push(outcome),
    });
    pool.start();

    await vi.waitFor(() => {
      expect(outcomes).toHaveLength(2);
    });
    await pool.stop();

    expect(pool.isRunning).toBe(false);
    expect(outcomes.map((outcome) => outcome.status)).toEqual(["indexed", "indexed"]);
    expect((await harness.documents.list({ status: "ready" })).map((doc) => doc.id)).toEqual([
      "doc-1",
      "doc-2",
    ]);
  });

  it("keeps polling after a failed iteration", async () => {
    const harness = createIndexingHarness({
      provider: new KeywordEmbeddingProvider(["cat"]),
      dimension: 1,
    });
    const processNext = vi
      .spyOn(harness.pipeline, "processNext")
      .mockRejectedValueOnce(new Error("document store offline"));
    await harness.ingest("doc-1", "A cat sat.");

    const pool = new IndexingWorkerPool(harness.pipeline, { concurrency: 1, pollIntervalMs: 5 });
    pool.start();
    await vi.waitFor(async () => {
      expect((await harness.documents.get("doc-1"))?.status).toBe("ready");
    });
    await pool.stop();

    expect(processNext.mock.calls.length).toBeGreaterThanOrEqual(2);
  });

  it("rejects a non-positive concurrency", () => {
    const harness = createIndexingHarness({
      provider: new KeywordEmbeddingProvider(["cat"]),
      dimension: 1,
    });

    expect(() => new IndexingWorkerPool(harness.pipeline, { concurrency: 0, pollIntervalMs: 5 })).toThrow(
      RangeError,
    );
  });
});
