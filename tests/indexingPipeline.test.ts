import { describe, expect, it, vi } from "vitest";
import { FatalUpstreamError, TransientUpstreamError } from "../src/domain/errors.js";
import { createIndexingJob } from "../src/domain/indexingJob.js";
import { chunkKey } from "../src/domain/types.js";
import { EmbeddingProvider } from "../src/infra/ai/types.js";
import { hashContent } from "../src/utils/text.js";
import {
  GatedEmbeddingProvider,
  KeywordEmbeddingProvider,
  createIndexingHarness,
} from "./helpers/fakes.js";

const EXAMPLE = "A cat sat. A dog ran.";

const NEW_TEXT = "A dog sat.";

function gatedHarness() {
  const gate = new GatedEmbeddingProvider(new KeywordEmbeddingProvider(["cat", "dog"]));
  return { gate, ...createIndexingHarness({ provider: gate, dimension: 2 }) };
}

function keywordHarness(options: { maxAttempts?: number; upsertBatchSize?: number } = {}) {
  const provider = new KeywordEmbeddingProvider(["cat", "dog"]);
  return { provider, ...createIndexingHarness({ provider, dimension: 2, ...options }) };
}

describe("IndexingPipeline", () => {
  it("indexes a document and marks it ready", async () => {
    const harness = keywordHarness();
    const hash = await harness.ingest("doc-1", EXAMPLE);

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({
      status: "indexed",
      documentId: "doc-1",
      attempt: 1,
      chunkCount: 2,
      reason: null,
    });
    expect(harness.vectorIndex.listKeys("doc-1")).toEqual(["doc-1-0", "doc-1-1"]);
    expect(await harness.documents.get("doc-1")).toMatchObject({
      status: "ready",
      chunkCount: 2,
      indexedContentHash: hash,
      failureReason: null,
    });
    expect(harness.queue.stats()).toEqual({ queued: 0, inFlight: 0, deadLettered: 0 });
    expect(await harness.pipeline.processNext()).toBeNull();
  });

  it("converges to the same chunk set when a crashed job is redelivered", async () => {
    const harness = keywordHarness();
    const hash = await harness.ingest("doc-1", EXAMPLE);

    // First delivery: the worker marks the document, writes one chunk and dies.
    const crashed = await harness.queue.receive();
    expect(crashed?.attempt).toBe(1);
    await harness.documents.updateStatus("doc-1", { status: "indexing" });
    await harness.vectorIndex.upsert([
      {
        key: chunkKey("doc-1", 0),
        vector: [1, 0],
        payload: {
          documentId: "doc-1",
          sequenceIndex: 0,
          contentHash: hash,
          start: 0,
          end: 10,
          text: "A cat sat.",
          metadata: {},
        },
      },
    ]);

    harness.advance(1_000);
    const outcome = await harness.pipeline.processNext();

    expect(outcome?.status).toBe("indexed");
    expect(outcome?.attempt).toBe(2);
    expect(harness.vectorIndex.listKeys("doc-1")).toEqual(["doc-1-0", "doc-1-1"]);
    expect((await harness.documents.get("doc-1"))?.status).toBe("ready");
  });

  it("skips a duplicate job for content that is already indexed", async () => {
    const harness = keywordHarness();
    const hash = await harness.ingest("doc-1", EXAMPLE);
    await harness.pipeline.processNext();
    await harness.queue.enqueue(createIndexingJob("doc-1", hash));

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "skipped", reason: "AlreadyIndexed", chunkCount: 2 });
    expect(harness.provider.calls).toHaveLength(1);
  });

  it("skips a job superseded by newer content", async () => {
    const harness = keywordHarness();
    await harness.ingest("doc-1", EXAMPLE);
    const newText = "A dog sat.";
    const newHash = hashContent(newText);
    await harness.documents.replaceContent("doc-1", newText, newHash);
    await harness.queue.enqueue(createIndexingJob("doc-1", newHash));

    const first = await harness.pipeline.processNext();
    const second = await harness.pipeline.processNext();

    expect(first).toMatchObject({ status: "skipped", reason: "Superseded" });
    expect(second).toMatchObject({ status: "indexed", chunkCount: 1 });
    expect((await harness.documents.get("doc-1"))?.indexedContentHash).toBe(newHash);
  });

  it("replaces the chunks of previous content on re-index", async () => {
    const harness = keywordHarness();
    await harness.ingest("doc-1", EXAMPLE);
    await harness.pipeline.processNext();

    const newText = "A dog sat.";
    const newHash = hashContent(newText);
    await harness.documents.replaceContent("doc-1", newText, newHash);
    await harness.queue.enqueue(createIndexingJob("doc-1", newHash));
    await harness.pipeline.processNext();

    expect(harness.vectorIndex.listKeys("doc-1")).toEqual(["doc-1-0"]);
    const [hit] = await harness.vectorIndex.search({ vector: [0, 1], topK: 1 });
    expect(hit.payload).toMatchObject({ contentHash: newHash, text: "A dog sat." });
  });

  it("acks a job whose document was deleted and clears its chunks", async () => {
    const harness = keywordHarness();
    await harness.ingest("doc-1", EXAMPLE);
    await harness.documents.delete("doc-1");

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "skipped", reason: "DocumentDeleted" });
    expect(await harness.vectorIndex.countPoints()).toBe(0);
    expect(harness.queue.stats().queued).toBe(0);
  });

  it("dead-letters a malformed job without touching documents", async () => {
    const harness = keywordHarness();
    await harness.queue.enqueue({ document_id: "", content_hash: "nope", enqueued_at: "later" });

    const outcome = await harness.pipeline.processNext();
    const [deadLetter] = await harness.queue.listDeadLetters();

    expect(outcome).toMatchObject({ status: "dead_lettered", documentId: null, reason: "ContractViolation" });
    expect(deadLetter.reason.startsWith("ContractViolation: ")).toBe(true);
  });

  it("marks an empty document failed and acks the job", async () => {
    const harness = keywordHarness();
    await harness.documents.create({ id: "doc-empty", source: "empty.txt", text: "", contentHash: hashContent("") });
    await harness.queue.enqueue(createIndexingJob("doc-empty", hashContent("")));

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "failed", reason: "EmptyDocument" });
    expect(await harness.documents.get("doc-empty")).toMatchObject({
      status: "failed",
      failureReason: "EmptyDocument",
      chunkCount: 0,
    });
    expect(harness.queue.stats()).toEqual({ queued: 0, inFlight: 0, deadLettered: 0 });
  });

  it("rolls back partial upserts before marking the document failed", async () => {
    const harness = keywordHarness({ upsertBatchSize: 1 });
    await harness.ingest("doc-1", EXAMPLE);
    const realUpsert = harness.vectorIndex.upsert.bind(harness.vectorIndex);
    vi.spyOn(harness.vectorIndex, "upsert")
      .mockImplementationOnce(realUpsert)
      .mockRejectedValueOnce(new Error("connection reset"));

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "retry_scheduled", reason: "connection reset" });
    expect(await harness.vectorIndex.countPoints("doc-1")).toBe(0);
    expect(await harness.documents.get("doc-1")).toMatchObject({
      status: "failed",
      chunkCount: 0,
      failureReason: "connection reset",
    });

    const retried = await harness.pipeline.processNext();
    expect(retried).toMatchObject({ status: "indexed", attempt: 2, chunkCount: 2 });
  });

  it("fails with zero chunks when nothing could be embedded", async () => {
    const provider: EmbeddingProvider = {
      name: "down",
      embedBatch: vi.fn(async () => {
        throw new TransientUpstreamError("service unavailable", 503);
      }),
    };
    const harness = createIndexingHarness({ provider, dimension: 2, maxAttempts: 2 });
    await harness.ingest("doc-1", EXAMPLE);

    const first = await harness.pipeline.processNext();
    const second = await harness.pipeline.processNext();

    expect(first).toMatchObject({ status: "retry_scheduled", reason: "EmbeddingUnavailable" });
    expect(second).toMatchObject({ status: "dead_lettered", attempt: 2, reason: "MaxRetriesExceeded" });
    expect(await harness.vectorIndex.countPoints("doc-1")).toBe(0);
    expect(await harness.documents.get("doc-1")).toMatchObject({
      status: "failed",
      chunkCount: 0,
      failureReason: "MaxRetriesExceeded",
    });
    const [deadLetter] = await harness.queue.listDeadLetters();
    expect(deadLetter.reason).toBe("MaxRetriesExceeded: Gave up after 2 delivery attempt(s).");
    expect(await harness.pipeline.processNext()).toBeNull();
  });

  it("dead-letters on a dimension mismatch without retrying", async () => {
    const provider: EmbeddingProvider = {
      name: "wide",
      embedBatch: async (texts) => texts.map(() => [1, 0, 0]),
    };
    const harness = createIndexingHarness({ provider, dimension: 2 });
    await harness.ingest("doc-1", EXAMPLE);

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "dead_lettered", reason: "ContractViolation" });
    expect(await harness.documents.get("doc-1")).toMatchObject({
      status: "failed",
      failureReason: "ContractViolation",
    });
    expect(await harness.vectorIndex.countPoints()).toBe(0);
  });

  it("dead-letters a fatal upstream error on the first attempt", async () => {
    const provider: EmbeddingProvider = {
      name: "locked",
      embedBatch: vi.fn(async () => {
        throw new FatalUpstreamError("invalid api key", 401);
      }),
    };
    const harness = createIndexingHarness({ provider, dimension: 2 });
    await harness.ingest("doc-1", EXAMPLE);

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "dead_lettered", attempt: 1, reason: "FatalUpstream" });
    expect(provider.embedBatch).toHaveBeenCalledTimes(1);
    const [deadLetter] = await harness.queue.listDeadLetters();
    expect(deadLetter.reason).toBe("FatalUpstream: invalid api key");
  });

  it("gives up on a delivery beyond the attempt budget", async () => {
    const harness = keywordHarness({ maxAttempts: 1 });
    await harness.ingest("doc-1", EXAMPLE);
    await harness.queue.receive();
    harness.advance(1_000);

    const outcome = await harness.pipeline.processNext();

    expect(outcome).toMatchObject({ status: "dead_lettered", attempt: 2, reason: "MaxRetriesExceeded" });
    expect((await harness.documents.get("doc-1"))?.failureReason).toBe("MaxRetriesExceeded");
    expect(harness.provider.calls).toHaveLength(0);
  });

  describe("with overlapping deliveries", () => {
    it("stays ready with its chunks when a redelivery overlaps a slow first delivery", async () => {
      const harness = gatedHarness();
      const hash = await harness.ingest("doc-1", EXAMPLE);

      const slow = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(1));
      harness.advance(1_000);
      const redelivered = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(2));

      harness.gate.release();
      expect(await slow).toMatchObject({ status: "indexed", attempt: 1, chunkCount: 2 });
      harness.gate.release();
      expect(await redelivered).toMatchObject({ status: "indexed", attempt: 2, chunkCount: 2 });

      expect(harness.vectorIndex.listKeys("doc-1")).toEqual(["doc-1-0", "doc-1-1"]);
      expect(await harness.documents.get("doc-1")).toMatchObject({
        status: "ready",
        chunkCount: 2,
        indexedContentHash: hash,
      });
      expect(harness.queue.stats()).toEqual({ queued: 0, inFlight: 0, deadLettered: 0 });
    });

    it("keeps the committed chunks when the other delivery fails afterwards", async () => {
      const harness = gatedHarness();
      await harness.ingest("doc-1", EXAMPLE);

      const slow = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(1));
      harness.advance(1_000);
      const redelivered = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(2));

      harness.gate.release();
      expect((await slow)?.status).toBe("indexed");
      harness.gate.fail(new Error("socket hang up"));
      expect(await redelivered).toMatchObject({
        status: "skipped",
        reason: "AlreadyIndexed",
        chunkCount: 2,
      });

      expect(harness.vectorIndex.listKeys("doc-1")).toEqual(["doc-1-0", "doc-1-1"]);
      expect((await harness.documents.get("doc-1"))?.status).toBe("ready");
      expect(harness.queue.stats()).toEqual({ queued: 0, inFlight: 0, deadLettered: 0 });
    });

    it("lets newer content win when it is ingested while a job is in flight", async () => {
      const harness = gatedHarness();
      await harness.ingest("doc-1", EXAMPLE);

      const stale = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(1));
      const newHash = hashContent(NEW_TEXT);
      await harness.documents.replaceContent("doc-1", NEW_TEXT, newHash);
      await harness.queue.enqueue(createIndexingJob("doc-1", newHash));
      const fresh = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(2));

      harness.gate.release();
      expect(await stale).toMatchObject({ status: "skipped", reason: "Superseded" });
      harness.gate.release();
      expect(await fresh).toMatchObject({ status: "indexed", chunkCount: 1 });

      expect(await harness.documents.get("doc-1")).toMatchObject({
        status: "ready",
        chunkCount: 1,
        contentHash: newHash,
        indexedContentHash: newHash,
      });
      const hits = await harness.vectorIndex.search({ vector: [0, 1], topK: 5 });
      expect(hits.map((hit) => [hit.key, hit.payload.contentHash])).toEqual([["doc-1-0", newHash]]);
      expect(harness.queue.stats()).toEqual({ queued: 0, inFlight: 0, deadLettered: 0 });
    });

    it("re-queues newer content whose chunks a superseded job overwrote", async () => {
      const harness = gatedHarness();
      await harness.ingest("doc-1", EXAMPLE);

      const stale = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(1));
      const newHash = hashContent(NEW_TEXT);
      await harness.documents.replaceContent("doc-1", NEW_TEXT, newHash);
      await harness.queue.enqueue(createIndexingJob("doc-1", newHash));
      const fresh = harness.pipeline.processNext();
      await vi.waitFor(() => expect(harness.gate.pending).toBe(2));

      // The newer job commits first; the stale one then writes doc-1-0 over it.
      harness.gate.release(1);
      expect((await fresh)?.status).toBe("indexed");
      harness.gate.release();
      expect(await stale).toMatchObject({ status: "skipped", reason: "Superseded" });

      expect(await harness.vectorIndex.countPoints("doc-1")).toBe(0);
      expect((await harness.documents.get("doc-1"))?.status).toBe("pending");

      harness.gate.open();
      expect(await harness.pipeline.processNext()).toMatchObject({ status: "indexed", chunkCount: 1 });
      const hits = await harness.vectorIndex.search({ vector: [0, 1], topK: 5 });
      expect(hits.map((hit) => [hit.key, hit.payload.contentHash])).toEqual([["doc-1-0", newHash]]);
      expect((await harness.documents.get("doc-1"))?.status).toBe("ready");
    });
  });
});
