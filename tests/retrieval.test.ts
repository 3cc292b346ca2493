import { afterEach, describe, expect, it, vi } from "vitest";
import { EmbeddingGateway } from "../src/infra/ai/embeddingGateway.js";
import { InMemoryDocumentStore } from "../src/infra/store/inMemoryDocumentStore.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";
import { RetrievalEngine } from "../src/pipelines/retrieval.js";
import { chunkKey } from "../src/domain/types.js";
import { hashContent } from "../src/utils/text.js";
import { instantRetryPolicy } from "./helpers/fakes.js";

function setup() {
  const documents = new InMemoryDocumentStore();
  const vectorIndex = new InMemoryVectorIndex(2);
  const embedBatch = vi.fn(async (texts: string[]) => texts.map(() => [1, 0]));
  const embeddings = new EmbeddingGateway(
    { name: "fixed", embedBatch },
    { dimension: 2, batchSize: 4, concurrency: 1, retryPolicy: instantRetryPolicy() },
  );
  const engine = new RetrievalEngine(documents, vectorIndex, embeddings);

  async function seed(id: string, vectors: number[][], options: { ready?: boolean } = {}) {
    const text = `${id} body`;
    const contentHash = hashContent(text);
    await documents.create({ id, source: `${id}.md`, text, contentHash });
    if (options.ready ?? true) {
      await documents.updateStatus(id, { status: "indexing" });
      await documents.updateStatus(id, {
        status: "ready",
        chunkCount: vectors.length,
        indexedContentHash: contentHash,
      });
    }
    await vectorIndex.upsert(
      vectors.map((vector, sequenceIndex) => ({
        key: chunkKey(id, sequenceIndex),
        vector,
        payload: {
          documentId: id,
          sequenceIndex,
          contentHash,
          start: 0,
          end: text.length,
          text: `${id} chunk ${sequenceIndex}`,
          metadata: {},
        },
      })),
    );
    return contentHash;
  }

  return { documents, vectorIndex, embedBatch, engine, seed };
}

describe("RetrievalEngine", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("keeps only chunks at or above the relevance threshold", async () => {
    const { engine, seed } = setup();
    await seed("doc-a", [
      [0.95, 0.31224989991991997],
      [0.3, 1],
      [0, 1],
      [-1, 0],
      [0.4, 1],
    ]);

    const result = await engine.retrieve({ query: "cats", topK: 5, relevanceThreshold: 0.5 });

    expect(result.evidence).toHaveLength(1);
    expect(result.evidence[0]).toMatchObject({
      key: "doc-a-0",
      documentId: "doc-a",
      sequenceIndex: 0,
      source: "doc-a.md",
      text: "doc-a chunk 0",
    });
    expect(result.evidence[0].score).toBeCloseTo(0.95);
  });

  it("searches ready documents only", async () => {
    const { engine, seed, embedBatch } = setup();
    await seed("doc-ready", [[1, 0]]);
    await seed("doc-pending", [[1, 0]], { ready: false });

    const all = await engine.retrieve({ query: "q", topK: 5, relevanceThreshold: 0 });
    const scoped = await engine.retrieve({
      query: "q",
      topK: 5,
      relevanceThreshold: 0,
      documentScope: ["doc-pending"],
    });

    expect(all.evidence.map((chunk) => chunk.key)).toEqual(["doc-ready-0"]);
    expect(scoped.evidence).toEqual([]);
    expect(embedBatch).toHaveBeenCalledTimes(1);
  });

  it("ignores chunks that do not belong to the committed content", async () => {
    const { engine, seed, vectorIndex } = setup();
    await seed("doc-a", [[1, 0]]);
    await vectorIndex.upsert([
      {
        key: chunkKey("doc-a", 1),
        vector: [1, 0],
        payload: {
          documentId: "doc-a",
          sequenceIndex: 1,
          contentHash: "previous-content",
          start: 0,
          end: 3,
          text: "old",
          metadata: {},
        },
      },
    ]);

    const result = await engine.retrieve({ query: "q", topK: 5, relevanceThreshold: 0 });

    expect(result.evidence.map((chunk) => chunk.key)).toEqual(["doc-a-0"]);
  });

  it("orders ties by document and sequence, then caps at topK", async () => {
    const { engine, seed } = setup();
    await seed("doc-b", [[1, 0]]);
    await seed("doc-a", [[1, 0], [1, 0]]);

    const result = await engine.retrieve({ query: "q", topK: 2, relevanceThreshold: 0.5 });

    expect(result.evidence.map((chunk) => chunk.key)).toEqual(["doc-a-0", "doc-a-1"]);
  });

  it("returns one chunk per document when deduplicating", async () => {
    const { engine, seed } = setup();
    await seed("doc-a", [[1, 0], [0.9, 0.1]]);
    await seed("doc-b", [[0.8, 0.2], [0.7, 0.3]]);

    const result = await engine.retrieve({
      query: "q",
      topK: 2,
      relevanceThreshold: 0.5,
      dedupeByDocument: true,
    });

    expect(result.evidence.map((chunk) => chunk.key)).toEqual(["doc-a-0", "doc-b-0"]);
  });

  it("returns an empty result when nothing is indexed", async () => {
    const { engine, embedBatch } = setup();

    const result = await engine.retrieve({ query: "anything", topK: 3, relevanceThreshold: 0.5 });

    expect(result).toEqual({
      query: "anything",
      evidence: [],
      timings: { embeddingMs: 0, searchMs: 0 },
    });
    expect(embedBatch).not.toHaveBeenCalled();
  });

  it("reports how long embedding and search took", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const { engine, seed, embedBatch, vectorIndex } = setup();
    await seed("doc-a", [[1, 0]]);
    embedBatch.mockImplementationOnce(async (texts) => {
      vi.setSystemTime(Date.now() + 25);
      return texts.map(() => [1, 0]);
    });
    const search = vectorIndex.search.bind(vectorIndex);
    vi.spyOn(vectorIndex, "search").mockImplementationOnce(async (input) => {
      vi.setSystemTime(Date.now() + 7);
      return search(input);
    });

    const result = await engine.retrieve({ query: "q", topK: 1, relevanceThreshold: 0 });

    expect(result.evidence.map((chunk) => chunk.key)).toEqual(["doc-a-0"]);
    expect(result.timings).toEqual({ embeddingMs: 25, searchMs: 7 });
  });
});
