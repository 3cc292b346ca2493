import { describe, expect, it, vi } from "vitest";
import {
  EmbeddingContractViolationError,
  EmbeddingUnavailableError,
  FatalUpstreamError,
  TransientUpstreamError,
} from "../src/domain/errors.js";
import { EmbeddingGateway } from "../src/infra/ai/embeddingGateway.js";
import { EmbeddingProvider } from "../src/infra/ai/types.js";
import { instantRetryPolicy } from "./helpers/fakes.js";

function lengthProvider() {
  const embedBatch = vi.fn(async (texts: string[]) => texts.map((text) => [text.length, 1]));
  const provider: EmbeddingProvider = { name: "length", embedBatch };
  return { provider, embedBatch };
}

describe("EmbeddingGateway", () => {
  it("batches requests and keeps input order", async () => {
    const { provider, embedBatch } = lengthProvider();
    const gateway = new EmbeddingGateway(provider, {
      dimension: 2,
      batchSize: 2,
      concurrency: 3,
      retryPolicy: instantRetryPolicy(),
    });

    const vectors = await gateway.embed(["a", "bb", "ccc", "dddd", "eeeee"]);

    expect(vectors).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 1],
      [5, 1],
    ]);
    expect(embedBatch).toHaveBeenCalledTimes(3);
    expect(embedBatch.mock.calls.map((call) => call[0])).toEqual([
      ["a", "bb"],
      ["ccc", "dddd"],
      ["eeeee"],
    ]);
  });

  it("returns an empty list without calling the provider", async () => {
    const { provider, embedBatch } = lengthProvider();
    const gateway = new EmbeddingGateway(provider, {
      dimension: 2,
      batchSize: 4,
      concurrency: 1,
      retryPolicy: instantRetryPolicy(),
    });

    await expect(gateway.embed([])).resolves.toEqual([]);
    expect(embedBatch).not.toHaveBeenCalled();
  });

  it("retries transient failures", async () => {
    const embedBatch = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockRejectedValueOnce(new TransientUpstreamError("rate limited", 429))
      .mockResolvedValueOnce([[0.5, 0.5]]);
    const gateway = new EmbeddingGateway(
      { name: "flaky", embedBatch },
      { dimension: 2, batchSize: 4, concurrency: 1, retryPolicy: instantRetryPolicy(3) },
    );

    await expect(gateway.embedOne("hello")).resolves.toEqual([0.5, 0.5]);
    expect(embedBatch).toHaveBeenCalledTimes(2);
  });

  it("gives up with EmbeddingUnavailableError after the retry budget", async () => {
    const embedBatch = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockRejectedValue(new TransientUpstreamError("upstream timeout", 504));
    const gateway = new EmbeddingGateway(
      { name: "down", embedBatch },
      { dimension: 2, batchSize: 4, concurrency: 1, retryPolicy: instantRetryPolicy(3) },
    );

    await expect(gateway.embed(["x"])).rejects.toBeInstanceOf(EmbeddingUnavailableError);
    expect(embedBatch).toHaveBeenCalledTimes(3);
  });

  it("does not retry fatal upstream errors", async () => {
    const embedBatch = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockRejectedValue(new FatalUpstreamError("bad request", 400));
    const gateway = new EmbeddingGateway(
      { name: "strict", embedBatch },
      { dimension: 2, batchSize: 4, concurrency: 1, retryPolicy: instantRetryPolicy(3) },
    );

    await expect(gateway.embed(["x"])).rejects.toBeInstanceOf(FatalUpstreamError);
    expect(embedBatch).toHaveBeenCalledTimes(1);
  });

  it("rejects vectors of the wrong dimension without retrying", async () => {
    const embedBatch = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockResolvedValue([[1, 2, 3]]);
    const gateway = new EmbeddingGateway(
      { name: "wide", embedBatch },
      { dimension: 2, batchSize: 4, concurrency: 1, retryPolicy: instantRetryPolicy(3) },
    );

    await expect(gateway.embed(["x"])).rejects.toBeInstanceOf(EmbeddingContractViolationError);
    expect(embedBatch).toHaveBeenCalledTimes(1);
  });

  it("rejects a response with the wrong number of vectors", async () => {
    const embedBatch = vi
      .fn<(texts: string[]) => Promise<number[][]>>()
      .mockResolvedValue([[1, 2]]);
    const gateway = new EmbeddingGateway(
      { name: "short", embedBatch },
      { dimension: 2, batchSize: 4, concurrency: 1, retryPolicy: instantRetryPolicy() },
    );

    await expect(gateway.embed(["x", "y"])).rejects.toThrow(
      "Embedding count mismatch: expected 2, received 1.",
    );
  });
});
