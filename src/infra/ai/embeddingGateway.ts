import {
  EmbeddingContractViolationError,
  EmbeddingUnavailableError,
  TransientUpstreamError,
  describeError,
} from "../../domain/errors.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { Logger, NullLogger } from "../../utils/logger.js";
import { RetryPolicy } from "../../utils/retry.js";
import { hasDimension } from "../../utils/vector.js";
import { EmbeddingProvider } from "./types.js";

export interface EmbeddingGatewayOptions {
  dimension: number;
  batchSize: number;
  concurrency: number;
  retryPolicy: RetryPolicy;
  logger?: Logger;
}

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * Order-preserving, all-or-nothing embedding over a provider. Batches run
 * with bounded parallelism; a batch that still fails after the retry policy
 * fails the whole call and aborts its siblings.
 */
export class EmbeddingGateway {
  private readonly logger: Logger;

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingGatewayOptions,
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new RangeError("batchSize must be a positive integer.");
    }
    this.logger = options.logger ?? new NullLogger();
  }

  get dimension(): number {
    return this.options.dimension;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      batches.push(texts.slice(i, i + this.options.batchSize));
    }

    const results = await mapWithConcurrency(
      batches,
      this.options.concurrency,
      (batch, batchIndex, signal) => this.embedBatch(batch, batchIndex, signal),
      options.signal,
    );
    return results.flat();
  }

  async embedOne(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embed([text], options);
    return vector;
  }

  private async embedBatch(
    batch: string[],
    batchIndex: number,
    signal: AbortSignal,
  ): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.options.retryPolicy.execute(
        () => this.provider.embedBatch(batch, signal),
        {
          signal,
          isRetryable: (error) => error instanceof TransientUpstreamError,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn("Embedding batch failed, retrying", {
              provider: this.provider.name,
              batchIndex,
              attempt,
              delayMs,
              error: describeError(error),
            });
          },
        },
      );
    } catch (error) {
      if (error instanceof TransientUpstreamError) {
        throw new EmbeddingUnavailableError(
          `Embedding provider ${this.provider.name} unavailable after ${this.options.retryPolicy.maxAttempts} attempt(s): ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }

    this.validate(batch, vectors);
    return vectors;
  }

  private validate(batch: string[], vectors: number[][]): void {
    if (vectors.length !== batch.length) {
      throw new EmbeddingContractViolationError(
        `Embedding count mismatch: expected ${batch.length}, received ${vectors.length}.`,
      );
    }
    for (let i = 0; i < vectors.length; i += 1) {
      if (!hasDimension(vectors[i], this.options.dimension)) {
        throw new EmbeddingContractViolationError(
          `Embedding ${i} has dimension ${vectors[i].length}, expected ${this.options.dimension}.`,
        );
      }
    }
  }
}
