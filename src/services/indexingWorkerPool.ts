import { setTimeout as delay } from "node:timers/promises";
import { describeError } from "../domain/errors.js";
import { IndexingOutcome, IndexingPipeline } from "../pipelines/indexing.js";
import { Logger, NullLogger } from "../utils/logger.js";

export interface IndexingWorkerPoolOptions {
  concurrency: number;
  pollIntervalMs: number;
  logger?: Logger;
  onOutcome?: (outcome: IndexingOutcome) => void;
}

/**
 * Runs `concurrency` independent receive/process loops. `stop()` lets every
 * loop finish the job it holds; an indexing job is never abandoned halfway.
 */
export class IndexingWorkerPool {
  private readonly logger: Logger;

  private readonly loops: Promise<void>[] = [];

  private readonly stopController = new AbortController();

  private running = false;

  constructor(
    private readonly pipeline: IndexingPipeline,
    private readonly options: IndexingWorkerPoolOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError("concurrency must be a positive integer.");
    }
    this.logger = options.logger ?? new NullLogger();
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (let worker = 0; worker < this.options.concurrency; worker += 1) {
      this.loops.push(this.runLoop(worker));
    }
    this.logger.info("Indexing workers started", { concurrency: this.options.concurrency });
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.stopController.abort();
    await Promise.all(this.loops);
    this.loops.length = 0;
    this.logger.info("Indexing workers stopped");
  }

  private async runLoop(worker: number): Promise<void> {
    while (this.running) {
      let outcome: IndexingOutcome | null = null;
      try {
        outcome = await this.pipeline.processNext();
      } catch (error) {
        // The message stays in flight and is redelivered after the visibility timeout.
        this.logger.error("Indexing worker iteration failed", {
          worker,
          error: describeError(error),
        });
      }

      if (outcome) {
        this.options.onOutcome?.(outcome);
        continue;
      }
      await this.idle();
    }
  }

  private async idle(): Promise<void> {
    try {
      await delay(this.options.pollIntervalMs, undefined, {
        signal: this.stopController.signal,
      });
    } catch (error) {
      if (!this.stopController.signal.aborted) {
        throw error;
      }
    }
  }
}
