import { describeError } from "../domain/errors.js";
import { IndexPoint } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { Logger, NullLogger } from "../utils/logger.js";

export interface UpsertScope {
  upsert(points: IndexPoint[]): Promise<void>;
  /** Marks the written points as final; without it the scope removes them on exit. */
  commit(): void;
  readonly writtenCount: number;
}

export interface UpsertScopeOptions {
  documentId: string;
  /** Rollback removes only points carrying this content hash. */
  contentHash: string;
  /**
   * Asked before compensating. `true` means another delivery already
   * committed the same content, so the points are live and must stay.
   */
  isCommittedElsewhere?: () => Promise<boolean>;
  logger?: Logger;
}

/**
 * Runs `work` with a scope whose upserts are rolled back unless `commit()`
 * was called before `work` settles. The original error is rethrown even
 * when the rollback itself fails.
 */
export async function withUpsertScope<T>(
  index: VectorIndex,
  options: UpsertScopeOptions,
  work: (scope: UpsertScope) => Promise<T>,
): Promise<T> {
  const logger = options.logger ?? new NullLogger();
  let committed = false;
  let writtenCount = 0;

  const scope: UpsertScope = {
    async upsert(points) {
      if (committed) {
        throw new Error("Upsert scope is already committed.");
      }
      await index.upsert(points);
      writtenCount += points.length;
    },
    commit() {
      committed = true;
    },
    get writtenCount() {
      return writtenCount;
    },
  };

  try {
    const result = await work(scope);
    if (!committed) {
      await rollback(index, options, logger);
    }
    return result;
  } catch (error) {
    if (!committed) {
      await rollback(index, options, logger, error);
    }
    throw error;
  }
}

async function rollback(
  index: VectorIndex,
  options: UpsertScopeOptions,
  logger: Logger,
  cause?: unknown,
): Promise<void> {
  const { documentId, contentHash } = options;
  try {
    if (options.isCommittedElsewhere && (await options.isCommittedElsewhere())) {
      logger.info("Skipped rollback of chunks committed by another delivery", {
        documentId,
        contentHash,
      });
      return;
    }
    const removed = await index.deleteByDocument(documentId, { contentHash });
    logger.info("Rolled back uncommitted chunks", { documentId, removed });
  } catch (rollbackError) {
    if (cause === undefined) {
      throw rollbackError;
    }
    logger.error("Rollback of uncommitted chunks failed", {
      documentId,
      error: describeError(rollbackError),
      cause: describeError(cause),
    });
  }
}
