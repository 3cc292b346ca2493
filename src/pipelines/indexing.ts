import { canTransition } from "../domain/documentLifecycle.js";
import { DocumentStore } from "../domain/documentStore.js";
import {
  ContentSupersededError,
  DocumentNotFoundError,
  EmptyDocumentError,
  InvalidStatusTransitionError,
  MaxRetriesExceededError,
  describeError,
  isAppError,
} from "../domain/errors.js";
import { IndexingJob, createIndexingJob, indexingJobSchema } from "../domain/indexingJob.js";
import { QueueMessage, TaskQueue } from "../domain/taskQueue.js";
import { DocumentRecord, FailureReason, IndexPoint, chunkKey } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { EmbeddingGateway } from "../infra/ai/embeddingGateway.js";
import { Logger, NullLogger } from "../utils/logger.js";
import { chunkText } from "./chunking.js";
import { withUpsertScope } from "./upsertScope.js";

export type IndexingOutcomeStatus =
  | "indexed"
  | "skipped"
  | "retry_scheduled"
  | "failed"
  | "dead_lettered";

export interface IndexingOutcome {
  status: IndexingOutcomeStatus;
  messageId: string;
  documentId: string | null;
  attempt: number;
  chunkCount: number;
  reason: string | null;
}

export interface IndexingPipelineDeps {
  documents: DocumentStore;
  vectorIndex: VectorIndex;
  embeddings: EmbeddingGateway;
  queue: TaskQueue<IndexingJob>;
  logger?: Logger;
}

export interface IndexingPipelineOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** Deliveries allowed before a job is dead-lettered. */
  maxAttempts: number;
  /** Points per vector index write. */
  upsertBatchSize?: number;
}

const DEFAULT_UPSERT_BATCH_SIZE = 64;

/**
 * Consumes indexing jobs. Every step is keyed by (document id, content hash)
 * so a redelivered job rewrites the same point keys, and a document only
 * becomes `ready` after all of its chunks are stored.
 */
export class IndexingPipeline {
  private readonly logger: Logger;

  private readonly upsertBatchSize: number;

  constructor(
    private readonly deps: IndexingPipelineDeps,
    private readonly options: IndexingPipelineOptions,
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be a positive integer.");
    }
    this.logger = deps.logger ?? new NullLogger();
    this.upsertBatchSize = options.upsertBatchSize ?? DEFAULT_UPSERT_BATCH_SIZE;
  }

  /** Receives and processes one job; `null` when the queue has nothing visible. */
  async processNext(): Promise<IndexingOutcome | null> {
    const message = await this.deps.queue.receive();
    if (!message) {
      return null;
    }
    return this.process(message);
  }

  async process(message: QueueMessage<IndexingJob>): Promise<IndexingOutcome> {
    const parsed = indexingJobSchema.safeParse(message.payload);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => issue.message).join("; ");
      this.logger.error("Malformed indexing job", { messageId: message.id, detail });
      await this.deps.queue.deadLetter(message, `ContractViolation: ${detail}`);
      return outcome(message, null, "dead_lettered", 0, "ContractViolation");
    }

    const job = parsed.data;
    const document = await this.deps.documents.get(job.document_id);
    if (!document) {
      return this.skipDeleted(message, job.document_id);
    }
    const settled = await this.skipIfSettled(message, job.content_hash, document);
    if (settled) {
      return settled;
    }

    if (message.attempt > this.options.maxAttempts) {
      return this.giveUp(message, document, new MaxRetriesExceededError(message.attempt - 1));
    }

    let chunkCount: number;
    try {
      chunkCount = await this.indexDocument(document, message.attempt);
    } catch (error) {
      return this.handleFailure(message, document, error);
    }

    await this.deps.queue.ack(message);
    this.logger.info("Indexed document", {
      documentId: document.id,
      chunkCount,
      attempt: message.attempt,
    });
    return outcome(message, document.id, "indexed", chunkCount, null);
  }

  private async indexDocument(document: DocumentRecord, attempt: number): Promise<number> {
    const { documents, vectorIndex, embeddings } = this.deps;
    const contentHash = document.contentHash;

    await documents.updateStatus(document.id, {
      status: "indexing",
      failureReason: null,
      expectedContentHash: contentHash,
    });
    const stale = await vectorIndex.deleteByDocument(document.id, {
      exceptContentHash: contentHash,
    });
    if (stale > 0) {
      this.logger.debug("Removed chunks of previous content", { documentId: document.id, stale });
    }

    const drafts = chunkText(document.text, this.options.chunkSize, this.options.chunkOverlap);
    this.logger.debug("Chunked document", {
      documentId: document.id,
      chunks: drafts.length,
      attempt,
    });

    return withUpsertScope(
      vectorIndex,
      {
        documentId: document.id,
        contentHash,
        isCommittedElsewhere: async () =>
          isCommitted(await documents.get(document.id), contentHash),
        logger: this.logger,
      },
      async (scope) => {
        const vectors = await embeddings.embed(drafts.map((draft) => draft.text));

        const points: IndexPoint[] = drafts.map((draft, i) => ({
          key: chunkKey(document.id, draft.sequenceIndex),
          vector: vectors[i],
          payload: {
            documentId: document.id,
            sequenceIndex: draft.sequenceIndex,
            contentHash,
            start: draft.start,
            end: draft.end,
            text: draft.text,
            metadata: { source: document.source },
          },
        }));

        for (let i = 0; i < points.length; i += this.upsertBatchSize) {
          await scope.upsert(points.slice(i, i + this.upsertBatchSize));
        }

        // Conditional on the content hash: a job for replaced content must not commit.
        await documents.updateStatus(document.id, {
          status: "ready",
          chunkCount: points.length,
          indexedContentHash: contentHash,
          failureReason: null,
          expectedContentHash: contentHash,
        });
        scope.commit();
        return points.length;
      },
    );
  }

  private async skipDeleted(
    message: QueueMessage<IndexingJob>,
    documentId: string,
  ): Promise<IndexingOutcome> {
    const removed = await this.deps.vectorIndex.deleteByDocument(documentId);
    await this.deps.queue.ack(message);
    this.logger.info("Skipped job for deleted document", { documentId, removed });
    return outcome(message, documentId, "skipped", 0, "DocumentDeleted");
  }

  /**
   * Acks jobs that have nothing left to do because the document was given
   * new content or committed by another delivery of the same job.
   */
  private async skipIfSettled(
    message: QueueMessage<IndexingJob>,
    contentHash: string,
    current: DocumentRecord,
  ): Promise<IndexingOutcome | null> {
    const documentId = current.id;
    if (current.contentHash !== contentHash) {
      await this.deps.queue.ack(message);
      this.logger.info("Skipped superseded job", { documentId });
      await this.requeueIfDamaged(current);
      return outcome(message, documentId, "skipped", 0, "Superseded");
    }
    if (isCommitted(current, contentHash)) {
      await this.deps.queue.ack(message);
      return outcome(message, documentId, "skipped", current.chunkCount, "AlreadyIndexed");
    }
    return null;
  }

  /**
   * Chunk keys do not carry the content hash, so a superseded job can
   * overwrite live points of newer content before its own rollback removes
   * them. A `ready` document missing points is sent through indexing again.
   */
  private async requeueIfDamaged(current: DocumentRecord): Promise<void> {
    if (current.status !== "ready") {
      return;
    }
    const stored = await this.deps.vectorIndex.countPoints(current.id);
    if (stored >= current.chunkCount) {
      return;
    }
    this.logger.warn("Re-queueing document with missing chunks", {
      documentId: current.id,
      stored,
      expected: current.chunkCount,
    });
    try {
      await this.deps.documents.updateStatus(current.id, {
        status: "pending",
        expectedContentHash: current.contentHash,
      });
    } catch (error) {
      if (!isLostRace(error)) {
        throw error;
      }
      this.logger.debug("Document changed before it could be re-queued", {
        documentId: current.id,
        error: describeError(error),
      });
      return;
    }
    await this.deps.queue.enqueue(createIndexingJob(current.id, current.contentHash));
  }

  private async handleFailure(
    message: QueueMessage<IndexingJob>,
    document: DocumentRecord,
    error: unknown,
  ): Promise<IndexingOutcome> {
    const reason = failureReasonOf(error);
    this.logger.warn("Indexing attempt failed", {
      documentId: document.id,
      attempt: message.attempt,
      reason,
      error: describeError(error),
    });

    const current = await this.deps.documents.get(document.id);
    if (!current) {
      return this.skipDeleted(message, document.id);
    }
    const settled = await this.skipIfSettled(message, document.contentHash, current);
    if (settled) {
      return settled;
    }

    if (error instanceof EmptyDocumentError) {
      await this.markFailed(document, reason);
      await this.deps.queue.ack(message);
      return outcome(message, document.id, "failed", 0, reason);
    }

    // Retrying cannot help a fatal error: bad credentials, malformed responses.
    if (isAppError(error) && error.isFatal) {
      await this.markFailed(document, reason);
      await this.deps.queue.deadLetter(message, `${reason}: ${describeError(error)}`);
      return outcome(message, document.id, "dead_lettered", 0, reason);
    }

    if (message.attempt < this.options.maxAttempts) {
      await this.markFailed(document, reason);
      await this.deps.queue.reject(message, `${reason}: ${describeError(error)}`);
      return outcome(message, document.id, "retry_scheduled", 0, reason);
    }

    return this.giveUp(message, document, new MaxRetriesExceededError(message.attempt, { cause: error }));
  }

  private async giveUp(
    message: QueueMessage<IndexingJob>,
    document: DocumentRecord,
    error: MaxRetriesExceededError,
  ): Promise<IndexingOutcome> {
    await this.deps.vectorIndex.deleteByDocument(document.id);
    await this.markFailed(document, error.code);
    await this.deps.queue.deadLetter(message, `${error.code}: ${error.message}`);
    this.logger.error("Indexing job dead-lettered", {
      documentId: document.id,
      attempt: message.attempt,
      cause: describeError(error.cause),
    });
    return outcome(message, document.id, "dead_lettered", 0, error.code);
  }

  /**
   * Re-reads the document first: it may have been deleted, given new content
   * or indexed by a duplicate delivery while this attempt was running.
   */
  private async markFailed(document: DocumentRecord, reason: FailureReason): Promise<void> {
    const current = await this.deps.documents.get(document.id);
    if (
      !current ||
      current.contentHash !== document.contentHash ||
      !canTransition(current.status, "failed")
    ) {
      this.logger.debug("Not marking document failed", { documentId: document.id, reason });
      return;
    }
    try {
      await this.deps.documents.updateStatus(document.id, {
        status: "failed",
        chunkCount: 0,
        indexedContentHash: null,
        failureReason: reason,
        expectedContentHash: document.contentHash,
      });
    } catch (error) {
      if (!isLostRace(error)) {
        throw error;
      }
      this.logger.debug("Document changed before it could be marked failed", {
        documentId: document.id,
        error: describeError(error),
      });
    }
  }
}

function isCommitted(document: DocumentRecord | null, contentHash: string): boolean {
  return document?.status === "ready" && document.indexedContentHash === contentHash;
}

/** Errors a status write raises when another writer changed the document first. */
function isLostRace(error: unknown): boolean {
  return (
    error instanceof DocumentNotFoundError ||
    error instanceof ContentSupersededError ||
    error instanceof InvalidStatusTransitionError
  );
}

function failureReasonOf(error: unknown): FailureReason {
  if (isAppError(error)) {
    return error.code;
  }
  return describeError(error);
}

function outcome(
  message: QueueMessage<IndexingJob>,
  documentId: string | null,
  status: IndexingOutcomeStatus,
  chunkCount: number,
  reason: string | null,
): IndexingOutcome {
  return {
    status,
    messageId: message.id,
    documentId,
    attempt: message.attempt,
    chunkCount,
    reason,
  };
}
