import { randomUUID } from "node:crypto";
import path from "node:path";
import { DocumentStore } from "../domain/documentStore.js";
import { EmptyDocumentError, QueryFailedError, describeError } from "../domain/errors.js";
import { IndexingJob, createIndexingJob } from "../domain/indexingJob.js";
import { DeadLetter, TaskQueue } from "../domain/taskQueue.js";
import { Citation, DocumentRecord, DocumentStatus } from "../domain/types.js";
import { VectorIndex } from "../domain/vectorIndex.js";
import { loadDocumentText } from "../infra/parsers/documentLoader.js";
import { ConversationMessage } from "../infra/ai/types.js";
import { AnswerSynthesizer, toCitation } from "../pipelines/answering.js";
import { RetrievalEngine } from "../pipelines/retrieval.js";
import { Logger, NullLogger } from "../utils/logger.js";
import { hashContent, normalizeText } from "../utils/text.js";

export interface DocumentQaServiceDeps {
  documents: DocumentStore;
  vectorIndex: VectorIndex;
  queue: TaskQueue<IndexingJob>;
  retrieval: RetrievalEngine;
  synthesizer: AnswerSynthesizer;
  logger?: Logger;
}

export interface DocumentQaServiceOptions {
  searchTopK: number;
  searchScoreThreshold: number;
  dedupeByDocument: boolean;
  contextTokenBudget: number;
}

export interface IngestDocumentInput {
  source: string;
  content: string;
  documentId?: string;
}

export interface IngestDocumentResult {
  document_id: string;
  source: string;
  status: DocumentStatus;
  content_hash: string;
  enqueued: boolean;
  job_id: string | null;
}

export interface FailedIngest {
  path: string;
  reason: string;
}

export interface IngestFilesResult {
  ingested: IngestDocumentResult[];
  failed: FailedIngest[];
}

export interface DeleteDocumentResult {
  document_id: string;
  deleted: boolean;
  removed_chunks: number;
}

export interface DocumentSummary {
  document_id: string;
  source: string;
  status: DocumentStatus;
  chunk_count: number;
  content_hash: string;
  failure_reason: string | null;
  created_at: string;
  updated_at: string;
}

export interface QueryInput {
  topK?: number;
  documentIds?: string[];
  signal?: AbortSignal;
}

export interface AskWithCitationsInput extends QueryInput {
  question: string;
  /** Earlier turns of the caller's conversation, oldest first. */
  history?: ConversationMessage[];
}

export interface SearchChunksResult {
  query: string;
  hits: Citation[];
}

export interface AskWithCitationsResult {
  answer: string;
  grounded: boolean;
  cited_chunk_ids: string[];
  citations: Citation[];
  latency_ms: number;
  timings: {
    embedding_ms: number;
    search_ms: number;
    generation_ms: number;
  };
}

export interface ReconcileResult {
  dry_run: boolean;
  orphaned_document_ids: string[];
  removed_chunks: number;
}

/**
 * Facade used by the MCP tools and scripts. Ingest stores the document and
 * enqueues an indexing job; the worker process does the rest.
 */
export class DocumentQaService {
  private readonly logger: Logger;

  constructor(
    private readonly deps: DocumentQaServiceDeps,
    private readonly options: DocumentQaServiceOptions,
  ) {
    this.logger = deps.logger ?? new NullLogger();
  }

  async ingestDocument(input: IngestDocumentInput): Promise<IngestDocumentResult> {
    const text = normalizeText(input.content);
    if (!text) {
      throw new EmptyDocumentError(`Document ${input.source} has no extractable text.`);
    }
    const contentHash = hashContent(text);
    const documentId = input.documentId?.trim() || randomUUID();

    const existing = await this.deps.documents.get(documentId);
    let record: DocumentRecord;
    if (!existing) {
      record = await this.deps.documents.create({
        id: documentId,
        source: input.source,
        text,
        contentHash,
      });
    } else if (existing.contentHash === contentHash && existing.status !== "failed") {
      this.logger.debug("Content unchanged, nothing to index", { documentId });
      return toIngestResult(existing, null);
    } else {
      record = await this.deps.documents.replaceContent(documentId, text, contentHash);
    }

    const jobId = await this.deps.queue.enqueue(createIndexingJob(documentId, contentHash));
    this.logger.info("Document queued for indexing", {
      documentId,
      source: record.source,
      jobId,
    });
    return toIngestResult(record, jobId);
  }

  async ingestFiles(paths: string[]): Promise<IngestFilesResult> {
    const ingested: IngestDocumentResult[] = [];
    const failed: FailedIngest[] = [];

    for (const rawPath of paths) {
      const absolutePath = path.resolve(rawPath);
      try {
        const content = await loadDocumentText(absolutePath);
        ingested.push(await this.ingestDocument({ source: absolutePath, content }));
      } catch (error) {
        failed.push({ path: rawPath, reason: describeError(error) });
      }
    }

    return { ingested, failed };
  }

  /**
   * Removes the document and all of its chunks; unknown ids are a no-op. The
   * record goes first, so a job still in flight fails its conditional commit
   * and rolls its own points back.
   */
  async deleteDocument(documentId: string): Promise<DeleteDocumentResult> {
    const deleted = await this.deps.documents.delete(documentId);
    const removedChunks = await this.deps.vectorIndex.deleteByDocument(documentId);
    if (deleted || removedChunks > 0) {
      this.logger.info("Document deleted", { documentId, removedChunks });
    }
    return { document_id: documentId, deleted, removed_chunks: removedChunks };
  }

  async listDocuments(status?: DocumentStatus): Promise<DocumentSummary[]> {
    const documents = await this.deps.documents.list({ status });
    return documents.map(toSummary);
  }

  async getDocument(documentId: string): Promise<DocumentSummary | null> {
    const document = await this.deps.documents.get(documentId);
    return document ? toSummary(document) : null;
  }

  async searchChunks(input: QueryInput & { query: string }): Promise<SearchChunksResult> {
    const retrieval = await this.runQuery("search", () =>
      this.deps.retrieval.retrieve({
        query: input.query,
        documentScope: input.documentIds,
        topK: input.topK ?? this.options.searchTopK,
        relevanceThreshold: this.options.searchScoreThreshold,
        dedupeByDocument: this.options.dedupeByDocument,
        signal: input.signal,
      }),
    );
    return { query: retrieval.query, hits: retrieval.evidence.map(toCitation) };
  }

  async askWithCitations(input: AskWithCitationsInput): Promise<AskWithCitationsResult> {
    const startedAt = Date.now();
    const { answer, retrieval, generationMs } = await this.runQuery("ask", async () => {
      const retrieved = await this.deps.retrieval.retrieve({
        query: input.question,
        documentScope: input.documentIds,
        topK: input.topK ?? this.options.searchTopK,
        relevanceThreshold: this.options.searchScoreThreshold,
        dedupeByDocument: this.options.dedupeByDocument,
        signal: input.signal,
      });
      const generationStartedAt = Date.now();
      const synthesized = await this.deps.synthesizer.synthesize({
        question: input.question,
        retrieval: retrieved,
        maxContextTokens: this.options.contextTokenBudget,
        history: input.history,
        signal: input.signal,
      });
      return {
        answer: synthesized,
        retrieval: retrieved,
        generationMs: Date.now() - generationStartedAt,
      };
    });

    return {
      answer: answer.text,
      grounded: answer.grounded,
      cited_chunk_ids: answer.citedChunkKeys,
      citations: answer.citations,
      latency_ms: Date.now() - startedAt,
      timings: {
        embedding_ms: retrieval.timings?.embeddingMs ?? 0,
        search_ms: retrieval.timings?.searchMs ?? 0,
        generation_ms: generationMs,
      },
    };
  }

  /** Deletes vectors whose document record no longer exists. */
  async reconcileOrphanedVectors(input: { dryRun?: boolean } = {}): Promise<ReconcileResult> {
    const dryRun = input.dryRun ?? false;
    const orphaned: string[] = [];
    let removed = 0;

    for (const documentId of await this.deps.vectorIndex.listDocumentIds()) {
      if (await this.deps.documents.get(documentId)) {
        continue;
      }
      orphaned.push(documentId);
      removed += dryRun
        ? await this.deps.vectorIndex.countPoints(documentId)
        : await this.deps.vectorIndex.deleteByDocument(documentId);
    }

    this.logger.info(dryRun ? "Orphaned vectors found" : "Orphaned vectors removed", {
      documents: orphaned.length,
      chunks: removed,
    });
    return { dry_run: dryRun, orphaned_document_ids: orphaned, removed_chunks: removed };
  }

  async listDeadLetters(): Promise<DeadLetter<IndexingJob>[]> {
    return this.deps.queue.listDeadLetters();
  }

  private async runQuery<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof QueryFailedError) {
        throw error;
      }
      this.logger.error("Query failed", { operation, error: describeError(error) });
      throw new QueryFailedError(`Query failed: ${describeError(error)}`, { cause: error });
    }
  }
}

function toIngestResult(record: DocumentRecord, jobId: string | null): IngestDocumentResult {
  return {
    document_id: record.id,
    source: record.source,
    status: record.status,
    content_hash: record.contentHash,
    enqueued: jobId !== null,
    job_id: jobId,
  };
}

function toSummary(record: DocumentRecord): DocumentSummary {
  return {
    document_id: record.id,
    source: record.source,
    status: record.status,
    chunk_count: record.chunkCount,
    content_hash: record.contentHash,
    failure_reason: record.failureReason,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}
