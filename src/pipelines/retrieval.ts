import { DocumentStore } from "../domain/documentStore.js";
import { DocumentRecord, RetrievalResult, RetrievedChunk } from "../domain/types.js";
import { VectorIndex, compareHits } from "../domain/vectorIndex.js";
import { EmbeddingGateway } from "../infra/ai/embeddingGateway.js";
import { Logger, NullLogger } from "../utils/logger.js";

export interface RetrieveInput {
  query: string;
  /** Restricts the search to these documents; non-ready ones are ignored. */
  documentScope?: string[];
  topK: number;
  relevanceThreshold: number;
  dedupeByDocument?: boolean;
  signal?: AbortSignal;
}

// Deduplication drops hits after ranking, so it searches a wider pool first.
const DEDUPE_CANDIDATE_FACTOR = 4;

export class RetrievalEngine {
  private readonly logger: Logger;

  constructor(
    private readonly documents: DocumentStore,
    private readonly vectorIndex: VectorIndex,
    private readonly embeddings: EmbeddingGateway,
    logger?: Logger,
  ) {
    this.logger = logger ?? new NullLogger();
  }

  async retrieve(input: RetrieveInput): Promise<RetrievalResult> {
    const query = input.query.trim();
    const readyDocuments = await this.resolveScope(input.documentScope);
    if (!query || readyDocuments.size === 0 || input.topK < 1) {
      return { query, evidence: [], timings: { embeddingMs: 0, searchMs: 0 } };
    }

    const embeddingStartedAt = Date.now();
    const vector = await this.embeddings.embedOne(query, { signal: input.signal });
    const searchStartedAt = Date.now();
    const candidateCount = input.dedupeByDocument
      ? input.topK * DEDUPE_CANDIDATE_FACTOR
      : input.topK;
    const hits = await this.vectorIndex.search({
      vector,
      filter: { documentIds: [...readyDocuments.keys()] },
      topK: candidateCount,
      signal: input.signal,
    });
    const timings = {
      embeddingMs: searchStartedAt - embeddingStartedAt,
      searchMs: Date.now() - searchStartedAt,
    };

    const seenDocuments = new Set<string>();
    const evidence: RetrievedChunk[] = [];
    for (const hit of [...hits].sort(compareHits)) {
      const document = readyDocuments.get(hit.payload.documentId);
      // Chunks left over from earlier content of a re-ingested document.
      if (!document || hit.payload.contentHash !== document.indexedContentHash) {
        continue;
      }
      if (hit.score < input.relevanceThreshold) {
        continue;
      }
      if (input.dedupeByDocument) {
        if (seenDocuments.has(document.id)) {
          continue;
        }
        seenDocuments.add(document.id);
      }

      evidence.push({
        key: hit.key,
        documentId: document.id,
        sequenceIndex: hit.payload.sequenceIndex,
        text: hit.payload.text,
        score: hit.score,
        source: document.source,
      });
      if (evidence.length >= input.topK) {
        break;
      }
    }

    this.logger.debug("Retrieved evidence", {
      candidates: hits.length,
      returned: evidence.length,
      threshold: input.relevanceThreshold,
      ...timings,
    });
    return { query, evidence, timings };
  }

  private async resolveScope(scope?: string[]): Promise<Map<string, DocumentRecord>> {
    const ready = await this.documents.list({ status: "ready" });
    const allowed = scope ? new Set(scope) : null;
    const result = new Map<string, DocumentRecord>();
    for (const document of ready) {
      if (!allowed || allowed.has(document.id)) {
        result.set(document.id, document);
      }
    }
    return result;
  }
}
