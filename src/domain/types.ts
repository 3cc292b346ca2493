export type DocumentStatus = "pending" | "indexing" | "ready" | "failed";

export type FailureReason =
  | "EmptyDocument"
  | "ContractViolation"
  | "MaxRetriesExceeded"
  | "TransientUpstream"
  | (string & {});

export interface DocumentRecord {
  id: string;
  source: string;
  text: string;
  contentHash: string;
  status: DocumentStatus;
  chunkCount: number;
  indexedContentHash: string | null;
  failureReason: FailureReason | null;
  createdAt: string;
  updatedAt: string;
}

export interface ChunkDraft {
  sequenceIndex: number;
  start: number;
  end: number;
  text: string;
}

export interface ChunkPayload {
  documentId: string;
  sequenceIndex: number;
  contentHash: string;
  start: number;
  end: number;
  text: string;
  metadata: Record<string, string>;
}

export interface IndexPoint {
  key: string;
  vector: number[];
  payload: ChunkPayload;
}

export interface VectorSearchHit {
  key: string;
  score: number;
  payload: ChunkPayload;
}

export interface RetrievedChunk {
  key: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  score: number;
  source: string;
}

export interface RetrievalTimings {
  embeddingMs: number;
  searchMs: number;
}

export interface RetrievalResult {
  query: string;
  evidence: RetrievedChunk[];
  timings?: RetrievalTimings;
}

export interface Citation {
  chunk_id: string;
  document_id: string;
  chunk_index: number;
  source: string;
  score: number;
  snippet: string;
}

export interface Answer {
  text: string;
  citedChunkKeys: string[];
  citations: Citation[];
  grounded: boolean;
}

export function chunkKey(documentId: string, sequenceIndex: number): string {
  return `${documentId}-${sequenceIndex}`;
}
