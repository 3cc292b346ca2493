import { IndexPoint, VectorSearchHit } from "./types.js";

export interface VectorFilter {
  documentIds?: string[];
}

export interface VectorSearchInput {
  vector: number[];
  filter?: VectorFilter;
  topK: number;
  signal?: AbortSignal;
}

export interface DeleteByDocumentOptions {
  /** Keep points whose payload carries this content hash. */
  exceptContentHash?: string;
  /** Remove only points whose payload carries this content hash. */
  contentHash?: string;
}

export interface VectorIndex {
  upsert(points: IndexPoint[]): Promise<void>;
  deleteByDocument(documentId: string, options?: DeleteByDocumentOptions): Promise<number>;
  search(input: VectorSearchInput): Promise<VectorSearchHit[]>;
  listDocumentIds(): Promise<string[]>;
  countPoints(documentId?: string): Promise<number>;
}

export function compareHits(a: VectorSearchHit, b: VectorSearchHit): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.payload.documentId !== b.payload.documentId) {
    return a.payload.documentId < b.payload.documentId ? -1 : 1;
  }
  return a.payload.sequenceIndex - b.payload.sequenceIndex;
}
