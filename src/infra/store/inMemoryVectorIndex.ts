import { ContractViolationError } from "../../domain/errors.js";
import { IndexPoint, VectorSearchHit } from "../../domain/types.js";
import {
  DeleteByDocumentOptions,
  VectorIndex,
  VectorSearchInput,
  compareHits,
} from "../../domain/vectorIndex.js";
import { cosineSimilarity, hasDimension } from "../../utils/vector.js";

export class InMemoryVectorIndex implements VectorIndex {
  private readonly points = new Map<string, IndexPoint>();

  constructor(private readonly dimension: number) {}

  async upsert(points: IndexPoint[]): Promise<void> {
    for (const point of points) {
      this.assertDimension(point.vector, `point ${point.key}`);
    }
    for (const point of points) {
      this.points.set(point.key, {
        key: point.key,
        vector: [...point.vector],
        payload: { ...point.payload, metadata: { ...point.payload.metadata } },
      });
    }
  }

  async deleteByDocument(
    documentId: string,
    options: DeleteByDocumentOptions = {},
  ): Promise<number> {
    let removed = 0;
    for (const [key, point] of this.points) {
      if (point.payload.documentId !== documentId) {
        continue;
      }
      if (
        options.exceptContentHash !== undefined &&
        point.payload.contentHash === options.exceptContentHash
      ) {
        continue;
      }
      if (options.contentHash !== undefined && point.payload.contentHash !== options.contentHash) {
        continue;
      }
      this.points.delete(key);
      removed += 1;
    }
    return removed;
  }

  async search(input: VectorSearchInput): Promise<VectorSearchHit[]> {
    input.signal?.throwIfAborted();
    this.assertDimension(input.vector, "query vector");

    const allowed = input.filter?.documentIds ? new Set(input.filter.documentIds) : null;
    const hits: VectorSearchHit[] = [];
    for (const point of this.points.values()) {
      if (allowed && !allowed.has(point.payload.documentId)) {
        continue;
      }
      hits.push({
        key: point.key,
        score: cosineSimilarity(input.vector, point.vector),
        payload: point.payload,
      });
    }

    return hits.sort(compareHits).slice(0, Math.max(0, input.topK));
  }

  async listDocumentIds(): Promise<string[]> {
    const ids = new Set<string>();
    for (const point of this.points.values()) {
      ids.add(point.payload.documentId);
    }
    return [...ids].sort();
  }

  async countPoints(documentId?: string): Promise<number> {
    if (documentId === undefined) {
      return this.points.size;
    }
    let count = 0;
    for (const point of this.points.values()) {
      if (point.payload.documentId === documentId) {
        count += 1;
      }
    }
    return count;
  }

  listKeys(documentId?: string): string[] {
    return [...this.points.values()]
      .filter((point) => documentId === undefined || point.payload.documentId === documentId)
      .map((point) => point.key)
      .sort();
  }

  private assertDimension(vector: number[], label: string): void {
    if (!hasDimension(vector, this.dimension)) {
      throw new ContractViolationError(
        `Vector for ${label} has dimension ${vector.length}, index expects ${this.dimension}.`,
      );
    }
  }
}
