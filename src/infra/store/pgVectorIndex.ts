import { Pool, PoolClient } from "pg";
import { ContractViolationError } from "../../domain/errors.js";
import { IndexPoint, VectorSearchHit } from "../../domain/types.js";
import {
  DeleteByDocumentOptions,
  VectorIndex,
  VectorSearchInput,
  compareHits,
} from "../../domain/vectorIndex.js";
import { Logger } from "../../utils/logger.js";
import { withTransaction } from "../db/postgres.js";
import { hasDimension, toVectorLiteral } from "../../utils/vector.js";

interface PgChunkVectorRow {
  key: string;
  document_id: string;
  sequence_index: number;
  content_hash: string;
  span_start: number;
  span_end: number;
  content: string;
  metadata: Record<string, string> | null;
  score: number;
}

export class PgVectorIndex implements VectorIndex {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
    private readonly logger?: Logger,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chunk_vectors (
        key TEXT PRIMARY KEY,
        document_id TEXT NOT NULL,
        sequence_index INTEGER NOT NULL,
        content_hash TEXT NOT NULL,
        span_start INTEGER NOT NULL,
        span_end INTEGER NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        embedding VECTOR(${this.vectorDimension}) NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_chunk_vectors_document_id ON chunk_vectors(document_id)`,
    );
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_chunk_vectors_embedding
      ON chunk_vectors USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async upsert(points: IndexPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }
    for (const point of points) {
      this.assertDimension(point.vector, `point ${point.key}`);
    }
    await this.initialize();

    await this.transaction(async (client) => {
      for (const point of points) {
        await client.query(
          `
            INSERT INTO chunk_vectors
              (key, document_id, sequence_index, content_hash, span_start, span_end, content, metadata, embedding)
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::vector)
            ON CONFLICT (key) DO UPDATE SET
              document_id = EXCLUDED.document_id,
              sequence_index = EXCLUDED.sequence_index,
              content_hash = EXCLUDED.content_hash,
              span_start = EXCLUDED.span_start,
              span_end = EXCLUDED.span_end,
              content = EXCLUDED.content,
              metadata = EXCLUDED.metadata,
              embedding = EXCLUDED.embedding
          `,
          [
            point.key,
            point.payload.documentId,
            point.payload.sequenceIndex,
            point.payload.contentHash,
            point.payload.start,
            point.payload.end,
            point.payload.text,
            JSON.stringify(point.payload.metadata),
            toVectorLiteral(point.vector),
          ],
        );
      }
    });
  }

  async deleteByDocument(
    documentId: string,
    options: DeleteByDocumentOptions = {},
  ): Promise<number> {
    await this.initialize();
    const result = await this.pool.query(
      `
        DELETE FROM chunk_vectors
        WHERE document_id = $1
          AND ($2::text IS NULL OR content_hash <> $2::text)
          AND ($3::text IS NULL OR content_hash = $3::text)
      `,
      [documentId, options.exceptContentHash ?? null, options.contentHash ?? null],
    );
    return result.rowCount ?? 0;
  }

  async search(input: VectorSearchInput): Promise<VectorSearchHit[]> {
    input.signal?.throwIfAborted();
    this.assertDimension(input.vector, "query vector");
    await this.initialize();

    const result = await this.pool.query<PgChunkVectorRow>(
      `
        SELECT
          key,
          document_id,
          sequence_index,
          content_hash,
          span_start,
          span_end,
          content,
          metadata,
          (1 - (embedding <=> $1::vector)) AS score
        FROM chunk_vectors
        WHERE ($2::text[] IS NULL OR document_id = ANY($2::text[]))
        ORDER BY embedding <=> $1::vector, document_id ASC, sequence_index ASC
        LIMIT $3
      `,
      [toVectorLiteral(input.vector), input.filter?.documentIds ?? null, input.topK],
    );
    input.signal?.throwIfAborted();

    return result.rows
      .map((row) => ({
        key: row.key,
        score: Number(row.score),
        payload: {
          documentId: row.document_id,
          sequenceIndex: row.sequence_index,
          contentHash: row.content_hash,
          start: row.span_start,
          end: row.span_end,
          text: row.content,
          metadata: row.metadata ?? {},
        },
      }))
      .sort(compareHits);
  }

  async listDocumentIds(): Promise<string[]> {
    await this.initialize();
    const result = await this.pool.query<{ document_id: string }>(
      `SELECT DISTINCT document_id FROM chunk_vectors ORDER BY document_id ASC`,
    );
    return result.rows.map((row) => row.document_id);
  }

  async countPoints(documentId?: string): Promise<number> {
    await this.initialize();
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM chunk_vectors WHERE ($1::text IS NULL OR document_id = $1::text)`,
      [documentId ?? null],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  private assertDimension(vector: number[], label: string): void {
    if (!hasDimension(vector, this.vectorDimension)) {
      throw new ContractViolationError(
        `Vector for ${label} has dimension ${vector.length}, index expects ${this.vectorDimension}.`,
      );
    }
  }

  private transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, work, this.logger);
  }
}
