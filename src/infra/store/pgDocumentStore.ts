import { Pool, PoolClient } from "pg";
import { assertTransition } from "../../domain/documentLifecycle.js";
import {
  CreateDocumentInput,
  DocumentStore,
  ListDocumentsInput,
  StatusUpdate,
} from "../../domain/documentStore.js";
import { ContentSupersededError, DocumentNotFoundError } from "../../domain/errors.js";
import { DocumentRecord, DocumentStatus } from "../../domain/types.js";
import { Logger } from "../../utils/logger.js";
import { withTransaction } from "../db/postgres.js";

interface PgDocumentRow {
  id: string;
  source: string;
  text: string;
  content_hash: string;
  status: DocumentStatus;
  chunk_count: number;
  indexed_content_hash: string | null;
  failure_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

const DOCUMENT_COLUMNS = `
  id, source, text, content_hash, status, chunk_count,
  indexed_content_hash, failure_reason, created_at, updated_at
`;

export class PgDocumentStore implements DocumentStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly logger?: Logger,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS documents (
        id TEXT PRIMARY KEY,
        source TEXT NOT NULL,
        text TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('pending', 'indexing', 'ready', 'failed')),
        chunk_count INTEGER NOT NULL DEFAULT 0,
        indexed_content_hash TEXT,
        failure_reason TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(status)`,
    );

    this.initialized = true;
  }

  async create(input: CreateDocumentInput): Promise<DocumentRecord> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(
      `
        INSERT INTO documents (id, source, text, content_hash, status)
        VALUES ($1, $2, $3, $4, 'pending')
        RETURNING ${DOCUMENT_COLUMNS}
      `,
      [input.id, input.source, input.text, input.contentHash],
    );
    return toRecord(result.rows[0]);
  }

  async get(id: string): Promise<DocumentRecord | null> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? toRecord(result.rows[0]) : null;
  }

  async list(input: ListDocumentsInput = {}): Promise<DocumentRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(
      `
        SELECT ${DOCUMENT_COLUMNS}
        FROM documents
        WHERE ($1::text IS NULL OR status = $1::text)
        ORDER BY created_at ASC, id ASC
      `,
      [input.status ?? null],
    );
    return result.rows.map(toRecord);
  }

  async replaceContent(id: string, text: string, contentHash: string): Promise<DocumentRecord> {
    await this.initialize();
    return this.transaction(async (client) => {
      const current = await client.query<PgDocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1 FOR UPDATE`,
        [id],
      );
      if (!current.rows[0]) {
        throw new DocumentNotFoundError(id);
      }
      assertTransition(current.rows[0].status, "pending");

      const updated = await client.query<PgDocumentRow>(
        `
          UPDATE documents
          SET text = $2, content_hash = $3, status = 'pending', failure_reason = NULL, updated_at = NOW()
          WHERE id = $1
          RETURNING ${DOCUMENT_COLUMNS}
        `,
        [id, text, contentHash],
      );
      return toRecord(updated.rows[0]);
    });
  }

  async updateStatus(id: string, update: StatusUpdate): Promise<DocumentRecord> {
    await this.initialize();
    return this.transaction(async (client) => {
      const current = await client.query<PgDocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1 FOR UPDATE`,
        [id],
      );
      const row = current.rows[0];
      if (!row) {
        throw new DocumentNotFoundError(id);
      }
      if (
        update.expectedContentHash !== undefined &&
        row.content_hash !== update.expectedContentHash
      ) {
        throw new ContentSupersededError(id, update.expectedContentHash);
      }
      assertTransition(row.status, update.status);

      const updated = await client.query<PgDocumentRow>(
        `
          UPDATE documents
          SET status = $2,
              chunk_count = $3,
              indexed_content_hash = $4,
              failure_reason = $5,
              updated_at = NOW()
          WHERE id = $1
          RETURNING ${DOCUMENT_COLUMNS}
        `,
        [
          id,
          update.status,
          update.chunkCount ?? row.chunk_count,
          update.indexedContentHash !== undefined
            ? update.indexedContentHash
            : row.indexed_content_hash,
          update.failureReason !== undefined ? update.failureReason : row.failure_reason,
        ],
      );
      return toRecord(updated.rows[0]);
    });
  }

  async delete(id: string): Promise<boolean> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM documents WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  private transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, work, this.logger);
  }
}

function toRecord(row: PgDocumentRow): DocumentRecord {
  return {
    id: row.id,
    source: row.source,
    text: row.text,
    contentHash: row.content_hash,
    status: row.status,
    chunkCount: row.chunk_count,
    indexedContentHash: row.indexed_content_hash,
    failureReason: row.failure_reason,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}
