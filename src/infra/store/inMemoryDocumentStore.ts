import { assertTransition } from "../../domain/documentLifecycle.js";
import {
  CreateDocumentInput,
  DocumentStore,
  ListDocumentsInput,
  StatusUpdate,
} from "../../domain/documentStore.js";
import { ContentSupersededError, DocumentNotFoundError } from "../../domain/errors.js";
import { DocumentRecord } from "../../domain/types.js";

export class InMemoryDocumentStore implements DocumentStore {
  private readonly documents = new Map<string, DocumentRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(input: CreateDocumentInput): Promise<DocumentRecord> {
    if (this.documents.has(input.id)) {
      throw new Error(`Document already exists: ${input.id}`);
    }
    const timestamp = this.now().toISOString();
    const record: DocumentRecord = {
      id: input.id,
      source: input.source,
      text: input.text,
      contentHash: input.contentHash,
      status: "pending",
      chunkCount: 0,
      indexedContentHash: null,
      failureReason: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.documents.set(record.id, record);
    return { ...record };
  }

  async get(id: string): Promise<DocumentRecord | null> {
    const record = this.documents.get(id);
    return record ? { ...record } : null;
  }

  async list(input: ListDocumentsInput = {}): Promise<DocumentRecord[]> {
    return [...this.documents.values()]
      .filter((record) => !input.status || record.status === input.status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id))
      .map((record) => ({ ...record }));
  }

  async replaceContent(id: string, text: string, contentHash: string): Promise<DocumentRecord> {
    const current = this.require(id);
    assertTransition(current.status, "pending");
    const next: DocumentRecord = {
      ...current,
      text,
      contentHash,
      status: "pending",
      failureReason: null,
      updatedAt: this.now().toISOString(),
    };
    this.documents.set(id, next);
    return { ...next };
  }

  async updateStatus(id: string, update: StatusUpdate): Promise<DocumentRecord> {
    const current = this.require(id);
    if (
      update.expectedContentHash !== undefined &&
      current.contentHash !== update.expectedContentHash
    ) {
      throw new ContentSupersededError(id, update.expectedContentHash);
    }
    assertTransition(current.status, update.status);
    const next: DocumentRecord = {
      ...current,
      status: update.status,
      chunkCount: update.chunkCount ?? current.chunkCount,
      indexedContentHash:
        update.indexedContentHash !== undefined
          ? update.indexedContentHash
          : current.indexedContentHash,
      failureReason:
        update.failureReason !== undefined ? update.failureReason : current.failureReason,
      updatedAt: this.now().toISOString(),
    };
    this.documents.set(id, next);
    return { ...next };
  }

  async delete(id: string): Promise<boolean> {
    return this.documents.delete(id);
  }

  private require(id: string): DocumentRecord {
    const record = this.documents.get(id);
    if (!record) {
      throw new DocumentNotFoundError(id);
    }
    return record;
  }
}
