import { DocumentRecord, DocumentStatus, FailureReason } from "./types.js";

export interface CreateDocumentInput {
  id: string;
  source: string;
  text: string;
  contentHash: string;
}

export interface ListDocumentsInput {
  status?: DocumentStatus;
}

export interface StatusUpdate {
  status: DocumentStatus;
  chunkCount?: number;
  indexedContentHash?: string | null;
  failureReason?: FailureReason | null;
  /** Apply only while the document still holds this content; otherwise `ContentSupersededError`. */
  expectedContentHash?: string;
}

export interface DocumentStore {
  create(input: CreateDocumentInput): Promise<DocumentRecord>;
  get(id: string): Promise<DocumentRecord | null>;
  list(input?: ListDocumentsInput): Promise<DocumentRecord[]>;
  /** Stores new content and resets the document to `pending`. */
  replaceContent(id: string, text: string, contentHash: string): Promise<DocumentRecord>;
  /**
   * Applies a lifecycle transition under the record's lock. Throws
   * `DocumentNotFoundError`, `ContentSupersededError` or
   * `InvalidStatusTransitionError`, checked in that order.
   */
  updateStatus(id: string, update: StatusUpdate): Promise<DocumentRecord>;
  delete(id: string): Promise<boolean>;
}
