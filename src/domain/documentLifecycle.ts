import { InvalidStatusTransitionError } from "./errors.js";
import { DocumentStatus } from "./types.js";

const ALLOWED_TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  // -> pending: new content was ingested; the job in flight for the old hash is skipped.
  pending: ["pending", "indexing", "failed"],
  // indexing -> indexing: a redelivered job picks up a document whose worker crashed.
  indexing: ["indexing", "ready", "failed", "pending"],
  // ready -> ready: a duplicate delivery commits the same content hash again.
  // There is no ready -> indexing; a job for committed content is skipped.
  ready: ["pending", "ready"],
  failed: ["indexing", "pending", "failed"],
};

export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: DocumentStatus, to: DocumentStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidStatusTransitionError(from, to);
  }
}
