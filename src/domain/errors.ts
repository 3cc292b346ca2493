export type ErrorCode =
  | "TransientUpstream"
  | "FatalUpstream"
  | "EmbeddingUnavailable"
  | "GenerationUnavailable"
  | "ContractViolation"
  | "EmptyDocument"
  | "MaxRetriesExceeded"
  | "InvalidStatusTransition"
  | "DocumentNotFound"
  | "Superseded"
  | "QueryFailed";

/**
 * Base class for every error the pipeline classifies. `code` is stable and
 * is what gets written to a document's failure reason.
 */
export class AppError extends Error {
  readonly code: ErrorCode;

  readonly isFatal: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options: { cause?: unknown; isFatal?: boolean } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "AppError";
    this.code = code;
    this.isFatal = options.isFatal ?? false;
  }
}

/** Rate limit, timeout or 5xx from an upstream model service. */
export class TransientUpstreamError extends AppError {
  constructor(
    message: string,
    readonly status: number | null = null,
    options: { cause?: unknown } = {},
  ) {
    super("TransientUpstream", message, options);
    this.name = "TransientUpstreamError";
  }
}

export class FatalUpstreamError extends AppError {
  constructor(
    message: string,
    readonly status: number | null = null,
    options: { cause?: unknown } = {},
  ) {
    super("FatalUpstream", message, { ...options, isFatal: true });
    this.name = "FatalUpstreamError";
  }
}

export class EmbeddingUnavailableError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("EmbeddingUnavailable", message, options);
    this.name = "EmbeddingUnavailableError";
  }
}

export class GenerationUnavailableError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("GenerationUnavailable", message, options);
    this.name = "GenerationUnavailableError";
  }
}

export class ContractViolationError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("ContractViolation", message, { ...options, isFatal: true });
    this.name = "ContractViolationError";
  }
}

export class EmbeddingContractViolationError extends ContractViolationError {
  constructor(message: string) {
    super(message);
    this.name = "EmbeddingContractViolationError";
  }
}

export class EmptyDocumentError extends AppError {
  constructor(message = "Document has no extractable text.") {
    super("EmptyDocument", message, { isFatal: true });
    this.name = "EmptyDocumentError";
  }
}

export class MaxRetriesExceededError extends AppError {
  constructor(
    readonly attempts: number,
    options: { cause?: unknown } = {},
  ) {
    super("MaxRetriesExceeded", `Gave up after ${attempts} delivery attempt(s).`, {
      ...options,
      isFatal: true,
    });
    this.name = "MaxRetriesExceededError";
  }
}

export class InvalidStatusTransitionError extends AppError {
  constructor(from: string, to: string) {
    super("InvalidStatusTransition", `Invalid document status transition: ${from} -> ${to}`, {
      isFatal: true,
    });
    this.name = "InvalidStatusTransitionError";
  }
}

export class DocumentNotFoundError extends AppError {
  constructor(readonly documentId: string) {
    super("DocumentNotFound", `Document not found: ${documentId}`);
    this.name = "DocumentNotFoundError";
  }
}

/** A status write was conditioned on a content hash the document no longer has. */
export class ContentSupersededError extends AppError {
  constructor(
    readonly documentId: string,
    readonly expectedContentHash: string,
  ) {
    super("Superseded", `Document ${documentId} no longer has content ${expectedContentHash}.`);
    this.name = "ContentSupersededError";
  }
}

/** Infrastructure failure on the query path, as opposed to an ungrounded answer. */
export class QueryFailedError extends AppError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super("QueryFailed", message, options);
    this.name = "QueryFailedError";
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
