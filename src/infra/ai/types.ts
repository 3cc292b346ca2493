/**
 * Embedding capability. Implementations return one vector per input, in input
 * order, and throw `TransientUpstreamError` for rate limits and timeouts and
 * `FatalUpstreamError` for everything that retrying will not fix.
 */
export interface EmbeddingProvider {
  readonly name: string;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface ConversationMessage {
  role: "user" | "assistant";
  content: string;
}

export interface GenerationRequest {
  question: string;
  context: string;
  /** Earlier turns supplied by the caller, oldest first. Nothing is stored server-side. */
  history?: ConversationMessage[];
}

export interface GenerationProvider {
  readonly name: string;
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}
