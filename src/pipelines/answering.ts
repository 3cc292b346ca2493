import { GenerationUnavailableError, TransientUpstreamError, describeError } from "../domain/errors.js";
import { Answer, Citation, RetrievalResult, RetrievedChunk } from "../domain/types.js";
import { ConversationMessage, GenerationProvider, GenerationRequest } from "../infra/ai/types.js";
import { Logger, NullLogger } from "../utils/logger.js";
import { RetryPolicy } from "../utils/retry.js";
import { estimateTokens, toSnippet } from "../utils/text.js";

export const INSUFFICIENT_INFORMATION_ANSWER =
  "I don't have enough information to answer this question based on the provided documents.";

export interface SynthesizeInput {
  question: string;
  retrieval: RetrievalResult;
  maxContextTokens: number;
  history?: ConversationMessage[];
  signal?: AbortSignal;
}

export interface AssembledContext {
  text: string;
  included: RetrievedChunk[];
  tokens: number;
}

/**
 * Packs evidence blocks in rank order until the next one would exceed the
 * budget. Chunks are never cut; a block that does not fit ends the context.
 */
export function assembleContext(evidence: RetrievedChunk[], maxTokens: number): AssembledContext {
  const blocks: string[] = [];
  const included: RetrievedChunk[] = [];
  let tokens = 0;

  for (const chunk of evidence) {
    const block = `[${included.length + 1}] ${chunk.key}\n${chunk.text}`;
    const blockTokens = estimateTokens(block);
    if (tokens + blockTokens > maxTokens) {
      break;
    }
    blocks.push(block);
    included.push(chunk);
    tokens += blockTokens;
  }

  return { text: blocks.join("\n\n"), included, tokens };
}

export function toCitation(chunk: RetrievedChunk): Citation {
  return {
    chunk_id: chunk.key,
    document_id: chunk.documentId,
    chunk_index: chunk.sequenceIndex,
    source: chunk.source,
    score: Number(chunk.score.toFixed(4)),
    snippet: toSnippet(chunk.text),
  };
}

export class AnswerSynthesizer {
  private readonly logger: Logger;

  constructor(
    private readonly generator: GenerationProvider,
    private readonly retryPolicy: RetryPolicy,
    logger?: Logger,
  ) {
    this.logger = logger ?? new NullLogger();
  }

  async synthesize(input: SynthesizeInput): Promise<Answer> {
    if (input.retrieval.evidence.length === 0) {
      return insufficientAnswer();
    }

    const context = assembleContext(input.retrieval.evidence, input.maxContextTokens);
    if (context.included.length === 0) {
      this.logger.warn("No evidence fits the context budget", {
        maxContextTokens: input.maxContextTokens,
      });
      return insufficientAnswer();
    }

    const text = await this.generate(
      { question: input.question, context: context.text, history: input.history },
      input.signal,
    );
    return {
      text,
      citedChunkKeys: context.included.map((chunk) => chunk.key),
      citations: context.included.map(toCitation),
      grounded: true,
    };
  }

  private async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    try {
      const text = await this.retryPolicy.execute(
        () => this.generator.generate(request, signal),
        {
          signal,
          isRetryable: (error) => error instanceof TransientUpstreamError,
          onRetry: (error, attempt, delayMs) => {
            this.logger.warn("Generation failed, retrying", {
              provider: this.generator.name,
              attempt,
              delayMs,
              error: describeError(error),
            });
          },
        },
      );
      return text.trim();
    } catch (error) {
      if (error instanceof TransientUpstreamError) {
        throw new GenerationUnavailableError(
          `Generation provider ${this.generator.name} unavailable after ${this.retryPolicy.maxAttempts} attempt(s): ${error.message}`,
          { cause: error },
        );
      }
      throw error;
    }
  }
}

function insufficientAnswer(): Answer {
  return {
    text: INSUFFICIENT_INFORMATION_ANSWER,
    citedChunkKeys: [],
    citations: [],
    grounded: false,
  };
}
