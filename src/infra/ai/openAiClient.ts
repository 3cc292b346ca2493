import { z } from "zod";
import { ContractViolationError, EmbeddingContractViolationError } from "../../domain/errors.js";
import { postJson } from "./http.js";
import { buildChatMessages } from "./prompts.js";
import { EmbeddingProvider, GenerationProvider, GenerationRequest } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  maxCompletionTokens: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export class OpenAiClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "openai";

  constructor(private readonly options: OpenAiClientOptions) {}

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const raw = await postJson(
      "OpenAI embeddings",
      `${this.options.baseUrl}/embeddings`,
      { model: this.options.embeddingModel, input: texts },
      { headers: this.authHeaders(), signal },
    );

    const parsed = embeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingContractViolationError(
        `OpenAI embeddings returned a malformed payload: ${parsed.error.message}`,
      );
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const raw = await postJson(
      "OpenAI chat",
      `${this.options.baseUrl}/chat/completions`,
      {
        model: this.options.chatModel,
        temperature: 0.2,
        max_completion_tokens: this.options.maxCompletionTokens,
        messages: buildChatMessages(request),
      },
      { headers: this.authHeaders(), signal },
    );

    const parsed = chatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ContractViolationError(
        `OpenAI chat returned a malformed payload: ${parsed.error.message}`,
      );
    }
    return parsed.data.choices[0].message.content?.trim() ?? "";
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}
