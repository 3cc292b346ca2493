import { z } from "zod";
import { ContractViolationError, EmbeddingContractViolationError } from "../../domain/errors.js";
import { postJson } from "./http.js";
import { buildChatMessages } from "./prompts.js";
import { EmbeddingProvider, GenerationProvider, GenerationRequest } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  maxCompletionTokens: number;
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

export class OllamaClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const raw = await postJson(
      "Ollama embeddings",
      `${this.options.baseUrl}/api/embed`,
      { model: this.options.embeddingModel, input: texts },
      { signal },
    );

    const parsed = embedResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingContractViolationError(
        `Ollama embeddings returned a malformed payload: ${parsed.error.message}`,
      );
    }
    return parsed.data.embeddings;
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const raw = await postJson(
      "Ollama chat",
      `${this.options.baseUrl}/api/chat`,
      {
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0.1,
          num_predict: this.options.maxCompletionTokens,
          top_p: 0.9,
        },
        messages: buildChatMessages(request),
      },
      { signal },
    );

    const parsed = chatResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ContractViolationError(
        `Ollama chat returned a malformed payload: ${parsed.error.message}`,
      );
    }
    return parsed.data.message?.content?.trim() ?? "";
  }
}
