import { AppConfig, ProviderName } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingProvider, GenerationProvider } from "./types.js";

export interface AiProviders {
  embeddingProvider: EmbeddingProvider;
  generationProvider: GenerationProvider;
}

export function createAiProviders(config: AppConfig): AiProviders {
  return {
    embeddingProvider: createProvider(config, config.embeddingProvider),
    generationProvider: createProvider(config, config.generationProvider),
  };
}

function createProvider(config: AppConfig, name: ProviderName): OpenAiClient | OllamaClient {
  if (name === "ollama") {
    return new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      maxCompletionTokens: config.maxCompletionTokens,
    });
  }

  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required for the OpenAI provider.");
  }
  return new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.embeddingModel,
    chatModel: config.chatModel,
    maxCompletionTokens: config.maxCompletionTokens,
  });
}
