import { z } from "zod";
import { LogLevel } from "../utils/logger.js";

const booleanFlag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: booleanFlag,
  REDIS_URL: z.string().optional(),
  QUEUE_BACKEND: z.enum(["memory", "bullmq"]).default("memory"),
  QUEUE_NAME: z.string().default("document-indexing"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  GENERATION_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  MAX_COMPLETION_TOKENS: z.coerce.number().int().positive().default(1000),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8000),
  JOB_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  QUEUE_VISIBILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  RAG_SEARCH_TOP_K: z.coerce.number().int().positive().default(5),
  RAG_SEARCH_SCORE_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.5),
  RAG_DEDUPE_BY_DOCUMENT: booleanFlag,
  CONTEXT_TOKEN_BUDGET: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type ProviderName = "openai" | "ollama";

export interface AppConfig {
  enablePgvector: boolean;
  databaseUrl: string | null;
  queueBackend: "memory" | "bullmq";
  redisUrl: string | null;
  queueName: string;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  chatModel: string;
  embeddingProvider: ProviderName;
  generationProvider: ProviderName;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  maxCompletionTokens: number;
  vectorDimension: number;
  chunkSize: number;
  chunkOverlap: number;
  embeddingBatchSize: number;
  embeddingConcurrency: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  jobMaxAttempts: number;
  visibilityTimeoutMs: number;
  workerConcurrency: number;
  workerPollIntervalMs: number;
  searchTopK: number;
  searchScoreThreshold: number;
  dedupeByDocument: boolean;
  contextTokenBudget: number;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error("CHUNK_OVERLAP must be smaller than CHUNK_SIZE.");
  }
  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }
  if (parsed.QUEUE_BACKEND === "bullmq" && !parsed.REDIS_URL) {
    throw new Error("QUEUE_BACKEND=bullmq requires REDIS_URL.");
  }
  const usesOpenAi =
    parsed.EMBEDDING_PROVIDER === "openai" || parsed.GENERATION_PROVIDER === "openai";
  if (usesOpenAi && !parsed.OPENAI_API_KEY) {
    throw new Error("OPENAI_API_KEY is required when an OpenAI provider is selected.");
  }

  return {
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    queueBackend: parsed.QUEUE_BACKEND,
    redisUrl: parsed.REDIS_URL ?? null,
    queueName: parsed.QUEUE_NAME,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    chatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    generationProvider: parsed.GENERATION_PROVIDER,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    maxCompletionTokens: parsed.MAX_COMPLETION_TOKENS,
    vectorDimension: parsed.VECTOR_DIMENSION,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    embeddingConcurrency: parsed.EMBEDDING_CONCURRENCY,
    retryMaxAttempts: parsed.RETRY_MAX_ATTEMPTS,
    retryBaseDelayMs: parsed.RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    jobMaxAttempts: parsed.JOB_MAX_ATTEMPTS,
    visibilityTimeoutMs: parsed.QUEUE_VISIBILITY_TIMEOUT_MS,
    workerConcurrency: parsed.WORKER_CONCURRENCY,
    workerPollIntervalMs: parsed.WORKER_POLL_INTERVAL_MS,
    searchTopK: parsed.RAG_SEARCH_TOP_K,
    searchScoreThreshold: parsed.RAG_SEARCH_SCORE_THRESHOLD,
    dedupeByDocument: parsed.RAG_DEDUPE_BY_DOCUMENT === "true",
    contextTokenBudget: parsed.CONTEXT_TOKEN_BUDGET,
    logLevel: parsed.LOG_LEVEL,
  };
}
