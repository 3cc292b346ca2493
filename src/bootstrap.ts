import { AppConfig } from "./config/env.js";
import { DocumentStore } from "./domain/documentStore.js";
import { IndexingJob } from "./domain/indexingJob.js";
import { TaskQueue } from "./domain/taskQueue.js";
import { VectorIndex } from "./domain/vectorIndex.js";
import { AiProviders, createAiProviders } from "./infra/ai/createAiProviders.js";
import { EmbeddingGateway } from "./infra/ai/embeddingGateway.js";
import { createTaskQueue } from "./infra/queue/createTaskQueue.js";
import { createStores } from "./infra/store/createStores.js";
import { AnswerSynthesizer } from "./pipelines/answering.js";
import { IndexingPipeline } from "./pipelines/indexing.js";
import { RetrievalEngine } from "./pipelines/retrieval.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { Logger } from "./utils/logger.js";
import { RetryPolicy } from "./utils/retry.js";

export interface Application {
  config: AppConfig;
  documents: DocumentStore;
  vectorIndex: VectorIndex;
  queue: TaskQueue<IndexingJob>;
  service: DocumentQaService;
  pipeline: IndexingPipeline;
  close: () => Promise<void>;
}

/** Wires every component from configuration. Nothing here is a module-level singleton. */
export async function createApplication(
  config: AppConfig,
  logger: Logger,
  providers: AiProviders = createAiProviders(config),
): Promise<Application> {
  const stores = await createStores(config, logger);
  const taskQueue = createTaskQueue(config, logger);

  const retryPolicy = new RetryPolicy({
    maxAttempts: config.retryMaxAttempts,
    baseDelayMs: config.retryBaseDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  });
  const embeddings = new EmbeddingGateway(providers.embeddingProvider, {
    dimension: config.vectorDimension,
    batchSize: config.embeddingBatchSize,
    concurrency: config.embeddingConcurrency,
    retryPolicy,
    logger,
  });

  const pipeline = new IndexingPipeline(
    {
      documents: stores.documents,
      vectorIndex: stores.vectorIndex,
      embeddings,
      queue: taskQueue.queue,
      logger,
    },
    {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      maxAttempts: config.jobMaxAttempts,
    },
  );

  const service = new DocumentQaService(
    {
      documents: stores.documents,
      vectorIndex: stores.vectorIndex,
      queue: taskQueue.queue,
      retrieval: new RetrievalEngine(stores.documents, stores.vectorIndex, embeddings, logger),
      synthesizer: new AnswerSynthesizer(providers.generationProvider, retryPolicy, logger),
      logger,
    },
    {
      searchTopK: config.searchTopK,
      searchScoreThreshold: config.searchScoreThreshold,
      dedupeByDocument: config.dedupeByDocument,
      contextTokenBudget: config.contextTokenBudget,
    },
  );

  return {
    config,
    documents: stores.documents,
    vectorIndex: stores.vectorIndex,
    queue: taskQueue.queue,
    service,
    pipeline,
    close: async () => {
      await taskQueue.close();
      await stores.close();
    },
  };
}
