import { AppConfig } from "../../config/env.js";
import { DocumentStore } from "../../domain/documentStore.js";
import { VectorIndex } from "../../domain/vectorIndex.js";
import { Logger } from "../../utils/logger.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryDocumentStore } from "./inMemoryDocumentStore.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";
import { PgDocumentStore } from "./pgDocumentStore.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export interface StoresBootstrapResult {
  documents: DocumentStore;
  vectorIndex: VectorIndex;
  close: () => Promise<void>;
}

export async function createStores(
  config: AppConfig,
  logger?: Logger,
): Promise<StoresBootstrapResult> {
  if (!config.enablePgvector) {
    return {
      documents: new InMemoryDocumentStore(),
      vectorIndex: new InMemoryVectorIndex(config.vectorDimension),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const documents = new PgDocumentStore(pool, logger);
  const vectorIndex = new PgVectorIndex(pool, config.vectorDimension, logger);
  await documents.initialize();
  await vectorIndex.initialize();

  return {
    documents,
    vectorIndex,
    close: async () => {
      await pool.end();
    },
  };
}
