import "dotenv/config";
import { createApplication } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { describeError } from "./domain/errors.js";
import { IndexingWorkerPool } from "./services/indexingWorkerPool.js";
import { ConsoleLogger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = new ConsoleLogger(config.logLevel, "worker");
  if (config.queueBackend === "memory") {
    logger.warn("QUEUE_BACKEND=memory: this worker only sees jobs enqueued in its own process");
  }

  const app = await createApplication(config, logger);
  const pool = new IndexingWorkerPool(app.pipeline, {
    concurrency: config.workerConcurrency,
    pollIntervalMs: config.workerPollIntervalMs,
    logger,
    onOutcome: (outcome) => {
      if (outcome.status !== "indexed") {
        logger.info("Job finished", { ...outcome });
      }
    },
  });
  pool.start();

  let stopping = false;
  const shutdown = async () => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info("Shutting down, waiting for in-flight jobs");
    await pool.stop();
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error) => {
  console.error(`Failed to start indexing worker: ${describeError(error)}`);
  process.exit(1);
});
