import { Redis } from "ioredis";
import { AppConfig } from "../../config/env.js";
import { IndexingJob } from "../../domain/indexingJob.js";
import { TaskQueue } from "../../domain/taskQueue.js";
import { Logger } from "../../utils/logger.js";
import { BullMqTaskQueue } from "./bullMqTaskQueue.js";
import { InMemoryTaskQueue } from "./inMemoryTaskQueue.js";

export interface TaskQueueBootstrapResult {
  queue: TaskQueue<IndexingJob>;
  close: () => Promise<void>;
}

export function createTaskQueue(config: AppConfig, logger: Logger): TaskQueueBootstrapResult {
  // The pipeline dead-letters at jobMaxAttempts + 1; the queue's own limit is a backstop.
  const maxDeliveries = config.jobMaxAttempts + 2;

  if (config.queueBackend === "memory") {
    const queue = new InMemoryTaskQueue<IndexingJob>({
      visibilityTimeoutMs: config.visibilityTimeoutMs,
      maxDeliveries,
    });
    return { queue, close: () => queue.close() };
  }

  if (!config.redisUrl) {
    throw new Error("REDIS_URL is required when QUEUE_BACKEND=bullmq.");
  }

  const connection = new Redis(config.redisUrl, { maxRetriesPerRequest: null });
  const queue = new BullMqTaskQueue<IndexingJob>({
    connection,
    queueName: config.queueName,
    visibilityTimeoutMs: config.visibilityTimeoutMs,
    maxDeliveries,
    logger,
  });

  return {
    queue,
    close: async () => {
      await queue.close();
      await connection.quit();
    },
  };
}
