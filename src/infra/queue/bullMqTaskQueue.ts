import { randomUUID } from "node:crypto";
import { Job, Queue, Worker } from "bullmq";
import { Redis } from "ioredis";
import { DeadLetter, QueueMessage, TaskQueue } from "../../domain/taskQueue.js";
import { Logger, NullLogger } from "../../utils/logger.js";

export interface BullMqTaskQueueOptions {
  connection: Redis;
  queueName: string;
  visibilityTimeoutMs: number;
  maxDeliveries: number;
  logger?: Logger;
}

interface DeadLetterData<T> {
  messageId: string;
  payload: T;
  attempt: number;
  reason: string;
  deadLetteredAt: string;
}

/**
 * BullMQ with manual job fetching: the job lock is the visibility timeout,
 * the stalled-job checker makes expired locks deliverable again, and the
 * dead-letter destination is a second queue.
 */
export class BullMqTaskQueue<T> implements TaskQueue<T> {
  private readonly queue: Queue;

  private readonly deadLetterQueue: Queue;

  private readonly worker: Worker;

  private readonly inFlight = new Map<string, Job>();

  private readonly logger: Logger;

  private stalledCheckStarted = false;

  constructor(private readonly options: BullMqTaskQueueOptions) {
    this.logger = options.logger ?? new NullLogger();
    this.queue = new Queue(options.queueName, { connection: options.connection });
    this.deadLetterQueue = new Queue(`${options.queueName}-dead-letter`, {
      connection: options.connection,
    });
    this.worker = new Worker(options.queueName, null, {
      connection: options.connection,
      lockDuration: options.visibilityTimeoutMs,
      maxStalledCount: options.maxDeliveries,
    });
    this.logger.info(`Connected to queue '${options.queueName}'`);
  }

  async enqueue(payload: T): Promise<string> {
    const job = await this.queue.add("index-document", payload, {
      attempts: this.options.maxDeliveries,
      removeOnComplete: true,
      removeOnFail: 1000,
    });
    return job.id ?? "";
  }

  async receive(): Promise<QueueMessage<T> | null> {
    await this.ensureStalledCheck();

    const receipt = randomUUID();
    const job = await this.worker.getNextJob(receipt);
    if (!job) {
      return null;
    }

    this.inFlight.set(receipt, job);
    return {
      id: job.id ?? receipt,
      payload: job.data,
      attempt: Math.max(1, job.attemptsStarted),
      enqueuedAt: new Date(job.timestamp).toISOString(),
      receipt,
    };
  }

  async ack(message: QueueMessage<T>): Promise<void> {
    const job = this.take(message);
    if (job) {
      await job.moveToCompleted("indexed", message.receipt, false);
    }
  }

  async reject(message: QueueMessage<T>, reason: string): Promise<void> {
    const job = this.take(message);
    if (job) {
      await job.moveToFailed(new Error(reason), message.receipt);
    }
  }

  async deadLetter(message: QueueMessage<T>, reason: string): Promise<void> {
    const job = this.take(message);
    if (!job) {
      return;
    }

    const entry: DeadLetterData<T> = {
      messageId: message.id,
      payload: message.payload,
      attempt: message.attempt,
      reason,
      deadLetteredAt: new Date().toISOString(),
    };
    await this.deadLetterQueue.add("dead-letter", entry, { removeOnComplete: false });
    job.discard();
    await job.moveToFailed(new Error(reason), message.receipt);
  }

  async listDeadLetters(): Promise<DeadLetter<T>[]> {
    const jobs = await this.deadLetterQueue.getWaiting();
    return jobs.map((job) => {
      const data: DeadLetterData<T> = job.data;
      return {
        id: data.messageId,
        payload: data.payload,
        attempt: data.attempt,
        reason: data.reason,
        deadLetteredAt: data.deadLetteredAt,
      };
    });
  }

  async close(): Promise<void> {
    this.logger.info("Closing queue worker and connections");
    await this.worker.close();
    await this.queue.close();
    await this.deadLetterQueue.close();
  }

  private take(message: QueueMessage<T>): Job | undefined {
    const job = this.inFlight.get(message.receipt);
    this.inFlight.delete(message.receipt);
    if (!job) {
      this.logger.warn("Ignoring settle call for an unknown delivery", { messageId: message.id });
    }
    return job;
  }

  private async ensureStalledCheck(): Promise<void> {
    if (this.stalledCheckStarted) {
      return;
    }
    this.stalledCheckStarted = true;
    await this.worker.startStalledCheckTimer();
  }
}
