import { randomUUID } from "node:crypto";
import { DeadLetter, QueueMessage, TaskQueue } from "../../domain/taskQueue.js";

export interface InMemoryTaskQueueOptions {
  visibilityTimeoutMs: number;
  /** Deliveries after which a message is dead-lettered instead of delivered again. */
  maxDeliveries?: number;
  now?: () => number;
}

interface StoredMessage<T> {
  id: string;
  payload: T;
  enqueuedAt: string;
  deliveries: number;
  visibleAt: number;
  receipt: string | null;
}

export class InMemoryTaskQueue<T> implements TaskQueue<T> {
  private readonly messages = new Map<string, StoredMessage<T>>();

  private readonly deadLetters: DeadLetter<T>[] = [];

  private readonly now: () => number;

  private readonly maxDeliveries: number;

  constructor(private readonly options: InMemoryTaskQueueOptions) {
    this.now = options.now ?? Date.now;
    this.maxDeliveries = options.maxDeliveries ?? Number.POSITIVE_INFINITY;
  }

  async enqueue(payload: T): Promise<string> {
    const id = randomUUID();
    const timestamp = this.now();
    this.messages.set(id, {
      id,
      payload,
      enqueuedAt: new Date(timestamp).toISOString(),
      deliveries: 0,
      visibleAt: timestamp,
      receipt: null,
    });
    return id;
  }

  async receive(): Promise<QueueMessage<T> | null> {
    const now = this.now();
    for (const message of this.messages.values()) {
      if (message.visibleAt > now) {
        continue;
      }
      if (message.deliveries >= this.maxDeliveries) {
        this.moveToDeadLetters(message, "MaxDeliveriesExceeded");
        continue;
      }

      message.deliveries += 1;
      message.visibleAt = now + this.options.visibilityTimeoutMs;
      message.receipt = `${message.id}:${message.deliveries}`;
      return {
        id: message.id,
        payload: message.payload,
        attempt: message.deliveries,
        enqueuedAt: message.enqueuedAt,
        receipt: message.receipt,
      };
    }
    return null;
  }

  async ack(message: QueueMessage<T>): Promise<void> {
    if (this.ownedBy(message)) {
      this.messages.delete(message.id);
    }
  }

  async reject(message: QueueMessage<T>, _reason: string): Promise<void> {
    const stored = this.ownedBy(message);
    if (stored) {
      stored.visibleAt = this.now();
      stored.receipt = null;
    }
  }

  async deadLetter(message: QueueMessage<T>, reason: string): Promise<void> {
    const stored = this.ownedBy(message);
    if (stored) {
      this.moveToDeadLetters(stored, reason);
    }
  }

  async listDeadLetters(): Promise<DeadLetter<T>[]> {
    return this.deadLetters.map((entry) => ({ ...entry }));
  }

  async close(): Promise<void> {}

  stats(): { queued: number; inFlight: number; deadLettered: number } {
    const now = this.now();
    let inFlight = 0;
    for (const message of this.messages.values()) {
      if (message.visibleAt > now) {
        inFlight += 1;
      }
    }
    return {
      queued: this.messages.size - inFlight,
      inFlight,
      deadLettered: this.deadLetters.length,
    };
  }

  private ownedBy(message: QueueMessage<T>): StoredMessage<T> | null {
    const stored = this.messages.get(message.id);
    if (!stored || stored.receipt !== message.receipt) {
      return null;
    }
    return stored;
  }

  private moveToDeadLetters(message: StoredMessage<T>, reason: string): void {
    this.messages.delete(message.id);
    this.deadLetters.push({
      id: message.id,
      payload: message.payload,
      attempt: message.deliveries,
      reason,
      deadLetteredAt: new Date(this.now()).toISOString(),
    });
  }
}
