export interface QueueMessage<T> {
  id: string;
  payload: T;
  /** 1 on first delivery, incremented on every redelivery. */
  attempt: number;
  enqueuedAt: string;
  /** Identifies this particular delivery; stale receipts cannot ack, reject or dead-letter. */
  receipt: string;
}

export interface DeadLetter<T> {
  id: string;
  payload: T;
  attempt: number;
  reason: string;
  deadLetteredAt: string;
}

/**
 * At-least-once queue. A received message stays hidden for the visibility
 * timeout and becomes deliverable again unless it is acked, rejected or
 * dead-lettered before then.
 */
export interface TaskQueue<T> {
  enqueue(payload: T): Promise<string>;
  receive(): Promise<QueueMessage<T> | null>;
  ack(message: QueueMessage<T>): Promise<void>;
  reject(message: QueueMessage<T>, reason: string): Promise<void>;
  deadLetter(message: QueueMessage<T>, reason: string): Promise<void>;
  listDeadLetters(): Promise<DeadLetter<T>[]>;
  close(): Promise<void>;
}
