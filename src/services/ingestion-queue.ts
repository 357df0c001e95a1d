/**
 * Ingestion queue.
 *
 * FIFO channel between the mailbox poller and the workers. Every change to
 * the buffer and the waiter lists happens synchronously inside a single
 * method call, so producers and consumers interleaving on the event loop
 * cannot lose, duplicate or reorder items.
 */

import { IntakeError } from "../errors.js";

export class QueueClosedError extends IntakeError {
  constructor() {
    super("Ingestion queue is closed");
  }
}

export class IngestionQueue<T> {
  private items: Array<T | undefined> = [];
  private head = 0;
  private consumers: Array<(item: T | null) => void> = [];
  private producers: Array<{ item: T; resolve: () => void; reject: (err: Error) => void }> = [];
  private closed = false;

  /**
   * @param capacity - Maximum buffered items; 0 means unbounded
   */
  constructor(private readonly capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /** Buffered items. Never blocks. */
  size(): number {
    return this.items.length - this.head;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Producers waiting for capacity */
  get blockedProducers(): number {
    return this.producers.length;
  }

  /**
   * Add an item, waiting while a bounded queue is full.
   *
   * @throws QueueClosedError once the queue is closed
   */
  enqueue(item: T): Promise<void> {
    if (this.tryEnqueue(item)) {
      return Promise.resolve();
    }
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.producers.push({ item, resolve, reject });
    });
  }

  /**
   * Add an item if there is room. Returns false when full or closed.
   */
  tryEnqueue(item: T): boolean {
    if (this.closed) return false;

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
      return true;
    }

    if (this.capacity > 0 && this.size() >= this.capacity) {
      return false;
    }

    this.items.push(item);
    return true;
  }

  /**
   * Take the oldest item, waiting for one if the queue is empty. Resolves
   * null once the queue is closed and drained.
   */
  dequeue(): Promise<T | null> {
    const item = this.tryDequeue();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /**
   * Take the oldest item if there is one.
   */
  tryDequeue(): T | undefined {
    if (this.size() === 0) return undefined;

    const item = this.items[this.head];
    this.items[this.head] = undefined;
    this.head++;
    this.compact();
    this.admitProducer();
    return item;
  }

  /**
   * Stop accepting items. Buffered items can still be dequeued; waiting
   * consumers get null and waiting producers are rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const consumer of this.consumers.splice(0)) {
      consumer(null);
    }
    for (const producer of this.producers.splice(0)) {
      producer.reject(new QueueClosedError());
    }
  }

  private admitProducer(): void {
    const producer = this.producers.shift();
    if (!producer) return;
    this.items.push(producer.item);
    producer.resolve();
  }

  private compact(): void {
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
