/**
 * Queue consumer contract and the buffer transports use to expose
 * callback-style deliveries as an async iterable.
 */

import type { DeliveryTag, Message } from "./types.js";

/**
 * A source of messages. The transport protocol behind it is opaque to the
 * dispatcher; all it needs is iteration and acknowledgement by tag.
 */
export interface QueueConsumer {
  /** Establish the connection. Rejects with TransportError. */
  connect(): Promise<void>;
  /**
   * Deliveries in arrival order. The iteration ends when `signal` aborts or
   * the consumer is closed, and throws TransportError if the transport is lost.
   */
  deliveries(signal?: AbortSignal): AsyncIterable<Message>;
  /** Confirm a delivery has been processed. */
  acknowledge(deliveryTag: DeliveryTag): Promise<void>;
  /** Release the connection. Safe to call more than once. */
  close(): Promise<void>;
}

interface Waiter {
  resolve: (result: IteratorResult<Message>) => void;
  reject: (err: unknown) => void;
}

/**
 * Single-consumer FIFO between a push-based transport and `for await`.
 *
 * `end()` and `fail()` take effect immediately: messages still buffered are
 * dropped unacknowledged, so the broker redelivers them.
 */
export class DeliveryBuffer implements AsyncIterable<Message> {
  private items: Message[] = [];
  private waiters: Waiter[] = [];
  private finished = false;
  private failure: { error: unknown } | undefined;

  /** True once end() or fail() has been called. */
  get closed(): boolean {
    return this.finished;
  }

  /** Number of messages waiting to be taken. */
  get size(): number {
    return this.items.length;
  }

  push(message: Message): void {
    if (this.finished) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: message, done: false });
    } else {
      this.items.push(message);
    }
  }

  end(): void {
    if (this.finished) return;
    this.finished = true;
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(error: unknown): void {
    if (this.finished) return;
    this.finished = true;
    this.failure = { error };
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  /** End the buffer when `signal` aborts. */
  bindSignal(signal?: AbortSignal): void {
    if (!signal) return;
    if (signal.aborted) {
      this.end();
      return;
    }
    signal.addEventListener("abort", () => this.end(), { once: true });
  }

  next(): Promise<IteratorResult<Message>> {
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    const message = this.items.shift();
    if (message !== undefined) {
      return Promise.resolve({ value: message, done: false });
    }
    if (this.finished) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<Message>>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Message> {
    return { next: () => this.next() };
  }
}
