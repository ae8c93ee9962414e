/**
 * In-process test doubles for the queue and the process invoker.
 *
 * Import from "@hare/dispatch/testing".
 */

import type { DeliveryTag, EnvironmentOverlay, ExitStatus, Message } from "./types.js";
import type { QueueConsumer } from "./queue.js";
import { DeliveryBuffer } from "./queue.js";
import type { ProcessInvoker } from "./process-invoker.js";
import { TransportError } from "./errors.js";

/** Build an ExitStatus for a process that exited with `code`. */
export function exitStatus(code: number): ExitStatus {
  return {
    code,
    signal: null,
    success: code === 0,
    timedOut: false,
    durationMs: 0,
  };
}

// ---------------------------------------------------------------------------
// MemoryQueue
// ---------------------------------------------------------------------------

export interface MemoryQueueOptions {
  /** connect() rejects with this. */
  connectError?: unknown;
}

/** A queue that lives in memory. Tags are assigned from 1 upwards. */
export class MemoryQueue implements QueueConsumer {
  /** Tags in the order they were acknowledged. */
  readonly acknowledged: DeliveryTag[] = [];
  /** acknowledge() rejects with this while set. */
  ackError: unknown;
  connected = false;
  closed = false;

  private readonly buffer = new DeliveryBuffer();
  private readonly pending = new Set<DeliveryTag>();
  private readonly connectError: unknown;
  private nextTag = 1;

  constructor(options: MemoryQueueOptions = {}) {
    this.connectError = options.connectError;
  }

  /** Enqueue a message and return its delivery tag. */
  publish(
    headers: Record<string, string> | Array<[string, string]>,
    body: Uint8Array = new Uint8Array(),
  ): DeliveryTag {
    const deliveryTag = this.nextTag++;
    const entries = Array.isArray(headers) ? headers : Object.entries(headers);
    const message: Message = {
      headers: new Map(entries),
      body,
      deliveryTag,
    };
    this.pending.add(deliveryTag);
    this.buffer.push(message);
    return deliveryTag;
  }

  /** Simulate losing the connection. */
  disconnect(error: unknown = new TransportError("Connection lost")): void {
    this.buffer.fail(error);
  }

  /** Tags delivered or queued but not yet acknowledged. */
  unacknowledged(): DeliveryTag[] {
    return Array.from(this.pending);
  }

  async connect(): Promise<void> {
    if (this.connectError !== undefined) {
      throw this.connectError;
    }
    this.connected = true;
  }

  deliveries(signal?: AbortSignal): AsyncIterable<Message> {
    this.buffer.bindSignal(signal);
    return this.buffer;
  }

  async acknowledge(deliveryTag: DeliveryTag): Promise<void> {
    if (this.ackError !== undefined) {
      throw this.ackError;
    }
    if (!this.pending.delete(deliveryTag)) {
      throw new TransportError(`Unknown delivery tag ${deliveryTag}`);
    }
    this.acknowledged.push(deliveryTag);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.buffer.end();
  }
}

// ---------------------------------------------------------------------------
// RecordingProcessInvoker
// ---------------------------------------------------------------------------

export interface RecordedInvocation {
  scriptPath: string;
  overlay: EnvironmentOverlay;
}

export type InvokeImplementation = (
  scriptPath: string,
  overlay: EnvironmentOverlay,
) => Promise<ExitStatus>;

/**
 * Records every invocation. Answers from a queue of canned results, then
 * from the implementation set with `respondWith`, then with exit code 0.
 */
export class RecordingProcessInvoker implements ProcessInvoker {
  readonly invocations: RecordedInvocation[] = [];
  /** Highest number of invocations observed running at once. */
  maxActive = 0;

  private readonly canned: Array<ExitStatus | Error> = [];
  private implementation: InvokeImplementation | undefined;
  private active = 0;

  /** Queue an exit code for the next unanswered invocation. */
  exitWith(code: number): this {
    this.canned.push(exitStatus(code));
    return this;
  }

  /** Queue a rejection for the next unanswered invocation. */
  failWith(error: Error): this {
    this.canned.push(error);
    return this;
  }

  respondWith(implementation: InvokeImplementation): this {
    this.implementation = implementation;
    return this;
  }

  async invoke(scriptPath: string, overlay: EnvironmentOverlay): Promise<ExitStatus> {
    this.invocations.push({ scriptPath, overlay });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      const next = this.canned.shift();
      if (next instanceof Error) throw next;
      if (next) return next;
      if (this.implementation) {
        return await this.implementation(scriptPath, overlay);
      }
      return exitStatus(0);
    } finally {
      this.active--;
    }
  }
}
