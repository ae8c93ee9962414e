/**
 * DispatchLoop: consumes messages and runs their handlers.
 *
 * Lifecycle: idle -> connecting -> consuming -> shutting_down, then stopped
 * after a clean stop. A lost transport, or an error that is not an
 * InvocationError, leaves the loop in shutting_down and rejects run().
 *
 * Per message: resolve the handler, build the environment overlay, invoke,
 * then acknowledge according to acknowledgementFor(). At most
 * `maxConcurrency` messages are in flight; each is acknowledged only after
 * its own invocation has finished.
 */

import type { Message } from "./types.js";
import type { QueueConsumer } from "./queue.js";
import type { ProcessInvoker } from "./process-invoker.js";
import { classifyHandler, scriptPathFor } from "./handler-resolver.js";
import { buildEnvironment } from "./header-mapper.js";
import { OutcomeKind, acknowledgementFor } from "./outcome.js";
import type { DispatchOutcome } from "./outcome.js";
import { DispatchEventEmitter } from "./events.js";
import type { DispatchEvent, DispatchEventListener, LoopState } from "./events.js";
import { ConfigurationError, DispatchError, InvocationError } from "./errors.js";

// ---------- Types ----------

export interface DispatchLoopConfig {
  /** Source of messages. */
  consumer: QueueConsumer;
  /** Runs handler scripts. */
  invoker: ProcessInvoker;
  /** Header that names the handler. */
  handlerKey: string;
  /** Directory handler scripts live in. */
  scriptRoot: string;
  /** Upper bound on concurrent invocations. Default: 1 */
  maxConcurrency?: number;
  /** Event listener callback. */
  onEvent?: (event: DispatchEvent) => void;
}

// ---------- DispatchLoop ----------

export class DispatchLoop {
  private readonly consumer: QueueConsumer;
  private readonly invoker: ProcessInvoker;
  private readonly handlerKey: string;
  private readonly scriptRoot: string;
  private readonly maxConcurrency: number;
  private readonly events = new DispatchEventEmitter();
  private readonly controller = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();
  private currentState: LoopState = "idle";
  private failure: { error: unknown } | undefined;
  private running: Promise<void> | undefined;

  constructor(config: DispatchLoopConfig) {
    const maxConcurrency = config.maxConcurrency ?? 1;
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConfigurationError(
        `maxConcurrency must be a positive integer, got ${maxConcurrency}`,
      );
    }
    if (config.handlerKey === "") {
      throw new ConfigurationError("handlerKey must not be empty");
    }

    this.consumer = config.consumer;
    this.invoker = config.invoker;
    this.handlerKey = config.handlerKey;
    this.scriptRoot = config.scriptRoot;
    this.maxConcurrency = maxConcurrency;

    if (config.onEvent) {
      this.events.on(config.onEvent);
    }
  }

  state(): LoopState {
    return this.currentState;
  }

  /** Register an event listener. */
  on(listener: DispatchEventListener): void {
    this.events.on(listener);
  }

  /** Remove an event listener. */
  off(listener: DispatchEventListener): void {
    this.events.off(listener);
  }

  /**
   * Connect and consume until stopped or the transport is lost.
   *
   * Resolves after stop() once in-flight messages are acknowledged and the
   * consumer is closed. Rejects with the fatal error otherwise.
   */
  run(): Promise<void> {
    if (this.running) {
      return Promise.reject(new DispatchError("Dispatch loop already started"));
    }
    this.running = this.execute();
    return this.running;
  }

  /**
   * Stop taking deliveries and wait for the loop to wind down.
   * A fatal error is reported through run(), not here.
   */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.running) {
      await Promise.allSettled([this.running]);
    }
  }

  /**
   * Resolve, build the overlay and invoke for one message. Does not
   * acknowledge. Errors other than InvocationError propagate.
   */
  async dispatch(message: Message): Promise<DispatchOutcome> {
    const handler = classifyHandler(message.headers, this.handlerKey);
    if ("miss" in handler) {
      return {
        kind: OutcomeKind.SKIPPED,
        reason: handler.miss,
        handlerName: handler.value,
      };
    }

    const scriptPath = scriptPathFor(this.scriptRoot, handler.name);
    const overlay = buildEnvironment(message.headers);

    try {
      const exit = await this.invoker.invoke(scriptPath, overlay);
      return {
        kind: OutcomeKind.INVOKED,
        handlerName: handler.name,
        scriptPath,
        exit,
      };
    } catch (err) {
      if (err instanceof InvocationError) {
        return {
          kind: OutcomeKind.INVOCATION_FAILED,
          handlerName: handler.name,
          scriptPath,
          error: err,
        };
      }
      throw err;
    }
  }

  // ---------- Internals ----------

  private setState(state: LoopState): void {
    this.currentState = state;
    this.events.emitStateChanged(state);
  }

  private recordFailure(error: unknown): void {
    // The first failure wins; later ones are usually its consequences
    if (!this.failure) {
      this.failure = { error };
    }
    this.controller.abort();
  }

  private async execute(): Promise<void> {
    try {
      this.setState("connecting");
      await this.consumer.connect();
      this.setState("consuming");

      for await (const message of this.consumer.deliveries(this.controller.signal)) {
        this.events.emitMessageReceived(message.deliveryTag, message.headers.size);
        await this.acquireSlot();
        if (this.failure) break;
        this.track(message);
      }
    } catch (err) {
      this.recordFailure(err);
    }

    this.setState("shutting_down");
    await Promise.all(this.inFlight);

    try {
      await this.consumer.close();
    } catch (err) {
      this.recordFailure(err);
    }

    if (this.failure) {
      this.events.emitLoopFailed(this.failure.error);
      throw this.failure.error;
    }
    this.setState("stopped");
  }

  private async acquireSlot(): Promise<void> {
    while (this.inFlight.size >= this.maxConcurrency) {
      await Promise.race(this.inFlight);
    }
  }

  private track(message: Message): void {
    const task: Promise<void> = this.process(message).then(
      () => {
        this.inFlight.delete(task);
      },
      (err: unknown) => {
        this.inFlight.delete(task);
        this.recordFailure(err);
      },
    );
    this.inFlight.add(task);
  }

  private async process(message: Message): Promise<void> {
    const outcome = await this.dispatch(message);
    this.events.emitDispatchCompleted(message.deliveryTag, outcome);

    if (acknowledgementFor(outcome) === "ack") {
      await this.consumer.acknowledge(message.deliveryTag);
      this.events.emitMessageAcknowledged(message.deliveryTag);
    }
  }
}
