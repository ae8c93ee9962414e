/**
 * Wires the dispatcher together from configuration.
 */

import { DispatchLoop, LocalProcessInvoker } from "@hare/dispatch";
import type { ProcessInvoker, QueueConsumer } from "@hare/dispatch";
import { AmqpConsumer } from "@hare/amqp-transport";
import type { HareConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { OutcomeReporter, redactUrl } from "./reporter.js";

export interface DaemonOptions {
  /** Default: an AmqpConsumer for the configured broker. */
  consumer?: QueueConsumer;
  /** Default: a LocalProcessInvoker with the configured timeout. */
  invoker?: ProcessInvoker;
  /** Default: a pino logger for the configured level and destination. */
  logger?: Logger;
}

export interface DaemonHandle {
  /** Settles when the loop ends: resolves after stop(), rejects on a fatal error. */
  done: Promise<void>;
  /** Stop gracefully; in-flight handlers finish and are acknowledged. */
  stop(): Promise<void>;
  loop: DispatchLoop;
  logger: Logger;
}

export function runDaemon(
  config: Readonly<HareConfig>,
  options: DaemonOptions = {},
): DaemonHandle {
  const logger =
    options.logger ??
    createLogger({ level: config.logLevel, destination: config.logDestination });

  const consumer =
    options.consumer ??
    new AmqpConsumer({
      url: config.amqpUrl,
      queue: config.queue,
      consumerTag: config.consumerTag,
      prefetch: config.maxConcurrency,
    });
  const invoker =
    options.invoker ?? new LocalProcessInvoker({ timeoutMs: config.scriptTimeoutMs });

  const reporter = new OutcomeReporter(logger);
  const loop = new DispatchLoop({
    consumer,
    invoker,
    handlerKey: config.handlerKey,
    scriptRoot: config.scriptRoot,
    maxConcurrency: config.maxConcurrency,
    onEvent: reporter.listener,
  });

  logger.info(
    {
      url: redactUrl(config.amqpUrl),
      queue: config.queue,
      scriptRoot: config.scriptRoot,
      handlerKey: config.handlerKey,
      maxConcurrency: config.maxConcurrency,
    },
    "Starting dispatcher",
  );

  return {
    done: loop.run(),
    stop: () => loop.stop(),
    loop,
    logger,
  };
}
