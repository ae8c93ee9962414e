/**
 * OutcomeReporter: turns dispatch events into log lines.
 *
 * One line per dispatch outcome, carrying the handler, the script path (or
 * "none"), the exit code or error, and the delivery tag.
 */

import { OutcomeKind } from "@hare/dispatch";
import type {
  DispatchCompletedEvent,
  DispatchEvent,
  DispatchEventListener,
} from "@hare/dispatch";
import type { Logger } from "./logger.js";

/** Mask the password in a broker URL. Unparseable input is not echoed. */
export function redactUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return "<invalid url>";
  }
  if (url.password !== "") {
    url.password = "***";
  }
  return url.toString();
}

export class OutcomeReporter {
  private readonly logger: Logger;

  /** Pass to DispatchLoop as `onEvent`. */
  readonly listener: DispatchEventListener = (event) => this.report(event);

  constructor(logger: Logger) {
    this.logger = logger;
  }

  report(event: DispatchEvent): void {
    switch (event.type) {
      case "LoopStateChanged":
        this.logger.debug({ state: event.state }, "Dispatch loop state changed");
        if (event.state === "consuming") {
          this.logger.info("Waiting for messages");
        } else if (event.state === "stopped") {
          this.logger.info("Dispatcher stopped");
        }
        break;
      case "MessageReceived":
        if (event.headerCount === 0) {
          this.logger.info({ deliveryTag: event.deliveryTag }, "No headers found");
        } else {
          this.logger.debug(
            { deliveryTag: event.deliveryTag, headerCount: event.headerCount },
            "Message received",
          );
        }
        break;
      case "DispatchCompleted":
        this.reportOutcome(event);
        break;
      case "MessageAcknowledged":
        this.logger.debug({ deliveryTag: event.deliveryTag }, "Message acknowledged");
        break;
      case "LoopFailed":
        this.logger.fatal({ err: event.error }, "Dispatch loop failed");
        break;
    }
  }

  private reportOutcome({ deliveryTag, outcome }: DispatchCompletedEvent): void {
    switch (outcome.kind) {
      case OutcomeKind.SKIPPED:
        this.logger.info(
          {
            handler: outcome.handlerName ?? "none",
            script: "none",
            reason: outcome.reason,
            deliveryTag,
          },
          "No handler for message",
        );
        return;

      case OutcomeKind.INVOKED: {
        const { exit } = outcome;
        const fields = {
          handler: outcome.handlerName,
          script: outcome.scriptPath,
          exitCode: exit.code,
          signal: exit.signal,
          durationMs: exit.durationMs,
          deliveryTag,
        };
        if (exit.timedOut) {
          this.logger.warn(fields, "Handler timed out");
        } else if (exit.success) {
          this.logger.info(fields, "Handler finished");
        } else {
          this.logger.warn(fields, "Handler failed");
        }
        return;
      }

      case OutcomeKind.INVOCATION_FAILED:
        this.logger.error(
          {
            handler: outcome.handlerName,
            script: outcome.scriptPath,
            error: outcome.error.message,
            reason: outcome.error.reason,
            deliveryTag,
          },
          "Handler could not be started",
        );
        return;
    }
  }
}
