/**
 * DispatchOutcome and the acknowledgement policy.
 *
 * Every message that reaches the dispatcher produces exactly one outcome.
 * The policy maps outcomes to an acknowledgement decision; a message is never
 * handed back to the queue because of something that happened locally.
 */

import type { ExitStatus } from "./types.js";
import type { InvocationError } from "./errors.js";
import type { ResolutionMiss } from "./handler-resolver.js";

export const OutcomeKind = {
  SKIPPED: "skipped",
  INVOKED: "invoked",
  INVOCATION_FAILED: "invocation_failed",
} as const;

export type OutcomeKind = (typeof OutcomeKind)[keyof typeof OutcomeKind];

/** No handler: the key was absent or its value failed validation. */
export interface SkippedOutcome {
  kind: typeof OutcomeKind.SKIPPED;
  reason: ResolutionMiss;
  /** The rejected value, when the key was present. */
  handlerName?: string;
}

/** The handler ran to completion, with any exit code. */
export interface InvokedOutcome {
  kind: typeof OutcomeKind.INVOKED;
  handlerName: string;
  scriptPath: string;
  exit: ExitStatus;
}

/** The handler could not be started. */
export interface InvocationFailedOutcome {
  kind: typeof OutcomeKind.INVOCATION_FAILED;
  handlerName: string;
  scriptPath: string;
  error: InvocationError;
}

export type DispatchOutcome =
  | SkippedOutcome
  | InvokedOutcome
  | InvocationFailedOutcome;

/** What to tell the queue about a processed message. */
export type AckDecision = "ack";

/**
 * The acknowledgement policy. Redelivery cannot fix a missing or broken
 * script, so every outcome is acknowledged.
 */
export function acknowledgementFor(outcome: DispatchOutcome): AckDecision {
  switch (outcome.kind) {
    case OutcomeKind.SKIPPED:
    case OutcomeKind.INVOKED:
    case OutcomeKind.INVOCATION_FAILED:
      return "ack";
    default: {
      const unreachable: never = outcome;
      throw new Error(`Unknown outcome: ${JSON.stringify(unreachable)}`);
    }
  }
}
