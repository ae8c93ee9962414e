/**
 * Error hierarchy for the dispatcher.
 *
 * Per-message problems never surface as thrown errors past the dispatch loop:
 * only InvocationError is caught and turned into an outcome. TransportError and
 * anything unexpected end the loop.
 */

// ---------------------------------------------------------------------------
// DispatchError: base for all dispatcher errors
// ---------------------------------------------------------------------------

/** Base error for all dispatcher errors. */
export class DispatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "DispatchError";
  }
}

// ---------------------------------------------------------------------------
// InvocationError: a handler process could not be started
// ---------------------------------------------------------------------------

export type InvocationFailureReason =
  | "not_found"
  | "permission_denied"
  | "spawn_failed";

/**
 * The handler could not be started. A non-zero exit code is not an
 * InvocationError; it is reported through ExitStatus.
 */
export class InvocationError extends DispatchError {
  readonly reason: InvocationFailureReason;
  readonly scriptPath: string;

  constructor(
    message: string,
    options: {
      reason: InvocationFailureReason;
      scriptPath: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = "InvocationError";
    this.reason = options.reason;
    this.scriptPath = options.scriptPath;
  }
}

// ---------------------------------------------------------------------------
// TransportError: the queue connection is gone
// ---------------------------------------------------------------------------

/** The queue transport failed. Fatal to the dispatch loop. */
export class TransportError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

// ---------------------------------------------------------------------------
// ConfigurationError: startup configuration rejected
// ---------------------------------------------------------------------------

/** Startup configuration is missing or malformed. */
export class ConfigurationError extends DispatchError {
  /** One entry per offending setting. */
  readonly issues: string[];

  constructor(message: string, options?: { issues?: string[]; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConfigurationError";
    this.issues = options?.issues ?? [];
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
