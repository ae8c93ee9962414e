/**
 * Core data types shared by the dispatch pipeline.
 */

/** Opaque handle the queue uses to identify one delivery. */
export type DeliveryTag = number;

/**
 * Message headers. A Map keeps the order the transport delivered them in,
 * which decides the winner when two keys collide after uppercasing.
 */
export type Headers = ReadonlyMap<string, string>;

/** A unit received from the queue. Consumed exactly once by the loop. */
export interface Message {
  /** Key/value metadata, keys case-sensitive as received. */
  readonly headers: Headers;
  /** Payload. Not interpreted by the dispatcher. */
  readonly body: Uint8Array;
  /** Handle passed back to the consumer to acknowledge this delivery. */
  readonly deliveryTag: DeliveryTag;
}

/** Environment variables added to (or overriding) the inherited environment. */
export type EnvironmentOverlay = Record<string, string>;

/** How a handler process ended. */
export interface ExitStatus {
  /** Exit code, or null when the process was terminated by a signal. */
  code: number | null;
  /** Terminating signal, or null when the process exited on its own. */
  signal: string | null;
  /** True when code is 0. */
  success: boolean;
  /** True when the invoker killed the process after its timeout. */
  timedOut: boolean;
  durationMs: number;
}
