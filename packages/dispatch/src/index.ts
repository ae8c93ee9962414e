export const VERSION = "0.1.0";

// Core types
export type {
  DeliveryTag,
  Headers,
  Message,
  EnvironmentOverlay,
  ExitStatus,
} from "./types.js";

// Errors
export {
  DispatchError,
  InvocationError,
  TransportError,
  ConfigurationError,
  errorMessage,
} from "./errors.js";
export type { InvocationFailureReason } from "./errors.js";

// Header mapping
export { buildEnvironment, envVarName, ENV_VAR_PREFIX } from "./header-mapper.js";

// Handler resolution
export {
  resolveHandler,
  classifyHandler,
  isHandlerName,
  scriptPathFor,
} from "./handler-resolver.js";
export type { ResolutionMiss } from "./handler-resolver.js";

// Process invocation
export { LocalProcessInvoker, failureReasonFor } from "./process-invoker.js";
export type {
  ProcessInvoker,
  LocalProcessInvokerOptions,
} from "./process-invoker.js";

// Outcomes
export { OutcomeKind, acknowledgementFor } from "./outcome.js";
export type {
  DispatchOutcome,
  SkippedOutcome,
  InvokedOutcome,
  InvocationFailedOutcome,
  AckDecision,
} from "./outcome.js";

// Events
export { DispatchEventEmitter } from "./events.js";
export type {
  LoopState,
  DispatchEvent,
  DispatchEventListener,
  LoopStateChangedEvent,
  MessageReceivedEvent,
  DispatchCompletedEvent,
  MessageAcknowledgedEvent,
  LoopFailedEvent,
} from "./events.js";

// Queue
export { DeliveryBuffer } from "./queue.js";
export type { QueueConsumer } from "./queue.js";

// Loop
export { DispatchLoop } from "./dispatch-loop.js";
export type { DispatchLoopConfig } from "./dispatch-loop.js";
