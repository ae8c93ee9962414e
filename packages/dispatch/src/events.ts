/**
 * Dispatch observability events.
 *
 * The loop emits typed events as it runs; the daemon turns them into log
 * lines. Events emitted with no listener attached are dropped.
 */

import type { DeliveryTag } from "./types.js";
import type { DispatchOutcome } from "./outcome.js";

// ---------- Event Types ----------

export type LoopState =
  | "idle"
  | "connecting"
  | "consuming"
  | "shutting_down"
  | "stopped";

export interface LoopStateChangedEvent {
  type: "LoopStateChanged";
  state: LoopState;
  timestamp: string;
}

export interface MessageReceivedEvent {
  type: "MessageReceived";
  deliveryTag: DeliveryTag;
  headerCount: number;
  timestamp: string;
}

export interface DispatchCompletedEvent {
  type: "DispatchCompleted";
  deliveryTag: DeliveryTag;
  outcome: DispatchOutcome;
  timestamp: string;
}

export interface MessageAcknowledgedEvent {
  type: "MessageAcknowledged";
  deliveryTag: DeliveryTag;
  timestamp: string;
}

export interface LoopFailedEvent {
  type: "LoopFailed";
  error: unknown;
  timestamp: string;
}

export type DispatchEvent =
  | LoopStateChangedEvent
  | MessageReceivedEvent
  | DispatchCompletedEvent
  | MessageAcknowledgedEvent
  | LoopFailedEvent;

// ---------- Event Emitter ----------

export type DispatchEventListener = (event: DispatchEvent) => void;

export class DispatchEventEmitter {
  private listeners: DispatchEventListener[] = [];

  /** Register an event listener. */
  on(listener: DispatchEventListener): void {
    this.listeners.push(listener);
  }

  /** Remove an event listener. */
  off(listener: DispatchEventListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  /** Emit an event to all listeners. */
  emit(event: DispatchEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  emitStateChanged(state: LoopState): void {
    this.emit({
      type: "LoopStateChanged",
      state,
      timestamp: new Date().toISOString(),
    });
  }

  emitMessageReceived(deliveryTag: DeliveryTag, headerCount: number): void {
    this.emit({
      type: "MessageReceived",
      deliveryTag,
      headerCount,
      timestamp: new Date().toISOString(),
    });
  }

  emitDispatchCompleted(deliveryTag: DeliveryTag, outcome: DispatchOutcome): void {
    this.emit({
      type: "DispatchCompleted",
      deliveryTag,
      outcome,
      timestamp: new Date().toISOString(),
    });
  }

  emitMessageAcknowledged(deliveryTag: DeliveryTag): void {
    this.emit({
      type: "MessageAcknowledged",
      deliveryTag,
      timestamp: new Date().toISOString(),
    });
  }

  emitLoopFailed(error: unknown): void {
    this.emit({
      type: "LoopFailed",
      error,
      timestamp: new Date().toISOString(),
    });
  }
}
