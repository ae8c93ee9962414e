import { describe, it, expect, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { DispatchLoop } from "../src/dispatch-loop.js";
import type { DispatchLoopConfig } from "../src/dispatch-loop.js";
import type { DispatchEvent } from "../src/events.js";
import type { ExitStatus } from "../src/types.js";
import { LocalProcessInvoker } from "../src/process-invoker.js";
import {
  ConfigurationError,
  DispatchError,
  InvocationError,
  TransportError,
} from "../src/errors.js";
import {
  MemoryQueue,
  RecordingProcessInvoker,
  exitStatus,
} from "../src/testing.js";

const ROOT = "/etc/hare/scripts";

function createLoop(overrides: Partial<DispatchLoopConfig> = {}) {
  const queue = new MemoryQueue();
  const invoker = new RecordingProcessInvoker();
  const events: DispatchEvent[] = [];
  const loop = new DispatchLoop({
    consumer: queue,
    invoker,
    handlerKey: "type",
    scriptRoot: ROOT,
    onEvent: (event) => events.push(event),
    ...overrides,
  });
  return { queue, invoker, events, loop };
}

function outcomes(events: DispatchEvent[]) {
  return events.flatMap((e) => (e.type === "DispatchCompleted" ? [e.outcome] : []));
}

describe("DispatchLoop", () => {
  // ----------------------------------------------------------------
  // construction
  // ----------------------------------------------------------------
  describe("construction", () => {
    it("starts idle", () => {
      const { loop } = createLoop();
      expect(loop.state()).toBe("idle");
    });

    it("rejects a non-positive concurrency bound", () => {
      expect(() => createLoop({ maxConcurrency: 0 })).toThrow(ConfigurationError);
      expect(() => createLoop({ maxConcurrency: 1.5 })).toThrow(ConfigurationError);
    });

    it("rejects an empty handler key", () => {
      expect(() => createLoop({ handlerKey: "" })).toThrow(ConfigurationError);
    });
  });

  // ----------------------------------------------------------------
  // dispatch()
  // ----------------------------------------------------------------
  describe("dispatch", () => {
    it("invokes the resolved script with the header overlay", async () => {
      const { loop, invoker } = createLoop();
      invoker.exitWith(0);

      const outcome = await loop.dispatch({
        headers: new Map([
          ["type", "deploy"],
          ["app", "myapp"],
        ]),
        body: new Uint8Array(),
        deliveryTag: 1,
      });

      expect(outcome).toEqual({
        kind: "invoked",
        handlerName: "deploy",
        scriptPath: "/etc/hare/scripts/deploy",
        exit: exitStatus(0),
      });
      expect(invoker.invocations).toEqual([
        {
          scriptPath: "/etc/hare/scripts/deploy",
          overlay: { HARE_VAR_TYPE: "deploy", HARE_VAR_APP: "myapp" },
        },
      ]);
    });

    it("skips without invoking when the key is missing", async () => {
      const { loop, invoker } = createLoop();
      const outcome = await loop.dispatch({
        headers: new Map([["app", "myapp"]]),
        body: new Uint8Array(),
        deliveryTag: 1,
      });
      expect(outcome).toEqual({ kind: "skipped", reason: "missing_key" });
      expect(invoker.invocations).toEqual([]);
    });

    it("skips without invoking when the name is invalid", async () => {
      const { loop, invoker } = createLoop();
      const outcome = await loop.dispatch({
        headers: new Map([["type", "../etc/passwd"]]),
        body: new Uint8Array(),
        deliveryTag: 1,
      });
      expect(outcome).toEqual({
        kind: "skipped",
        reason: "invalid_name",
        handlerName: "../etc/passwd",
      });
      expect(invoker.invocations).toEqual([]);
    });

    it("turns an InvocationError into an outcome", async () => {
      const { loop, invoker } = createLoop();
      const error = new InvocationError("missing", {
        reason: "not_found",
        scriptPath: "/etc/hare/scripts/deploy",
      });
      invoker.failWith(error);

      const outcome = await loop.dispatch({
        headers: new Map([["type", "deploy"]]),
        body: new Uint8Array(),
        deliveryTag: 1,
      });
      expect(outcome).toEqual({
        kind: "invocation_failed",
        handlerName: "deploy",
        scriptPath: "/etc/hare/scripts/deploy",
        error,
      });
    });

    it("propagates other errors", async () => {
      const { loop, invoker } = createLoop();
      invoker.failWith(new Error("boom"));
      await expect(
        loop.dispatch({
          headers: new Map([["type", "deploy"]]),
          body: new Uint8Array(),
          deliveryTag: 1,
        }),
      ).rejects.toThrow("boom");
    });

    it("is idempotent for the same message", async () => {
      const { loop, invoker } = createLoop();
      const message = {
        headers: new Map([
          ["type", "deploy"],
          ["env", "prod"],
        ]),
        body: new Uint8Array(),
        deliveryTag: 1,
      };
      const first = await loop.dispatch(message);
      const second = await loop.dispatch(message);
      expect(second).toEqual(first);
      expect(invoker.invocations[1]).toEqual(invoker.invocations[0]);
    });
  });

  // ----------------------------------------------------------------
  // run()
  // ----------------------------------------------------------------
  describe("run", () => {
    it("acknowledges an invoked message regardless of exit code", async () => {
      const { loop, queue, invoker } = createLoop();
      invoker.exitWith(42);
      queue.publish({ type: "deploy", app: "myapp" });

      const done = loop.run();
      await vi.waitFor(() => expect(queue.acknowledged).toEqual([1]));
      await loop.stop();
      await done;

      expect(invoker.invocations).toEqual([
        {
          scriptPath: "/etc/hare/scripts/deploy",
          overlay: { HARE_VAR_TYPE: "deploy", HARE_VAR_APP: "myapp" },
        },
      ]);
    });

    it("acknowledges a traversal attempt without spawning", async () => {
      const { loop, queue, invoker, events } = createLoop();
      queue.publish({ type: "../etc/passwd" });

      const done = loop.run();
      await vi.waitFor(() => expect(queue.acknowledged).toEqual([1]));
      await loop.stop();
      await done;

      expect(invoker.invocations).toEqual([]);
      expect(outcomes(events)).toEqual([
        { kind: "skipped", reason: "invalid_name", handlerName: "../etc/passwd" },
      ]);
    });

    it("acknowledges a message without the handler key", async () => {
      const { loop, queue, invoker, events } = createLoop();
      queue.publish({ app: "myapp" });

      const done = loop.run();
      await vi.waitFor(() => expect(queue.acknowledged).toEqual([1]));
      await loop.stop();
      await done;

      expect(invoker.invocations).toEqual([]);
      expect(outcomes(events)).toEqual([{ kind: "skipped", reason: "missing_key" }]);
    });

    it("acknowledges when the script does not exist", async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), "hare-loop-test-"));
      try {
        const { loop, queue, events } = createLoop({
          invoker: new LocalProcessInvoker(),
          scriptRoot: root,
        });
        queue.publish({ type: "deploy" });

        const done = loop.run();
        await vi.waitFor(() => expect(queue.acknowledged).toEqual([1]));
        await loop.stop();
        await done;

        expect(outcomes(events)).toMatchObject([
          {
            kind: "invocation_failed",
            handlerName: "deploy",
            scriptPath: path.join(root, "deploy"),
            error: { reason: "not_found" },
          },
        ]);
      } finally {
        await fs.rm(root, { recursive: true, force: true });
      }
    });

    it("processes messages one at a time by default", async () => {
      const { loop, queue, invoker } = createLoop();
      queue.publish({ type: "a" });
      queue.publish({ type: "b" });
      queue.publish({ type: "c" });

      const done = loop.run();
      await vi.waitFor(() => expect(queue.acknowledged).toEqual([1, 2, 3]));
      await loop.stop();
      await done;

      expect(invoker.maxActive).toBe(1);
      expect(invoker.invocations.map((i) => i.scriptPath)).toEqual([
        "/etc/hare/scripts/a",
        "/etc/hare/scripts/b",
        "/etc/hare/scripts/c",
      ]);
    });

    it("bounds concurrent invocations and acks each after its own run", async () => {
      const { loop, queue, invoker } = createLoop({ maxConcurrency: 2 });
      const releases: Array<() => void> = [];
      invoker.respondWith(
        () =>
          new Promise<ExitStatus>((resolve) => {
            releases.push(() => resolve(exitStatus(0)));
          }),
      );
      queue.publish({ type: "a" });
      queue.publish({ type: "b" });
      queue.publish({ type: "c" });

      const done = loop.run();
      await vi.waitFor(() => expect(invoker.invocations).toHaveLength(2));
      expect(queue.acknowledged).toEqual([]);

      releases[1]();
      await vi.waitFor(() => expect(queue.acknowledged).toEqual([2]));
      await vi.waitFor(() => expect(invoker.invocations).toHaveLength(3));

      releases[2]();
      releases[0]();
      await vi.waitFor(() => expect(queue.acknowledged).toHaveLength(3));
      await loop.stop();
      await done;

      expect(queue.acknowledged).toEqual([2, 3, 1]);
      expect(invoker.maxActive).toBe(2);
    });

    it("waits for in-flight dispatches on stop", async () => {
      const { loop, queue, invoker } = createLoop();
      const releases: Array<() => void> = [];
      invoker.respondWith(
        () =>
          new Promise<ExitStatus>((resolve) => {
            releases.push(() => resolve(exitStatus(0)));
          }),
      );
      queue.publish({ type: "deploy" });

      const done = loop.run();
      await vi.waitFor(() => expect(invoker.invocations).toHaveLength(1));

      const stopped = loop.stop();
      await vi.waitFor(() => expect(loop.state()).toBe("shutting_down"));
      expect(queue.acknowledged).toEqual([]);

      releases[0]();
      await stopped;
      await done;

      expect(queue.acknowledged).toEqual([1]);
      expect(queue.closed).toBe(true);
      expect(loop.state()).toBe("stopped");
    });

    it("walks through its states and emits events", async () => {
      const { loop, queue, events } = createLoop();
      queue.publish({ type: "deploy" });

      const done = loop.run();
      await vi.waitFor(() => expect(queue.acknowledged).toEqual([1]));
      await loop.stop();
      await done;

      expect(events.map((e) => e.type)).toEqual([
        "LoopStateChanged",
        "LoopStateChanged",
        "MessageReceived",
        "DispatchCompleted",
        "MessageAcknowledged",
        "LoopStateChanged",
        "LoopStateChanged",
      ]);
      const states = events.flatMap((e) => (e.type === "LoopStateChanged" ? [e.state] : []));
      expect(states).toEqual(["connecting", "consuming", "shutting_down", "stopped"]);
      expect(events[2]).toMatchObject({ deliveryTag: 1, headerCount: 1 });
    });

    it("refuses to run twice", async () => {
      const { loop } = createLoop();
      const done = loop.run();
      await expect(loop.run()).rejects.toBeInstanceOf(DispatchError);
      await loop.stop();
      await done;
    });
  });

  // ----------------------------------------------------------------
  // failures
  // ----------------------------------------------------------------
  describe("failures", () => {
    it("rejects when the connection cannot be established", async () => {
      const error = new TransportError("refused");
      const queue = new MemoryQueue({ connectError: error });
      const { loop, events } = createLoop({ consumer: queue });

      await expect(loop.run()).rejects.toBe(error);
      expect(loop.state()).toBe("shutting_down");
      expect(events.at(-1)).toMatchObject({ type: "LoopFailed", error });
    });

    it("shuts down on transport loss", async () => {
      const { loop, queue } = createLoop();
      const done = loop.run();
      await vi.waitFor(() => expect(loop.state()).toBe("consuming"));

      queue.disconnect();
      await expect(done).rejects.toBeInstanceOf(TransportError);
      expect(loop.state()).toBe("shutting_down");
      expect(queue.closed).toBe(true);
    });

    it("does not acknowledge when dispatch fails structurally", async () => {
      const { loop, queue, invoker } = createLoop();
      invoker.failWith(new Error("invoker bug"));
      queue.publish({ type: "deploy" });

      await expect(loop.run()).rejects.toThrow("invoker bug");
      expect(queue.acknowledged).toEqual([]);
      expect(queue.unacknowledged()).toEqual([1]);
    });

    it("shuts down when acknowledgement fails", async () => {
      const { loop, queue } = createLoop();
      const error = new TransportError("channel closed");
      queue.ackError = error;
      queue.publish({ type: "deploy" });

      await expect(loop.run()).rejects.toBe(error);
      expect(queue.closed).toBe(true);
    });
  });
});
