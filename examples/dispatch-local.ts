/**
 * Example: dispatching messages to handler scripts without a broker.
 *
 * Publishes a few messages to an in-memory queue and runs them through a
 * DispatchLoop with the real LocalProcessInvoker, against the scripts in
 * examples/scripts/. The handler output goes straight to this terminal.
 *
 * Usage:
 *   npm run example
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { DispatchLoop, LocalProcessInvoker } from "@hare/dispatch";
import type { DispatchEvent } from "@hare/dispatch";
import { MemoryQueue } from "@hare/dispatch/testing";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const scriptRoot = path.join(__dirname, "scripts");

async function main(): Promise<void> {
  console.log("=== Local dispatch example ===\n");
  console.log(`Script root: ${scriptRoot}\n`);

  const queue = new MemoryQueue();
  queue.publish({ type: "greet", name: "Ada", lang: "en" });
  queue.publish({ type: "greet", Name: "Grace" });
  queue.publish({ type: "missing" });
  queue.publish({ type: "../greet" });
  queue.publish({});

  const loop = new DispatchLoop({
    consumer: queue,
    invoker: new LocalProcessInvoker({ timeoutMs: 5000 }),
    handlerKey: "type",
    scriptRoot,
    onEvent: (event: DispatchEvent) => {
      switch (event.type) {
        case "DispatchCompleted": {
          const { outcome } = event;
          if (outcome.kind === "skipped") {
            console.log(`  [${event.deliveryTag}] skipped (${outcome.reason})`);
          } else if (outcome.kind === "invoked") {
            console.log(`  [${event.deliveryTag}] ${outcome.handlerName} exited ${outcome.exit.code}`);
          } else {
            console.log(`  [${event.deliveryTag}] ${outcome.handlerName} failed: ${outcome.error.reason}`);
          }
          break;
        }
        case "MessageAcknowledged":
          if (queue.unacknowledged().length === 0) {
            loop.stop().catch((err: unknown) => console.error(err));
          }
          break;
      }
    },
  });

  await loop.run();
  console.log(`\nAcknowledged: ${queue.acknowledged.join(", ")}`);
}

main().catch((err: unknown) => {
  console.error("Example failed:", err);
  process.exit(1);
});
