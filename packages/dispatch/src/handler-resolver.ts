/**
 * HandlerResolver: picks the handler script for a message.
 *
 * The handler name is read from one configured header and must be ASCII
 * alphanumeric, so the joined path never leaves the script root.
 * Existence of the script is not checked here.
 */

import * as path from "node:path";
import type { Headers } from "./types.js";

const HANDLER_NAME_PATTERN = /^[A-Za-z0-9]+$/;

/** Why a message has no handler. */
export type ResolutionMiss = "missing_key" | "invalid_name";

export function isHandlerName(value: string): boolean {
  return HANDLER_NAME_PATTERN.test(value);
}

/**
 * Look up the handler name under `handlerKey` and validate it.
 *
 * @returns the handler name, or the reason there is none
 */
export function classifyHandler(
  headers: Headers,
  handlerKey: string,
): { name: string } | { miss: ResolutionMiss; value?: string } {
  const value = headers.get(handlerKey);
  if (value === undefined) {
    return { miss: "missing_key" };
  }
  if (!isHandlerName(value)) {
    return { miss: "invalid_name", value };
  }
  return { name: value };
}

/** Join a validated handler name onto the script root. */
export function scriptPathFor(scriptRoot: string, handlerName: string): string {
  return path.join(scriptRoot, handlerName);
}

/**
 * Resolve the script path for a message.
 *
 * @returns `scriptRoot/<name>`, or undefined when the key is absent or the
 *   name fails validation
 */
export function resolveHandler(
  headers: Headers,
  handlerKey: string,
  scriptRoot: string,
): string | undefined {
  const result = classifyHandler(headers, handlerKey);
  if ("miss" in result) return undefined;
  return scriptPathFor(scriptRoot, result.name);
}
