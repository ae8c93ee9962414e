/**
 * HeaderMapper: turns message headers into the handler's environment overlay.
 *
 * Each header `k: v` becomes `HARE_VAR_<K>=v`. Values pass through verbatim.
 * When two keys collide after uppercasing, the one iterated last wins.
 */

import type { EnvironmentOverlay, Headers } from "./types.js";

export const ENV_VAR_PREFIX = "HARE_VAR_";

/** Uppercase ASCII letters only; other characters are kept as they are. */
function asciiUpperCase(value: string): string {
  return value.replace(/[a-z]/g, (c) => c.toUpperCase());
}

/** The environment variable name a header key maps to. */
export function envVarName(headerKey: string): string {
  return ENV_VAR_PREFIX + asciiUpperCase(headerKey);
}

export function buildEnvironment(headers: Headers): EnvironmentOverlay {
  const overlay: EnvironmentOverlay = {};
  for (const [key, value] of headers) {
    overlay[envVarName(key)] = value;
  }
  return overlay;
}
