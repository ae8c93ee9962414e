/**
 * ProcessInvoker: runs a handler script and waits for it to exit.
 *
 * LocalProcessInvoker is the default implementation that spawns on the local
 * machine. The child inherits this process's stdio and environment, with the
 * overlay applied on top, and leads its own process group so a timeout can
 * stop everything it started.
 */

import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import type { EnvironmentOverlay, ExitStatus } from "./types.js";
import { InvocationError, errorMessage } from "./errors.js";
import type { InvocationFailureReason } from "./errors.js";

export interface ProcessInvoker {
  /**
   * Run `scriptPath` with no arguments and wait for it to terminate.
   *
   * Resolves with the exit status whatever the exit code; rejects with
   * InvocationError only when the process could not be started.
   */
  invoke(scriptPath: string, overlay: EnvironmentOverlay): Promise<ExitStatus>;
}

export interface LocalProcessInvokerOptions {
  /** Kill the child after this many milliseconds. 0 waits forever. Default: 0 */
  timeoutMs?: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires. Default: 2000 */
  killGraceMs?: number;
  /** Base environment. Default: process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

/** Map a spawn errno to an invocation failure reason. */
export function failureReasonFor(err: unknown): InvocationFailureReason {
  const code =
    err instanceof Error && "code" in err ? String(err.code) : undefined;
  switch (code) {
    case "ENOENT":
    case "ENOTDIR":
      return "not_found";
    case "EACCES":
    case "EPERM":
      return "permission_denied";
    default:
      return "spawn_failed";
  }
}

function mergeEnvironment(
  base: NodeJS.ProcessEnv,
  overlay: EnvironmentOverlay,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  // Overlay keys replace inherited ones
  return Object.assign(env, overlay);
}

/**
 * Signal the child's whole process group, so anything the handler started
 * goes down with it. Falls back to the child alone when the group cannot be
 * signalled.
 */
function signalGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch (err) {
    // ESRCH: every process in the group has already exited
    if (!isNoSuchProcess(err)) {
      child.kill(signal);
    }
  }
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ESRCH";
}

export class LocalProcessInvoker implements ProcessInvoker {
  private readonly timeoutMs: number;
  private readonly killGraceMs: number;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: LocalProcessInvokerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.killGraceMs = options.killGraceMs ?? 2000;
    this.baseEnv = options.baseEnv ?? process.env;
  }

  invoke(scriptPath: string, overlay: EnvironmentOverlay): Promise<ExitStatus> {
    const env = mergeEnvironment(this.baseEnv, overlay);

    return new Promise<ExitStatus>((resolve, reject) => {
      const start = Date.now();
      let settled = false;
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;
      let killTimer: NodeJS.Timeout | undefined;

      const fail = (err: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        const reason = failureReasonFor(err);
        reject(
          new InvocationError(
            `Cannot run ${scriptPath}: ${errorMessage(err)}`,
            { reason, scriptPath, cause: err },
          ),
        );
      };

      let child: ChildProcess;
      try {
        // detached: the child leads a new process group
        child = spawn(scriptPath, [], { env, stdio: "inherit", detached: true });
      } catch (err) {
        // spawn throws synchronously for invalid arguments (e.g. a NUL byte
        // in the environment) and for errnos it does not defer
        fail(err);
        return;
      }

      child.on("error", fail);

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        clearTimeout(killTimer);
        if (timedOut) {
          // The leader is gone; take down whatever it left in the group
          signalGroup(child, "SIGKILL");
        }
        resolve({
          code,
          signal,
          success: code === 0,
          timedOut,
          durationMs: Date.now() - start,
        });
      });

      if (this.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          signalGroup(child, "SIGTERM");
          killTimer = setTimeout(() => {
            signalGroup(child, "SIGKILL");
          }, this.killGraceMs);
        }, this.timeoutMs);
      }
    });
  }
}
