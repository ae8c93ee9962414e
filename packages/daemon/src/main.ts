/**
 * The hared entry point, minus process exit: load config, run the daemon
 * until a signal or a fatal error, and map the result to an exit code.
 */

import { ConfigurationError } from "@hare/dispatch";
import { loadConfig } from "./config.js";
import type { HareConfig } from "./config.js";
import { runDaemon } from "./daemon.js";
import type { DaemonOptions } from "./daemon.js";

export const ExitCode = {
  /** Stopped by SIGINT or SIGTERM. */
  STOPPED: 0,
  /** The dispatch loop failed. */
  FAILED: 1,
  /** The configuration was rejected. */
  BAD_CONFIG: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

type SignalListener = (signal: NodeJS.Signals) => void;

/** Where shutdown signals come from. `process` satisfies it. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  off(signal: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface MainOptions extends DaemonOptions {
  /** Default: process */
  signals?: SignalSource;
  /** Receives configuration errors, one line per call. Default: console.error */
  errorLog?: (line: string) => void;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export async function runMain(
  env: Record<string, string | undefined> = process.env,
  options: MainOptions = {},
): Promise<ExitCode> {
  const { signals: signalOption, errorLog: errorLogOption, ...daemonOptions } = options;
  const signals: SignalSource = signalOption ?? process;
  const errorLog = errorLogOption ?? console.error;

  let config: Readonly<HareConfig>;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      errorLog("hared: invalid configuration");
      for (const issue of err.issues) {
        errorLog(`  ${issue}`);
      }
      return ExitCode.BAD_CONFIG;
    }
    throw err;
  }

  const daemon = runDaemon(config, daemonOptions);

  const shutdown: SignalListener = (signal) => {
    daemon.logger.info({ signal }, "Shutting down");
    daemon.stop().catch((err: unknown) => {
      daemon.logger.error({ err }, "Shutdown failed");
    });
  };
  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, shutdown);
  }

  try {
    await daemon.done;
    return ExitCode.STOPPED;
  } catch {
    // Already logged at fatal by the reporter
    return ExitCode.FAILED;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, shutdown);
    }
  }
}
