export { loadConfig, LOG_LEVELS } from "./config.js";
export type { HareConfig, LogLevel } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

export { OutcomeReporter, redactUrl } from "./reporter.js";

export { runDaemon } from "./daemon.js";
export type { DaemonHandle, DaemonOptions } from "./daemon.js";

export { runMain, ExitCode } from "./main.js";
export type { MainOptions, SignalSource } from "./main.js";
