/**
 * Diagnostic logging for resumecraft.
 *
 * Each module gets a tagged logger ([WXAI], [PDF], ...) backed by one consola
 * instance on stderr, so diagnostics never interleave with the clack UI on
 * stdout. `LOG_LEVEL` picks the starting level (default `warn`); `--verbose`
 * raises it to `debug` through setLogLevel().
 */

import { createConsola, LogLevels } from "consola";

export type LogLevelName = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  debug: LogLevels.debug,
  info: LogLevels.info,
  warn: LogLevels.warn,
  error: LogLevels.error,
  silent: LogLevels.silent,
};

function isLogLevelName(value: string): value is LogLevelName {
  return value in LOG_LEVEL_MAP;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? "warn";

const base = createConsola({
  level: isLogLevelName(envLevel) ? LOG_LEVEL_MAP[envLevel] : LogLevels.warn,
  stderr: process.stderr,
});
base.options.stdout = process.stderr;

/** Update log level at runtime (e.g. when --verbose flag is parsed) */
export function setLogLevel(name: LogLevelName) {
  base.level = LOG_LEVEL_MAP[name];
}

const MODULE_TAGS: Record<string, string> = {
  cli: "CLI",
  pipeline: "PIPE",
  watsonx: "WXAI",
  render: "PDF",
  artifacts: "OUT",
};

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** Create a tagged logger that always delegates to the base instance */
export function createLogger(module: string): Logger {
  const tag = MODULE_TAGS[module] ?? module.toUpperCase();
  return {
    debug: (...args: unknown[]) => base.debug(`[${tag}]`, ...args),
    info: (...args: unknown[]) => base.info(`[${tag}]`, ...args),
    warn: (...args: unknown[]) => base.warn(`[${tag}]`, ...args),
    error: (...args: unknown[]) => base.error(`[${tag}]`, ...args),
  };
}

export const logger = {
  cli: createLogger("cli"),
  pipeline: createLogger("pipeline"),
  watsonx: createLogger("watsonx"),
  render: createLogger("render"),
  artifacts: createLogger("artifacts"),
};
