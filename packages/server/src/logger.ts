/* eslint-disable no-console */
import type { Logger } from "./core.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createConsoleLogger(namespace: string, level: LogLevel = "info"): Logger {
  const prefix = `[${namespace}]`;
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel): boolean =>
    LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    info(message: string, meta?: unknown): void {
      if (enabled("info")) {
        console.info(prefix, message, meta ?? "");
      }
    },
    warn(message: string, meta?: unknown): void {
      if (enabled("warn")) {
        console.warn(prefix, message, meta ?? "");
      }
    },
    error(message: string, meta?: unknown): void {
      if (enabled("error")) {
        console.error(prefix, message, meta ?? "");
      }
    },
    debug(message: string, meta?: unknown): void {
      if (enabled("debug") || process.env["DEBUG"]) {
        console.debug(prefix, message, meta ?? "");
      }
    },
  } satisfies Logger;
}
