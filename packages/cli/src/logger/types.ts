// pattern: Functional Core

import { type Level } from "pino";

export type LogLevel = Level;

// "nice" renders through the chalk renderer, "json" writes raw pino lines
export type LogFormat = "nice" | "json";

export const LOG_LEVELS = [
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const satisfies readonly LogLevel[];

export const LOG_FORMATS = ["nice", "json"] as const satisfies readonly LogFormat[];

export function isLogLevel(value: string): value is (typeof LOG_LEVELS)[number] {
  return LOG_LEVELS.some(level => level === value);
}

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}
