// pattern: Testing Infrastructure

import { Writable } from "node:stream";

import { type Logger, pino } from "pino";

export interface CapturedLogger {
  logger: Logger;
  // Parsed pino records, in order
  records: () => { level: number; msg: string }[];
  warnings: () => string[];
}

/**
 * A synchronous JSON logger whose records can be inspected
 */
export function createCapturedLogger(): CapturedLogger {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(...chunk.toString().split("\n").filter(Boolean));
      callback();
    },
  });
  const logger = pino({ level: "debug" }, sink);

  const records = (): { level: number; msg: string }[] =>
    lines.map(line => {
      const parsed: unknown = JSON.parse(line);
      const level: unknown =
        typeof parsed === "object" && parsed !== null
          ? Reflect.get(parsed, "level")
          : undefined;
      const msg: unknown =
        typeof parsed === "object" && parsed !== null
          ? Reflect.get(parsed, "msg")
          : undefined;
      return {
        level: typeof level === "number" ? level : 0,
        msg: typeof msg === "string" ? msg : "",
      };
    });

  return {
    logger,
    records,
    warnings: () =>
      records()
        .filter(record => record.level === 40)
        .map(record => record.msg),
  };
}
