// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  msg?: string;
  [key: string]: unknown;
}

// Renderer options interface
export interface RendererOptions {
  colorize?: boolean;
}

// Format error object with stack trace
function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const message: unknown = Reflect.get(err, "message");
  const stack: unknown = Reflect.get(err, "stack");
  const lines: string[] = [];

  if (typeof message === "string" && message) {
    lines.push(chalk.yellow(`    ${message}`));
  }

  // Stack trace with deeper indentation, limited to 8 lines
  if (typeof stack === "string") {
    for (const line of stack.split("\n").slice(1, 9)) {
      const trimmedLine = line.trim();
      if (trimmedLine) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

/**
 * Format a single log object as one diagnostic line.
 * Warnings and errors carry the `warning:` and `error:` prefixes.
 */
export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  const {
    level,
    time: _time,
    msg,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    err,
    ...extra
  } = logObj;

  let levelDisplay: string;
  let msgColor: ChalkInstance = chalk.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = chalk.green("+");
      break;
    case 20: // debug
      levelDisplay = chalk.cyan("=");
      break;
    case 30: // info
      levelDisplay = chalk.gray(">");
      break;
    case 40: // warn
      levelDisplay = chalk.yellowBright("warning:");
      msgColor = chalk.yellow;
      break;
    case 50: // error
    case 60: // fatal
      levelDisplay = chalk.redBright("error:");
      msgColor = chalk.red;
      break;
    default:
      levelDisplay = chalk.gray("log:");
  }

  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, chalk) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${formattedMsg}${extraStr}${errorStr}\n`;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "level") === "number"
  );
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(
  options: RendererOptions = {}
): Transform {
  const chalk = new Chalk({ level: options.colorize ? 1 : 0 });

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback) {
      const formattedLines: string[] = [];

      for (const line of chunk.toString().split("\n")) {
        if (!line.trim()) {
          continue;
        }
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed)
              ? formatLogObject(parsed, chalk)
              : `${line}\n`
          );
        } catch {
          // If we can't parse a line, pass it through as-is
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
