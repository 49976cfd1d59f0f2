// pattern: Functional Core

import { type DestinationStream, type Level, type Logger, type LevelWithSilent, type LoggerOptions, pino } from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat } from "./types.js";

// Map our LogLevel to pino's string levels
export function mapLogLevelToPinoLevel(logLevel: Level): LevelWithSilent {
  switch (logLevel) {
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

/**
 * Create the CLI logger. Diagnostics always go to stderr so that rendered
 * log text on stdout stays clean for piping.
 *
 * @param destination Overrides stderr, used by tests to capture output
 */
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean,
  destination?: NodeJS.WritableStream
): Logger {
  const baseConfig: LoggerOptions = {
    name: "adrlogs",
    level: "info",
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) return err;

        if (format === "nice") {
          return {
            message: err.message,
            stack: err.stack,
          };
        }

        return pino.stdSerializers.err(err);
      },
    },
  };

  let stream: DestinationStream;
  if (format === "nice") {
    // For nice format, use the renderer to convert JSON to prefixed lines
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(destination ?? process.stderr);
    stream = renderer;
  } else if (destination) {
    stream = destination;
  } else {
    stream = pino.destination(2); // stderr
  }

  return pino(baseConfig, stream);
}
