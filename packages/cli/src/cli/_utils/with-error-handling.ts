// pattern: Imperative Shell

import { CLI_LOGGER } from "../../logger/index.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * Fatal errors are analyzed into a message and suggestions, logged at error
 * level, and turned into exit code 1. The process is left to exit on its own
 * so that pending cleanup and log output complete first.
 *
 * @param action The action function to wrap with error handling
 * @returns Wrapped action function with consistent error handling
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      // Log user-friendly error message (unless it's empty for silent cancellation)
      if (analyzed.userMessage) {
        CLI_LOGGER.error(analyzed.userMessage);
        for (const suggestion of analyzed.suggestions) {
          CLI_LOGGER.info(`  • ${suggestion}`);
        }
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug(
          { err: error, category: analyzed.category },
          analyzed.technicalMessage
        );
      }

      CLI_LOGGER.flush();
      process.exitCode = 1;
    }
  };
}
