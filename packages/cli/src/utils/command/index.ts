// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa, ExecaError, type Options } from "execa";

import type { Logger } from "pino";

/**
 * A command builder with logging integration.
 * Handles environment variables, timeouts and stderr logging.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private env: Record<string, string>;
  private childLogger: Logger;
  private timeoutMs?: number;
  private inheritEnv = true;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Run with exactly the given environment instead of merging into process.env
   */
  replaceEnv(envVars: Record<string, string>): this {
    this.env = { ...envVars };
    this.inheritEnv = false;
    return this;
  }

  /**
   * Kill the process if it runs longer than the given time
   */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  /**
   * Execute the command and return trimmed stdout
   * stderr is automatically logged at DEBUG level
   */
  async output(): Promise<string> {
    this.childLogger.debug(
      {
        command: this.command,
        argCount: this.args.length,
        timeoutMs: this.timeoutMs,
      },
      "Executing command"
    );

    try {
      const options: Options = {
        env: this.env,
        extendEnv: this.inheritEnv,
        stderr: "pipe",
        stdout: "pipe",
        stdin: "ignore",
        ...(this.timeoutMs !== undefined && { timeout: this.timeoutMs }),
      };

      const result = await execa(this.command, this.args, options);

      // Log stderr at debug level if present
      if (typeof result.stderr === "string" && result.stderr.trim()) {
        this.childLogger.debug(
          { stderr: result.stderr },
          "Command stderr output"
        );
      }

      this.childLogger.debug(
        {
          exitCode: result.exitCode,
          duration: result.durationMs,
        },
        "Command completed successfully"
      );

      // Since we set stdout: 'pipe', it should be a string
      if (typeof result.stdout === "string") {
        return result.stdout.trim();
      }
      return "";
    } catch (error) {
      if (error instanceof ExecaError) {
        this.childLogger.debug(
          {
            error: error.message,
            stderr: error.stderr,
            exitCode: error.exitCode,
          },
          "Command execution failed"
        );
      }

      throw error;
    }
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}

/**
 * Runs an external program to completion and returns its stdout.
 * The seam between adrlogs and execa; tests supply in-process fakes.
 */
export interface CommandRunner {
  run(
    command: string,
    args: string[],
    options: { env: Record<string, string>; timeoutMs?: number }
  ): Promise<string>;
}

/**
 * CommandRunner backed by CommandBuilder (execa)
 */
export function createCommandRunner(logger: Logger): CommandRunner {
  return {
    run: async (command, args, options) => {
      const builder = createCommand(command, logger)
        .addArgs(args)
        .replaceEnv(options.env);
      if (options.timeoutMs !== undefined) {
        builder.timeout(options.timeoutMs);
      }
      return await builder.output();
    },
  };
}
