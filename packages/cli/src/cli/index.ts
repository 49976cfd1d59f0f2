// pattern: Imperative Shell

import {
  Argument,
  Command,
  InvalidArgumentError,
  Option,
} from "@commander-js/extra-typings";

import {
  type ComponentSelection,
  parseComponentToken,
} from "../adr/component-kind.js";
import { promptForComponent } from "../cli-helpers/interactive-prompts.js";
import {
  getCliLogger,
  initializeLogger,
  isLogFormat,
  isLogLevel,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
  setCliLogLevel,
} from "../logger/index.js";
import {
  currentIdentity,
  type RunContext,
  type RunDependencies,
  runLogFetch,
  type RunSummary,
} from "../runner/index.js";
import { defaultSettingsPath, loadSettings } from "../settings/loader.js";
import { createCommandRunner } from "../utils/command/index.js";
import { UsageError } from "../utils/errors.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";

export const VERSION = "0.1.0";

const MAX_LINES = 100000;

interface RootOptions {
  help?: boolean | undefined;
  archive?: boolean | undefined;
  grep?: boolean | undefined;
  lines?: number | undefined;
  config?: string | undefined;
  logLevel: LogLevel;
  format: LogFormat;
}

function parseComponent(value: string): ComponentSelection {
  const selection = parseComponentToken(value);
  if (selection === undefined) {
    throw new InvalidArgumentError(
      "Expected one of: database, asm, crs, listener, all."
    );
  }
  return selection;
}

function parseLineCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value) || count < 1 || count > MAX_LINES) {
    throw new InvalidArgumentError(
      `Expected a whole number from 1 to ${MAX_LINES}.`
    );
  }
  return count;
}

// Determine defaults based on environment
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env["ADRLOGS_LOG_LEVEL"];
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

export function isNonInteractive(): boolean {
  return (
    !process.stderr.isTTY || process.env["ADRLOGS_NON_INTERACTIVE"] === "1"
  );
}

// "nice" everywhere; only colour depends on the terminal
export function getDefaultLogFormat(): LogFormat {
  const envFormat = process.env["ADRLOGS_LOG_FORMAT"];
  if (envFormat && isLogFormat(envFormat)) {
    return envFormat;
  }
  return "nice";
}

export interface RootCommandDependencies {
  run?: (context: RunContext, deps: RunDependencies) => Promise<RunSummary>;
}

/**
 * Build the adrlogs command. `-h` prints usage to stdout and then carries on
 * with the run, so it is a plain option rather than Commander's help flag.
 * Usage errors raised by the run print usage to stderr before the error.
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeRootCommand(deps: RootCommandDependencies = {}) {
  const run = deps.run ?? runLogFetch;
  const command = new Command("adrlogs")
    .version(VERSION)
    .description(
      "Show the current Oracle ADR logs of this host and optionally archive them"
    )
    .helpOption(false)
    .addOption(new Option("-h, --help", "Print usage, then continue"))
    .addOption(
      new Option(
        "-z, --archive",
        "Copy the selected logs into a logs_<timestamp>.tar.gz archive"
      )
    )
    .addOption(
      new Option("-g, --grep", "Also print the lines matching the filter patterns")
    )
    .addOption(
      new Option("-n, --lines <count>", "Lines to show per log").argParser(
        parseLineCount
      )
    )
    .addOption(
      new Option(
        "-c, --config <path>",
        "Settings file (default $ADRLOGS_CONFIG or ~/.adrlogs.yaml)"
      )
    )
    .addOption(
      new Option("-l, --log-level <level>", "Set log level")
        .choices(LOG_LEVELS)
        .default(getDefaultLogLevel())
    )
    .addOption(
      new Option("-f, --format <format>", "Diagnostic output format")
        .choices(LOG_FORMATS)
        .default(getDefaultLogFormat())
    )
    .addArgument(
      new Argument(
        "[component]",
        "database, asm, crs, listener or all; a menu is shown when omitted"
      ).argParser(parseComponent)
    )
    .showHelpAfterError()
    .hook("preAction", thisCommand => {
      // Configure the CLI logger before the action runs
      const { logLevel, format } = thisCommand.opts();
      initializeLogger(format, isNonInteractive());
      setCliLogLevel(logLevel);
      getCliLogger().debug(
        `Log level configured to: ${logLevel}, format: ${format}`
      );
    });

  command.action(
    withErrorHandling(
      async (
        component: ComponentSelection | undefined,
        options: RootOptions
      ): Promise<void> => {
        if (options.help) {
          command.outputHelp();
        }

        const logger = getCliLogger();
        const settingsPath = options.config ?? defaultSettingsPath();
        let settings = await loadSettings(
          settingsPath,
          options.config !== undefined
        );
        if (options.lines !== undefined) {
          settings = { ...settings, tailLines: options.lines };
        }
        logger.debug({ settingsPath, settings }, "Loaded settings");

        const context: RunContext = {
          identity: currentIdentity(),
          archive: options.archive === true,
          filter: options.grep === true,
          settings,
          ...(component !== undefined ? { requested: component } : {}),
        };

        try {
          await run(context, {
            runner: createCommandRunner(logger),
            logger,
            prompt: promptForComponent,
            output: process.stdout,
          });
        } catch (error) {
          if (error instanceof UsageError) {
            command.outputHelp({ error: true });
          }
          throw error;
        }
      }
    )
  );

  return command;
}
