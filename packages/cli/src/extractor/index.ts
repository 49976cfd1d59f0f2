// pattern: Imperative Shell

import { basename, join } from "node:path";

import { describePath, probeWritable } from "./file-diagnostics.js";
import { type LogSelection, selectLogs } from "./log-selection.js";
import { grepFile, readTail } from "./readers.js";

import type { ComponentKind } from "../adr/component-kind.js";
import type { DiagnosticHome } from "../adr/home-catalog.js";
import type { StageFn } from "../archive/types.js";
import type { Logger } from "pino";

export type { LogSelection } from "./log-selection.js";

// Subdirectory of an ADR home holding its text logs
export const TRACE_DIR = "trace";

/**
 * Where rendered log text goes; process.stdout in the CLI
 */
export interface OutputSink {
  write(text: string): void;
}

export interface ExtractOptions {
  tailLines: number;
  // Set when filter mode is on
  filterPatterns?: readonly string[];
  // Set when archive mode is on
  stage?: StageFn;
}

export interface ExtractDependencies {
  logger: Logger;
  output: OutputSink;
}

/**
 * Outcome of one component's extraction
 */
export interface ComponentReport {
  kind: ComponentKind;
  homesVisited: number;
  // Files whose tail was rendered
  processed: string[];
  unreadable: string[];
  // Base names staged successfully
  staged: string[];
  stageFailures: string[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function homeHeader(kind: ComponentKind, home: DiagnosticHome): string {
  return `==== ${kind}: ${home.relativePath} ====\n`;
}

export function tailHeader(filePath: string, lineCount: number): string {
  return `---- ${filePath} (last ${lineCount} lines) ----\n`;
}

export function matchHeader(filePath: string, patterns: readonly string[]): string {
  return `---- ${filePath} (lines matching ${patterns.join(", ")}) ----\n`;
}

function renderLines(lines: readonly string[]): string {
  return lines.map(line => `${line}\n`).join("");
}

async function stageFile(
  filePath: string,
  stage: StageFn,
  logger: Logger,
  report: ComponentReport
): Promise<void> {
  const result = await stage(filePath);
  if (result.ok) {
    report.staged.push(basename(result.stagedPath));
    logger.debug({ file: filePath, stagedPath: result.stagedPath }, "Staged log");
    return;
  }
  report.stageFailures.push(filePath);
  const source = await describePath(result.sourcePath);
  const stagingDir = await describePath(result.stagingDir);
  const writable = await probeWritable(result.stagingDir);
  logger.warn(
    `could not stage ${filePath}: ${result.cause.message}; source ${source}; staging ${stagingDir} (${writable})`
  );
}

/**
 * Render, filter and stage one selected log. A log that cannot be read is
 * still offered to the archive, which reports its own failure.
 */
async function processFile(
  filePath: string,
  options: ExtractOptions,
  deps: ExtractDependencies,
  report: ComponentReport
): Promise<void> {
  const { logger, output } = deps;

  let tail: string[] | undefined;
  try {
    tail = await readTail(filePath, options.tailLines);
  } catch (error) {
    report.unreadable.push(filePath);
    logger.warn(
      `cannot read ${filePath}: ${errorMessage(error)}; ${await describePath(filePath)}`
    );
  }

  if (tail !== undefined) {
    report.processed.push(filePath);
    output.write(tailHeader(filePath, options.tailLines) + renderLines(tail));

    if (options.filterPatterns) {
      try {
        const matches = await grepFile(filePath, options.filterPatterns);
        output.write(
          matchHeader(filePath, options.filterPatterns) + renderLines(matches)
        );
      } catch (error) {
        logger.warn(`cannot filter ${filePath}: ${errorMessage(error)}`);
      }
    }
  }

  if (options.stage) {
    await stageFile(filePath, options.stage, logger, report);
  }
}

/**
 * Extract the logs of one component's homes, in the order given.
 * A failure on one file never stops the others.
 */
export async function extractComponent(
  kind: ComponentKind,
  homes: readonly DiagnosticHome[],
  options: ExtractOptions,
  deps: ExtractDependencies
): Promise<ComponentReport> {
  const logger = deps.logger.child({ component: "extractor" });
  const fileDeps: ExtractDependencies = { logger, output: deps.output };
  const report: ComponentReport = {
    kind,
    homesVisited: 0,
    processed: [],
    unreadable: [],
    staged: [],
    stageFailures: [],
  };

  for (const home of homes) {
    report.homesVisited++;
    const traceDir = join(home.path, TRACE_DIR);

    let selection: LogSelection;
    try {
      selection = await selectLogs(traceDir, logger);
    } catch (error) {
      logger.warn(
        `cannot list ${traceDir}: ${errorMessage(error)}; ${await describePath(traceDir)}`
      );
      continue;
    }

    if (selection.mode === "none") {
      continue;
    }
    logger.debug({ traceDir, mode: selection.mode }, "Selected logs");

    deps.output.write(homeHeader(kind, home));
    for (const filePath of selection.files) {
      await processFile(filePath, options, fileDeps, report);
    }
  }

  if (report.processed.length === 0) {
    logger.warn(`no logs found for ${kind}`);
  }

  return report;
}
