// pattern: Imperative Shell

import { userInfo } from "node:os";

import {
  type ComponentKind,
  type ComponentSelection,
} from "../adr/component-kind.js";
import {
  createAdrciClient,
  type ProbeDependencies,
  probeEnvironment,
} from "../adr/environment-probe.js";
import {
  type DiagnosticHome,
  groupHomesByKind,
  listHomes,
} from "../adr/home-catalog.js";
import {
  ArchiveManager,
  type ArchiveManagerOptions,
  type SealResult,
  type StageFn,
  withStagingArea,
} from "../archive/index.js";
import {
  type ComponentReport,
  type ExtractOptions,
  extractComponent,
  type OutputSink,
} from "../extractor/index.js";
import {
  type ChoicePrompt,
  checkHomeCoverage,
  resolveComponents,
} from "../selector/index.js";
import { QueryFailedError } from "../utils/errors.js";

import type { Settings } from "../settings/schema.js";
import type { CommandRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

/**
 * Everything a run is configured with, built once at start-up
 */
export interface RunContext {
  identity: string;
  // Component named on the command line; the menu decides when absent
  requested?: ComponentSelection;
  archive: boolean;
  filter: boolean;
  settings: Settings;
}

export interface RunSummary {
  components: ComponentKind[];
  homesVisited: number;
  filesProcessed: number;
  stagedFiles: string[];
  archivePath?: string;
  // Non-fatal conditions reported during the run
  warnings: number;
}

export interface RunDependencies {
  runner: CommandRunner;
  logger: Logger;
  prompt: ChoicePrompt;
  output: OutputSink;
  probeOptions?: Omit<ProbeDependencies, "runner" | "logger">;
  archiveOptions?: Omit<ArchiveManagerOptions, "archiveDir" | "logger">;
}

/**
 * Name of the invoking user, from the passwd entry or $USER
 */
export function currentIdentity(env: NodeJS.ProcessEnv = process.env): string {
  try {
    return userInfo().username;
  } catch {
    return env["USER"] ?? "oracle";
  }
}

function catalogSelection(kinds: readonly ComponentKind[]): ComponentSelection {
  const [only] = kinds;
  return kinds.length === 1 && only !== undefined ? only : "all";
}

/**
 * Probe, select, catalog, extract and optionally archive, once.
 *
 * @throws ToolUnavailableError, CapabilityMismatchError,
 *   NoComponentsAvailableError, NoHomesFoundError, UserCancellationError
 */
export async function runLogFetch(
  context: RunContext,
  deps: RunDependencies
): Promise<RunSummary> {
  const { settings } = context;
  const logger = deps.logger;
  let warnings = 0;

  const environment = await probeEnvironment(context.identity, settings, {
    runner: deps.runner,
    logger,
    ...deps.probeOptions,
  });
  warnings += environment.queryFailures.length;

  const kinds = await resolveComponents(
    context.requested,
    environment,
    deps.prompt,
    logger
  );
  logger.debug({ components: kinds }, "Resolved components");

  let homes: DiagnosticHome[] = [];
  try {
    const client = createAdrciClient(
      environment,
      deps.runner,
      settings.queryTimeoutMs
    );
    homes = (
      await listHomes(catalogSelection(kinds), environment, client)
    ).filter(home => kinds.includes(home.kind));
  } catch (error) {
    if (!(error instanceof QueryFailedError)) {
      throw error;
    }
    warnings++;
    logger.warn(`${error.message}; no homes can be listed`);
  }

  warnings += kinds.filter(kind => !homes.some(home => home.kind === kind)).length;
  checkHomeCoverage(kinds, homes, logger);

  const groups = groupHomesByKind(homes);
  const extractAll = async (stage?: StageFn): Promise<ComponentReport[]> => {
    const options: ExtractOptions = {
      tailLines: settings.tailLines,
      ...(context.filter ? { filterPatterns: settings.filterPatterns } : {}),
      ...(stage ? { stage } : {}),
    };
    const reports: ComponentReport[] = [];
    for (const kind of kinds) {
      const kindHomes = groups.get(kind);
      if (!kindHomes) {
        continue;
      }
      reports.push(
        await extractComponent(kind, kindHomes, options, {
          logger,
          output: deps.output,
        })
      );
    }
    return reports;
  };

  let reports: ComponentReport[];
  let sealed: SealResult | undefined;
  if (context.archive) {
    const manager = new ArchiveManager({
      archiveDir: settings.archiveDir,
      logger,
      ...deps.archiveOptions,
    });
    [reports, sealed] = await withStagingArea(
      manager,
      async area =>
        [
          await extractAll(manager.stager(area)),
          await manager.seal(area),
        ] as const
    );
  } else {
    reports = await extractAll();
  }

  for (const report of reports) {
    warnings += report.unreadable.length + report.stageFailures.length;
    if (report.processed.length === 0) {
      warnings++;
    }
  }
  if (sealed && sealed.status !== "sealed") {
    warnings++;
  }

  const summary: RunSummary = {
    components: kinds,
    homesVisited: reports.reduce((sum, report) => sum + report.homesVisited, 0),
    filesProcessed: reports.reduce(
      (sum, report) => sum + report.processed.length,
      0
    ),
    stagedFiles: reports.flatMap(report => report.staged),
    ...(sealed?.status === "sealed" ? { archivePath: sealed.archivePath } : {}),
    warnings,
  };

  logger.info(
    `processed ${summary.filesProcessed} log files from ${summary.homesVisited} homes (${kinds.join(", ")})` +
      (summary.warnings > 0 ? ` with ${summary.warnings} warnings` : "")
  );
  return summary;
}
