// pattern: Imperative Shell

import { homedir } from "node:os";
import { delimiter, join } from "node:path";

import which from "which";

import { QueryFailedError, ToolUnavailableError } from "../utils/errors.js";

import { AdrciClient } from "./adrci.js";
import {
  capabilityMarker,
  COMPONENT_KINDS,
  type ComponentKind,
} from "./component-kind.js";
import { loadProfileEnvironment, toStringEnv } from "./profile.js";

import type { Settings } from "../settings/schema.js";
import type { CommandRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

export type Capabilities = Record<ComponentKind, boolean>;

// Where the base directory came from, in order of precedence
export type BaseSource = "settings" | "environment" | "adrci" | "fallback";

/**
 * What the host offers, derived once per run and read-only afterwards
 */
export interface Environment {
  identity: string;
  baseDir: string;
  baseSource: BaseSource;
  capabilities: Capabilities;
  adrciPath: string;
  env: Record<string, string>;
  queryFailures: QueryFailedError[];
}

export type ExecutableLocator = (
  name: string,
  searchPath: string
) => Promise<string | null>;

export interface ProbeDependencies {
  runner: CommandRunner;
  logger: Logger;
  locateExecutable?: ExecutableLocator;
  homeDir?: string;
  baseEnv?: Record<string, string>;
}

const whichLocator: ExecutableLocator = async (name, searchPath) =>
  await which(name, { path: searchPath, nothrow: true });

/**
 * Test the raw home listing for each kind's path marker
 */
export function computeCapabilities(homeListing: string): Capabilities {
  const has = (kind: ComponentKind): boolean =>
    homeListing.includes(capabilityMarker(kind));
  return {
    database: has("database"),
    asm: has("asm"),
    crs: has("crs"),
    listener: has("listener"),
  };
}

/**
 * Kinds whose capability flag is set, in menu order
 */
export function availableKinds(capabilities: Capabilities): ComponentKind[] {
  return COMPONENT_KINDS.filter(kind => capabilities[kind]);
}

/**
 * PATH plus $ORACLE_HOME/bin, where adrci normally lives
 */
export function toolSearchPath(env: Record<string, string>): string {
  const entries: string[] = [];
  if (env["PATH"]) {
    entries.push(env["PATH"]);
  }
  if (env["ORACLE_HOME"]) {
    entries.push(join(env["ORACLE_HOME"], "bin"));
  }
  return entries.join(delimiter);
}

export function fallbackBaseFor(template: string, identity: string): string {
  return template.replaceAll("{identity}", identity);
}

/**
 * Whether `show homes` must be told the base explicitly
 */
export function needsExplicitBase(source: BaseSource): boolean {
  return source === "settings" || source === "environment";
}

/**
 * Probe the host's diagnostic environment.
 *
 * @throws ToolUnavailableError when adrci cannot be located
 */
export async function probeEnvironment(
  identity: string,
  settings: Settings,
  deps: ProbeDependencies
): Promise<Environment> {
  const logger = deps.logger.child({ component: "probe" });
  const locate = deps.locateExecutable ?? whichLocator;
  const baseEnv = deps.baseEnv ?? toStringEnv(process.env);
  const profilePath =
    settings.profilePath ?? join(deps.homeDir ?? homedir(), ".bash_profile");

  const env = await loadProfileEnvironment(
    profilePath,
    baseEnv,
    deps.runner,
    logger,
    settings.queryTimeoutMs
  );

  const searchPath = toolSearchPath(env);
  const adrciPath = await locate(settings.adrciPath ?? "adrci", searchPath);
  if (!adrciPath) {
    throw new ToolUnavailableError(settings.adrciPath ?? "adrci", searchPath);
  }
  logger.debug({ adrciPath }, "Located adrci");

  const client = new AdrciClient(
    adrciPath,
    env,
    deps.runner,
    settings.queryTimeoutMs
  );
  const queryFailures: QueryFailedError[] = [];

  let baseDir: string;
  let baseSource: BaseSource;
  const envBase = env["ADR_BASE"];
  if (settings.adrBase) {
    baseDir = settings.adrBase;
    baseSource = "settings";
  } else if (envBase) {
    baseDir = envBase;
    baseSource = "environment";
  } else {
    try {
      baseDir = await client.showBase();
      baseSource = "adrci";
    } catch (error) {
      if (!(error instanceof QueryFailedError)) {
        throw error;
      }
      queryFailures.push(error);
      baseDir = fallbackBaseFor(settings.fallbackBase, identity);
      baseSource = "fallback";
      logger.warn(`${error.message}; using ${baseDir} as ADR base`);
    }
  }

  let homeListing = "";
  try {
    homeListing = await client.showHomes(
      needsExplicitBase(baseSource) ? baseDir : undefined
    );
  } catch (error) {
    if (!(error instanceof QueryFailedError)) {
      throw error;
    }
    queryFailures.push(error);
    logger.warn(`${error.message}; no components can be detected`);
  }

  const capabilities = computeCapabilities(homeListing);
  logger.debug(
    { identity, baseDir, baseSource, capabilities },
    "Probed diagnostic environment"
  );

  return {
    identity,
    baseDir,
    baseSource,
    capabilities,
    adrciPath,
    env,
    queryFailures,
  };
}

/**
 * adrci client bound to a probed environment
 */
export function createAdrciClient(
  environment: Environment,
  runner: CommandRunner,
  timeoutMs: number
): AdrciClient {
  return new AdrciClient(environment.adrciPath, environment.env, runner, timeoutMs);
}
