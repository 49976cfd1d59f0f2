// pattern: Imperative Shell

import { access, constants } from "node:fs/promises";

import type { CommandRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

// Sources the profile quietly, then dumps the resulting environment NUL-separated
const SOURCE_AND_DUMP = '. "$1" >/dev/null 2>&1; env -0';

/**
 * Copy a process environment, dropping unset entries
 */
export function toStringEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Parse `env -0` output into a record
 */
export function parseEnvDump(dump: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of dump.split("\0")) {
    const separator = entry.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    result[entry.slice(0, separator).trim()] = entry.slice(separator + 1);
  }
  return result;
}

/**
 * Load the identity's shell profile into an environment record.
 *
 * The profile is sourced by bash so PATH edits, ORACLE_HOME and ADR_BASE
 * exports behave exactly as in a login shell. A missing or broken profile
 * is reported as a warning and the base environment is returned unchanged.
 */
export async function loadProfileEnvironment(
  profilePath: string,
  baseEnv: Record<string, string>,
  runner: CommandRunner,
  logger: Logger,
  timeoutMs: number
): Promise<Record<string, string>> {
  try {
    await access(profilePath, constants.R_OK);
  } catch {
    logger.warn(
      `profile ${profilePath} not found; ORACLE_HOME and PATH hints from it are unavailable`
    );
    return { ...baseEnv };
  }

  try {
    const dump = await runner.run(
      "bash",
      ["-c", SOURCE_AND_DUMP, "adrlogs-profile", profilePath],
      { env: baseEnv, timeoutMs }
    );
    const loaded = parseEnvDump(dump);
    logger.debug(
      { profilePath, variables: Object.keys(loaded).length },
      "Loaded shell profile"
    );
    return { ...baseEnv, ...loaded };
  } catch (error) {
    logger.warn(
      { err: error },
      `could not load profile ${profilePath}; continuing with the current environment`
    );
    return { ...baseEnv };
  }
}
