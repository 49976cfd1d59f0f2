// pattern: Imperative Shell

import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

import type { Logger } from "pino";

const ALERT_LOG = /^alert.*\.log$/;
// Hidden files are never candidates, as with a shell glob
const ANY_LOG = /^[^.].*\.log$/;

/**
 * Which files of a trace directory get processed
 */
export type LogSelection =
  | { mode: "alert"; files: string[] }
  | { mode: "latest"; files: [string] }
  | { mode: "none"; files: [] };

/**
 * Log file names directly in a directory, sorted the way a shell glob expands
 */
async function listLogNames(dir: string, pattern: RegExp): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(
      entry =>
        (entry.isFile() || entry.isSymbolicLink()) && pattern.test(entry.name)
    )
    .map(entry => entry.name)
    .sort();
}

/**
 * The entry with the greatest mtime. Ties go to the earlier name.
 */
async function newestOf(
  dir: string,
  names: string[],
  logger: Logger
): Promise<string | undefined> {
  let newest: { name: string; mtimeMs: number } | undefined;

  for (const name of names) {
    let mtimeMs: number;
    try {
      ({ mtimeMs } = await stat(join(dir, name)));
    } catch (error) {
      logger.debug({ err: error, file: join(dir, name) }, "Skipping unstattable log");
      continue;
    }
    if (!newest || mtimeMs > newest.mtimeMs) {
      newest = { name, mtimeMs };
    }
  }

  return newest?.name;
}

/**
 * Apply the selection rule to a trace directory: every alert*.log if there
 * is one, otherwise the most recently modified *.log, otherwise nothing.
 * A trace directory that does not exist selects nothing.
 */
export async function selectLogs(
  traceDir: string,
  logger: Logger
): Promise<LogSelection> {
  let alertLogs: string[];
  try {
    alertLogs = await listLogNames(traceDir, ALERT_LOG);
  } catch (error) {
    const code: unknown =
      error instanceof Error ? Reflect.get(error, "code") : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      logger.debug({ traceDir }, "No trace directory");
      return { mode: "none", files: [] };
    }
    throw error;
  }

  if (alertLogs.length > 0) {
    return { mode: "alert", files: alertLogs.map(name => join(traceDir, name)) };
  }

  const latest = await newestOf(
    traceDir,
    await listLogNames(traceDir, ANY_LOG),
    logger
  );
  if (latest === undefined) {
    return { mode: "none", files: [] };
  }
  return { mode: "latest", files: [join(traceDir, latest)] };
}
