// pattern: Imperative Shell

import { constants, createWriteStream, rmSync } from "node:fs";
import { chmod, copyFile, mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";

import archiver from "archiver";

import {
  registerShutdownHook,
  type RegisterShutdownHook,
} from "../utils/shutdown.js";

import type { SealResult, StageFn, StageResult, StagingArea } from "./types.js";
import type { Logger } from "pino";

export type { SealResult, StageFn, StageResult, StagingArea } from "./types.js";

export const ARCHIVE_EXTENSION = "tar.gz";

export interface ArchiveManagerOptions {
  // Directory the archive is written to
  archiveDir: string;
  logger: Logger;
  // Parent of the staging directory, os.tmpdir() by default
  stagingParent?: string;
  now?: () => Date;
  registerHook?: RegisterShutdownHook;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function archiveFileName(date: Date): string {
  return `logs_${formatTimestamp(date)}.${ARCHIVE_EXTENSION}`;
}

function errorCode(error: unknown): unknown {
  return error instanceof Error ? Reflect.get(error, "code") : undefined;
}

/**
 * Write a gzip-compressed tar of the named files of a directory.
 * An existing file at archivePath is never replaced.
 */
async function writeTarGz(
  archivePath: string,
  sourceDir: string,
  entries: string[]
): Promise<void> {
  const output = createWriteStream(archivePath, { flags: "wx" });
  const archive = archiver("tar", { gzip: true, gzipOptions: { level: 9 } });

  // Settles once the file is closed, so a failed archive can be removed
  const written = new Promise<void>((resolve, reject) => {
    let failure: Error | undefined;
    const fail = (error: Error): void => {
      failure ??= error;
      archive.abort();
      output.destroy();
    };
    output.on("close", () => (failure ? reject(failure) : resolve()));
    output.on("error", fail);
    archive.on("error", fail);
    // A staged file that vanished would leave the archive short of an entry
    archive.on("warning", fail);
  });

  archive.pipe(output);
  for (const name of entries) {
    archive.file(join(sourceDir, name), { name });
  }

  await Promise.all([archive.finalize(), written]);
}

/**
 * Owns the staging directory and the archive built from it.
 *
 * Every open() must be matched by close(); withStagingArea() does that in a
 * finally block, and a shutdown hook covers SIGINT/SIGTERM in between.
 */
export class ArchiveManager {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly registerHook: RegisterShutdownHook;
  private readonly unregister = new Map<StagingArea, () => void>();

  constructor(private readonly options: ArchiveManagerOptions) {
    this.logger = options.logger.child({ component: "archive" });
    this.now = options.now ?? (() => new Date());
    this.registerHook = options.registerHook ?? registerShutdownHook;
  }

  /**
   * Create a process-unique, world-writable staging directory
   */
  async open(): Promise<StagingArea> {
    const path = await mkdtemp(
      join(this.options.stagingParent ?? tmpdir(), "adrlogs-")
    );
    const area: StagingArea = { path, staged: [], closed: false };

    // The copy may run under another identity than the archiver
    try {
      await chmod(path, 0o777);
    } catch (error) {
      this.logger.warn(
        `could not make staging directory ${path} world-writable: ${toError(error).message}`
      );
    }

    this.unregister.set(
      area,
      this.registerHook(() => {
        rmSync(path, { recursive: true, force: true });
      }, this.logger)
    );
    this.logger.debug({ stagingDir: path }, "Opened staging area");
    return area;
  }

  /**
   * Copy a file into the area under its base name. Never throws.
   */
  async stage(area: StagingArea, sourcePath: string): Promise<StageResult> {
    const name = basename(sourcePath);
    const stagedPath = join(area.path, name);
    try {
      if (area.closed) {
        throw new Error("staging area is closed");
      }
      // EXCL: a second file with the same base name must not replace the first
      await copyFile(sourcePath, stagedPath, constants.COPYFILE_EXCL);
      area.staged.push(name);
      return { ok: true, sourcePath, stagedPath };
    } catch (error) {
      return { ok: false, sourcePath, stagingDir: area.path, cause: toError(error) };
    }
  }

  /**
   * A StageFn bound to an area, for the extractor
   */
  stager(area: StagingArea): StageFn {
    return async sourcePath => await this.stage(area, sourcePath);
  }

  /**
   * Compress the area's contents into <archiveDir>/logs_<timestamp>.tar.gz
   */
  async seal(area: StagingArea): Promise<SealResult> {
    let entries: string[];
    try {
      entries = (await readdir(area.path)).sort();
    } catch (error) {
      this.logger.warn(
        `cannot read staging directory ${area.path}: ${toError(error).message}`
      );
      entries = [];
    }

    if (entries.length === 0) {
      this.logger.warn("no logs were staged; archive not created");
      return { status: "skipped" };
    }

    const archivePath = join(this.options.archiveDir, archiveFileName(this.now()));
    try {
      await writeTarGz(archivePath, area.path, entries);
    } catch (error) {
      const cause = toError(error);
      if (errorCode(cause) === "EEXIST") {
        this.logger.warn(`archive ${archivePath} already exists; not overwriting it`);
        return { status: "failed", archivePath, cause };
      }
      await rm(archivePath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug({ err: cleanupError }, "Could not remove partial archive");
      });
      this.logger.warn(`could not create archive ${archivePath}: ${cause.message}`);
      return { status: "failed", archivePath, cause };
    }

    this.logger.info(`archive created: ${archivePath} (${entries.length} files)`);
    return { status: "sealed", archivePath, entries };
  }

  /**
   * Remove the staging directory. Safe to call more than once.
   */
  async close(area: StagingArea): Promise<void> {
    this.unregister.get(area)?.();
    this.unregister.delete(area);
    if (area.closed) {
      return;
    }
    area.closed = true;
    try {
      await rm(area.path, { recursive: true, force: true });
      this.logger.debug({ stagingDir: area.path }, "Removed staging area");
    } catch (error) {
      this.logger.warn(
        `could not remove staging directory ${area.path}: ${toError(error).message}`
      );
    }
  }
}

/**
 * Open a staging area, run fn, and close the area however fn ends
 */
export async function withStagingArea<T>(
  manager: ArchiveManager,
  fn: (area: StagingArea) => Promise<T>
): Promise<T> {
  const area = await manager.open();
  try {
    return await fn(area);
  } finally {
    await manager.close(area);
  }
}
