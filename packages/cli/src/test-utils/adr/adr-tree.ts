// pattern: Testing Infrastructure
// Throwaway ADR base directories for extractor and runner tests

import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export interface TempAdrBase {
  baseDir: string;
  // Write a log under <base>/<relativePath>, optionally with a fixed mtime (seconds)
  writeLog: (relativePath: string, content: string, mtime?: number) => Promise<string>;
  cleanup: () => Promise<void>;
}

export async function createTempAdrBase(): Promise<TempAdrBase> {
  const baseDir = await mkdtemp(join(tmpdir(), "adrlogs-base-"));

  return {
    baseDir,
    writeLog: async (relativePath, content, mtime) => {
      const filePath = join(baseDir, relativePath);
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, "utf8");
      if (mtime !== undefined) {
        await utimes(filePath, mtime, mtime);
      }
      return filePath;
    },
    cleanup: async () => {
      await rm(baseDir, { recursive: true, force: true });
    },
  };
}

/**
 * `count` numbered lines with a prefix, newline-terminated
 */
export function numberedLines(prefix: string, count: number): string {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}\n`).join("");
}
