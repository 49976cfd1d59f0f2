// pattern: Imperative Shell

import { constants } from "node:fs";
import { access, lstat } from "node:fs/promises";

function errorCode(error: unknown): string {
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, "code");
    return typeof code === "string" ? code : error.message;
  }
  return String(error);
}

/**
 * ls-style mode string, e.g. -rw-r----- or drwxrwxrwx
 */
export function formatMode(mode: number, isDirectory: boolean): string {
  const letters = "rwx";
  let result = isDirectory ? "d" : "-";
  for (let shift = 6; shift >= 0; shift -= 3) {
    for (let i = 0; i < 3; i++) {
      const mask = 1 << (shift + 2 - i);
      result += (mode & mask) !== 0 ? letters.charAt(i) : "-";
    }
  }
  return result;
}

/**
 * One-line listing of a path for warnings: mode, owner, size, path
 */
export async function describePath(path: string): Promise<string> {
  try {
    const info = await lstat(path);
    return `${formatMode(info.mode, info.isDirectory())} uid=${info.uid} gid=${info.gid} size=${info.size} ${path}`;
  } catch (error) {
    return `${path} (${errorCode(error)})`;
  }
}

/**
 * Whether the current process may create files in a directory
 */
export async function probeWritable(dir: string): Promise<string> {
  try {
    await access(dir, constants.W_OK);
    return "writable";
  } catch (error) {
    return `not writable (${errorCode(error)})`;
  }
}
