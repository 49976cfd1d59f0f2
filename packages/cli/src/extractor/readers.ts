// pattern: Imperative Shell

import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import { createInterface } from "node:readline";

const CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

/**
 * The last `lineCount` lines of a file, or all of them when it is shorter.
 * Reads backwards in chunks so large alert logs are not loaded whole.
 */
export async function readTail(
  filePath: string,
  lineCount: number
): Promise<string[]> {
  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const chunks: Buffer[] = [];
    let position = size;
    let newlines = 0;

    // One newline more than needed guarantees the first kept line is whole
    while (position > 0 && newlines <= lineCount) {
      const length = Math.min(CHUNK_SIZE, position);
      position -= length;
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      const chunk = buffer.subarray(0, bytesRead);
      chunks.unshift(chunk);
      for (const byte of chunk) {
        if (byte === NEWLINE) {
          newlines++;
        }
      }
    }

    let text = Buffer.concat(chunks).toString("utf8");
    if (text.endsWith("\n")) {
      text = text.slice(0, -1);
    }
    if (text === "") {
      return [];
    }
    return text.split("\n").slice(-lineCount);
  } finally {
    await handle.close();
  }
}

/**
 * Every line containing any of the patterns, compared case-insensitively
 */
export async function grepFile(
  filePath: string,
  patterns: readonly string[]
): Promise<string[]> {
  const needles = patterns.map(pattern => pattern.toLowerCase());
  const matches: string[] = [];
  const lines = createInterface({
    input: createReadStream(filePath, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  for await (const line of lines) {
    const haystack = line.toLowerCase();
    if (needles.some(needle => haystack.includes(needle))) {
      matches.push(line);
    }
  }

  return matches;
}
