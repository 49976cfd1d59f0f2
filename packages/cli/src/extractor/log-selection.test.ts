// pattern: Imperative Shell

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempAdrBase, type TempAdrBase } from "../test-utils/adr/adr-tree.js";
import { createCapturedLogger } from "../test-utils/logger.js";

import { selectLogs } from "./log-selection.js";

describe("selectLogs", () => {
  let adr: TempAdrBase;
  let traceDir: string;
  const { logger } = createCapturedLogger();

  beforeEach(async () => {
    adr = await createTempAdrBase();
    traceDir = join(adr.baseDir, "trace");
  });

  afterEach(async () => {
    await adr.cleanup();
  });

  it("should pick every alert log, in name order, over newer generic logs", async () => {
    await adr.writeLog("trace/db1_2024.log", "generic\n", 2_000_000_000);
    await adr.writeLog("trace/alert_db1_old.log", "old\n", 1_000_000_000);
    await adr.writeLog("trace/alert_db1.log", "current\n", 1_000_000_000);

    expect(await selectLogs(traceDir, logger)).toEqual({
      mode: "alert",
      files: [join(traceDir, "alert_db1.log"), join(traceDir, "alert_db1_old.log")],
    });
  });

  it("should fall back to the most recently modified log", async () => {
    await adr.writeLog("trace/a.log", "a\n", 1_000_000_000);
    await adr.writeLog("trace/b.log", "b\n", 1_000_002_000);
    await adr.writeLog("trace/c.log", "c\n", 1_000_001_500);
    await adr.writeLog("trace/myalert.log", "not an alert log\n", 1_000_000_500);

    expect(await selectLogs(traceDir, logger)).toEqual({
      mode: "latest",
      files: [join(traceDir, "b.log")],
    });
  });

  it("should pass over a newer hidden log", async () => {
    await adr.writeLog("trace/a.log", "a\n", 1_000_000_000);
    await adr.writeLog("trace/.hidden.log", "hidden\n", 1_000_009_000);

    expect(await selectLogs(traceDir, logger)).toEqual({
      mode: "latest",
      files: [join(traceDir, "a.log")],
    });
  });

  it("should break mtime ties by name order", async () => {
    await adr.writeLog("trace/zeta.log", "z\n", 1_000_000_000);
    await adr.writeLog("trace/beta.log", "b\n", 1_000_000_000);

    expect(await selectLogs(traceDir, logger)).toEqual({
      mode: "latest",
      files: [join(traceDir, "beta.log")],
    });
  });

  it("should ignore other files and subdirectories", async () => {
    await adr.writeLog("trace/db1_ora_123.trc", "trace file\n");
    await adr.writeLog("trace/alert_dir.log/inner.log", "nested\n");

    expect(await selectLogs(traceDir, logger)).toEqual({ mode: "none", files: [] });
  });

  it("should select nothing when the trace directory is missing", async () => {
    expect(await selectLogs(traceDir, logger)).toEqual({ mode: "none", files: [] });
  });

  it("should select nothing when trace is not a directory", async () => {
    await mkdir(adr.baseDir, { recursive: true });
    await writeFile(traceDir, "not a directory", "utf8");

    expect(await selectLogs(traceDir, logger)).toEqual({ mode: "none", files: [] });
  });
});
