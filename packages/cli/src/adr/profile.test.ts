// pattern: Imperative Shell

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createFakeRunner } from "../test-utils/adr/fake-adrci.js";
import { createCapturedLogger } from "../test-utils/logger.js";

import { loadProfileEnvironment, parseEnvDump, toStringEnv } from "./profile.js";

describe("parseEnvDump", () => {
  it("should split NUL-separated assignments at the first =", () => {
    expect(
      parseEnvDump("ORACLE_SID=orcl1\0PATH=/usr/bin:/bin\0OPTS=a=b\0\0")
    ).toEqual({
      ORACLE_SID: "orcl1",
      PATH: "/usr/bin:/bin",
      OPTS: "a=b",
    });
  });

  it("should keep multi-line values intact", () => {
    expect(parseEnvDump("MOTD=line one\nline two\0")).toEqual({
      MOTD: "line one\nline two",
    });
  });
});

describe("toStringEnv", () => {
  it("should drop undefined entries", () => {
    expect(toStringEnv({ A: "1", B: undefined })).toEqual({ A: "1" });
  });
});

describe("loadProfileEnvironment", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "adrlogs-profile-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("should warn and keep the base environment when the profile is missing", async () => {
    const captured = createCapturedLogger();
    const runner = createFakeRunner(() => new Error("must not run"));
    const profilePath = join(tempDir, ".bash_profile");

    const env = await loadProfileEnvironment(
      profilePath,
      { PATH: "/usr/bin" },
      runner,
      captured.logger,
      1000
    );

    expect(env).toEqual({ PATH: "/usr/bin" });
    expect(runner.calls).toHaveLength(0);
    expect(captured.warnings()).toEqual([
      `profile ${profilePath} not found; ORACLE_HOME and PATH hints from it are unavailable`,
    ]);
  });

  it("should source the profile through bash and overlay its variables", async () => {
    const profilePath = join(tempDir, ".bash_profile");
    await writeFile(profilePath, "export ORACLE_HOME=/u01/app/19c/grid\n", "utf8");
    const runner = createFakeRunner(
      () => "PATH=/usr/bin:/u01/app/19c/grid/bin\0ORACLE_HOME=/u01/app/19c/grid\0"
    );

    const env = await loadProfileEnvironment(
      profilePath,
      { PATH: "/usr/bin", LANG: "C" },
      runner,
      createCapturedLogger().logger,
      1000
    );

    expect(env).toEqual({
      PATH: "/usr/bin:/u01/app/19c/grid/bin",
      LANG: "C",
      ORACLE_HOME: "/u01/app/19c/grid",
    });
    expect(runner.calls[0]?.command).toBe("bash");
    expect(runner.calls[0]?.args.at(-1)).toBe(profilePath);
  });

  it("should warn and continue when sourcing fails", async () => {
    const profilePath = join(tempDir, ".bash_profile");
    await writeFile(profilePath, "exit 3\n", "utf8");
    const captured = createCapturedLogger();
    const runner = createFakeRunner(() => new Error("bash exited with 3"));

    const env = await loadProfileEnvironment(
      profilePath,
      { PATH: "/usr/bin" },
      runner,
      captured.logger,
      1000
    );

    expect(env).toEqual({ PATH: "/usr/bin" });
    expect(captured.warnings()).toEqual([
      `could not load profile ${profilePath}; continuing with the current environment`,
    ]);
  });
});
