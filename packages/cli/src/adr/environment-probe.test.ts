// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS } from "../settings/schema.js";
import {
  createFakeAdrci,
  homesListing,
} from "../test-utils/adr/fake-adrci.js";
import { createCapturedLogger } from "../test-utils/logger.js";
import { ToolUnavailableError } from "../utils/errors.js";

import {
  availableKinds,
  computeCapabilities,
  type ExecutableLocator,
  probeEnvironment,
  toolSearchPath,
} from "./environment-probe.js";

const found: ExecutableLocator = async () => "/u01/app/19c/grid/bin/adrci";
const missing: ExecutableLocator = async () => null;

// The profile lookup points at a directory that has no .bash_profile
const homeDir = "/nonexistent/adrlogs-home";

describe("computeCapabilities", () => {
  it("should flag each kind whose marker appears in the listing", () => {
    const listing = homesListing([
      "diag/asm/+asm/+ASM1",
      "diag/crs/db01/crs",
      "diag/tnslsnr/db01/listener",
    ]);

    expect(computeCapabilities(listing)).toEqual({
      database: false,
      asm: true,
      crs: true,
      listener: true,
    });
  });

  it("should report nothing for empty output", () => {
    expect(availableKinds(computeCapabilities(""))).toEqual([]);
  });
});

describe("toolSearchPath", () => {
  it("should append ORACLE_HOME/bin to PATH", () => {
    expect(
      toolSearchPath({ PATH: "/usr/bin:/bin", ORACLE_HOME: "/u01/app/19c/db" })
    ).toBe("/usr/bin:/bin:/u01/app/19c/db/bin");
  });
});

describe("probeEnvironment", () => {
  it("should derive base and capabilities from adrci", async () => {
    const runner = createFakeAdrci({
      base: 'ADR base is "/u01/app/oracle"',
      homes: homesListing(["diag/rdbms/orcl/orcl1", "diag/tnslsnr/db01/listener"]),
    });

    const environment = await probeEnvironment("oracle", DEFAULT_SETTINGS, {
      runner,
      logger: createCapturedLogger().logger,
      locateExecutable: found,
      homeDir,
      baseEnv: { PATH: "/usr/bin" },
    });

    expect(environment).toEqual({
      identity: "oracle",
      baseDir: "/u01/app/oracle",
      baseSource: "adrci",
      capabilities: { database: true, asm: false, crs: false, listener: true },
      adrciPath: "/u01/app/19c/grid/bin/adrci",
      env: { PATH: "/usr/bin" },
      queryFailures: [],
    });
  });

  it("should fail fast when adrci cannot be located", async () => {
    await expect(
      probeEnvironment("oracle", DEFAULT_SETTINGS, {
        runner: createFakeAdrci({}),
        logger: createCapturedLogger().logger,
        locateExecutable: missing,
        homeDir,
        baseEnv: { PATH: "/usr/bin" },
      })
    ).rejects.toBeInstanceOf(ToolUnavailableError);
  });

  it("should fall back to the identity's default base when queries fail", async () => {
    const captured = createCapturedLogger();
    const runner = createFakeAdrci({
      base: new Error("adrci crashed"),
      homes: new Error("adrci crashed"),
    });

    const environment = await probeEnvironment("grid", DEFAULT_SETTINGS, {
      runner,
      logger: captured.logger,
      locateExecutable: found,
      homeDir,
      baseEnv: {},
    });

    expect(environment.baseDir).toBe("/u01/app/grid");
    expect(environment.baseSource).toBe("fallback");
    expect(environment.capabilities).toEqual({
      database: false,
      asm: false,
      crs: false,
      listener: false,
    });
    expect(environment.queryFailures).toHaveLength(2);
    expect(captured.warnings()).toContain(
      'adrci query "show base" failed: adrci crashed; using /u01/app/grid as ADR base'
    );
  });

  it("should prefer ADR_BASE from the environment and pass it to show homes", async () => {
    const runner = createFakeAdrci({
      homes: homesListing(["diag/asm/+asm/+ASM1"]),
    });

    const environment = await probeEnvironment("grid", DEFAULT_SETTINGS, {
      runner,
      logger: createCapturedLogger().logger,
      locateExecutable: found,
      homeDir,
      baseEnv: { ADR_BASE: "/u01/app/gridbase" },
    });

    expect(environment.baseDir).toBe("/u01/app/gridbase");
    expect(environment.baseSource).toBe("environment");
    expect(runner.calls.map(call => call.args[0])).toEqual([
      "exec=set base /u01/app/gridbase; show homes",
    ]);
  });

  it("should let the adrBase setting win over ADR_BASE", async () => {
    const environment = await probeEnvironment(
      "grid",
      { ...DEFAULT_SETTINGS, adrBase: "/srv/adr" },
      {
        runner: createFakeAdrci({}),
        logger: createCapturedLogger().logger,
        locateExecutable: found,
        homeDir,
        baseEnv: { ADR_BASE: "/u01/app/gridbase" },
      }
    );

    expect(environment.baseDir).toBe("/srv/adr");
    expect(environment.baseSource).toBe("settings");
  });

  it("should search PATH and ORACLE_HOME/bin for adrci", async () => {
    const searched: string[] = [];
    await probeEnvironment("oracle", DEFAULT_SETTINGS, {
      runner: createFakeAdrci({}),
      logger: createCapturedLogger().logger,
      locateExecutable: async (name, searchPath) => {
        searched.push(`${name}@${searchPath}`);
        return "/opt/adrci";
      },
      homeDir,
      baseEnv: { PATH: "/usr/bin", ORACLE_HOME: "/u01/app/19c/db" },
    });

    expect(searched).toEqual(["adrci@/usr/bin:/u01/app/19c/db/bin"]);
  });
});
