// pattern: Imperative Shell
import { pino } from "pino";
import { afterEach, describe, expect, it, vi } from "vitest";

import { createCommand, createCommandRunner } from "./index.js";

describe("CommandBuilder", () => {
  const logger = pino({ level: "silent" });
  const node = process.execPath;

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should execute commands using builder pattern", async () => {
    const result = await createCommand(node, logger)
      .addArgs(["-e", "process.stdout.write(process.argv.slice(1).join(' '))"])
      .addArgs(["hello", "world"])
      .output();

    expect(result).toBe("hello world");
  });

  it("should inherit the parent environment by default", async () => {
    vi.stubEnv("TEST_VAR", "test-value");

    const result = await createCommand(node, logger)
      .addArgs([
        "-e",
        "process.stdout.write(`${process.env.TEST_VAR}:${process.env.PATH ? 'path' : 'none'}`)",
      ])
      .output();

    expect(result).toBe("test-value:path");
  });

  it("should replace the environment when asked", async () => {
    const result = await createCommand(node, logger)
      .addArgs(["-e", "process.stdout.write(String(process.env.HOME))"])
      .replaceEnv({ TEST_VAR: "only-this" })
      .output();

    expect(result).toBe("undefined");
  });

  it("should reject on non-zero exit", async () => {
    await expect(
      createCommand(node, logger).addArgs(["-e", "process.exit(3)"]).output()
    ).rejects.toThrow();
  });

  it("should reject when the timeout elapses", async () => {
    await expect(
      createCommand(node, logger)
        .addArgs(["-e", "setTimeout(() => {}, 5000)"])
        .timeout(100)
        .output()
    ).rejects.toThrow(/timed out/i);
  });
});

describe("createCommandRunner", () => {
  it("should run with exactly the provided environment", async () => {
    const runner = createCommandRunner(pino({ level: "silent" }));
    const out = await runner.run(
      process.execPath,
      ["-e", "process.stdout.write(process.env.ADR_BASE ?? 'unset')"],
      { env: { ADR_BASE: "/u01/app/oracle" }, timeoutMs: 5000 }
    );

    expect(out).toBe("/u01/app/oracle");
  });
});
