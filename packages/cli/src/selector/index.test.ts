// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { type ComponentSelection } from "../adr/component-kind.js";
import { type Environment } from "../adr/environment-probe.js";
import { type DiagnosticHome } from "../adr/home-catalog.js";
import { createCapturedLogger } from "../test-utils/logger.js";
import {
  CapabilityMismatchError,
  NoComponentsAvailableError,
  NoHomesFoundError,
  UserCancellationError,
} from "../utils/errors.js";

import {
  buildMenu,
  checkHomeCoverage,
  type ChoicePrompt,
  resolveComponents,
  runMenu,
} from "./index.js";

function environmentWith(
  capabilities: Partial<Environment["capabilities"]>
): Environment {
  return {
    identity: "oracle",
    baseDir: "/u01/app/oracle",
    baseSource: "adrci",
    capabilities: {
      database: false,
      asm: false,
      crs: false,
      listener: false,
      ...capabilities,
    },
    adrciPath: "adrci",
    env: {},
    queryFailures: [],
  };
}

// Answers from a script; records every menu shown
function scriptedPrompt(answers: string[]): {
  prompt: ChoicePrompt;
  shown: (readonly ComponentSelection[])[];
} {
  const shown: (readonly ComponentSelection[])[] = [];
  const prompt: ChoicePrompt = async menu => {
    shown.push(menu);
    const next = answers.shift();
    if (next === undefined) {
      const exit = new Error("User force closed the prompt");
      exit.name = "ExitPromptError";
      throw exit;
    }
    return next;
  };
  return { prompt, shown };
}

const neverPrompt: ChoicePrompt = async () => {
  throw new Error("the menu must not be shown");
};

describe("buildMenu", () => {
  it("should list available kinds in fixed order followed by all", () => {
    expect(buildMenu(environmentWith({ listener: true, database: true }))).toEqual([
      "database",
      "listener",
      "all",
    ]);
  });

  it("should be empty when nothing is available", () => {
    expect(buildMenu(environmentWith({}))).toEqual([]);
  });
});

describe("resolveComponents", () => {
  it("should fail with a capability mismatch for a missing kind", async () => {
    const attempt = resolveComponents(
      "asm",
      environmentWith({ database: true }),
      neverPrompt,
      createCapturedLogger().logger
    );

    await expect(attempt).rejects.toBeInstanceOf(CapabilityMismatchError);
    await expect(attempt).rejects.toThrow(
      "asm requires Grid Infrastructure environment"
    );
  });

  it("should return a requested kind the host has", async () => {
    await expect(
      resolveComponents(
        "database",
        environmentWith({ database: true }),
        neverPrompt,
        createCapturedLogger().logger
      )
    ).resolves.toEqual(["database"]);
  });

  it("should expand all to the available kinds", async () => {
    await expect(
      resolveComponents(
        "all",
        environmentWith({ crs: true, asm: true }),
        neverPrompt,
        createCapturedLogger().logger
      )
    ).resolves.toEqual(["asm", "crs"]);
  });

  it("should fail before any menu when nothing is available", async () => {
    await expect(
      resolveComponents(
        undefined,
        environmentWith({}),
        neverPrompt,
        createCapturedLogger().logger
      )
    ).rejects.toThrow(new NoComponentsAvailableError().message);
  });

  it("should reject all when nothing is available", async () => {
    await expect(
      resolveComponents("all", environmentWith({}), neverPrompt, createCapturedLogger().logger)
    ).rejects.toBeInstanceOf(NoComponentsAvailableError);
  });

  it("should use the menu when no component was given", async () => {
    const { prompt, shown } = scriptedPrompt(["3"]);

    const kinds = await resolveComponents(
      undefined,
      environmentWith({ database: true, listener: true }),
      prompt,
      createCapturedLogger().logger
    );

    expect(kinds).toEqual(["database", "listener"]);
    expect(shown).toEqual([["database", "listener", "all"]]);
  });
});

describe("runMenu", () => {
  it("should warn and repeat the menu after an invalid answer", async () => {
    const captured = createCapturedLogger();
    const { prompt, shown } = scriptedPrompt(["7", "crs"]);

    const choice = await runMenu(["crs", "all"], prompt, captured.logger);

    expect(choice).toBe("crs");
    expect(shown).toHaveLength(2);
    expect(captured.warnings()).toEqual([
      'invalid choice "7"; enter a number from 1 to 2 or a component name',
    ]);
  });

  it("should turn a closed prompt into a cancellation", async () => {
    const { prompt } = scriptedPrompt([]);

    await expect(
      runMenu(["crs", "all"], prompt, createCapturedLogger().logger)
    ).rejects.toBeInstanceOf(UserCancellationError);
  });

  it("should pass other prompt failures through", async () => {
    const prompt: ChoicePrompt = async () => {
      throw new Error("Cannot prompt for input in non-interactive environment");
    };

    await expect(
      runMenu(["crs", "all"], prompt, createCapturedLogger().logger)
    ).rejects.toThrow("Cannot prompt for input in non-interactive environment");
  });
});

describe("checkHomeCoverage", () => {
  const home = (kind: DiagnosticHome["kind"]): DiagnosticHome => ({
    kind,
    relativePath: `diag/x/${kind}/${kind}`,
    path: `/b/diag/x/${kind}/${kind}`,
  });

  it("should warn for each kind without homes", () => {
    const captured = createCapturedLogger();

    checkHomeCoverage(["asm", "crs"], [home("crs")], captured.logger);

    expect(captured.warnings()).toEqual(["no asm homes found under the ADR base"]);
  });

  it("should fail when no resolved kind has a home", () => {
    const captured = createCapturedLogger();

    expect(() =>
      checkHomeCoverage(["asm", "crs"], [home("database")], captured.logger)
    ).toThrow(NoHomesFoundError);
    expect(captured.warnings()).toEqual([
      "no asm homes found under the ADR base",
      "no crs homes found under the ADR base",
    ]);
  });
});
