// pattern: Testing Infrastructure
// In-process stand-ins for adrci and bash so tests never spawn them

import type { CommandRunner } from "../../utils/command/index.js";

export interface RecordedCall {
  command: string;
  args: string[];
  env: Record<string, string>;
}

export type FakeResponse = string | Error;

export type FakeRunner = CommandRunner & { calls: RecordedCall[] };

/**
 * A CommandRunner answering from a handler. A returned Error is thrown.
 */
export function createFakeRunner(
  handler: (command: string, args: string[]) => FakeResponse
): FakeRunner {
  const calls: RecordedCall[] = [];
  return {
    calls,
    run: async (command, args, options) => {
      calls.push({ command, args, env: options.env });
      const response = handler(command, args);
      if (response instanceof Error) {
        throw response;
      }
      return response;
    },
  };
}

export interface FakeAdrciOptions {
  base?: FakeResponse;
  homes?: FakeResponse;
  profileDump?: FakeResponse;
}

/**
 * Render a `show homes` listing the way adrci prints it
 */
export function homesListing(homes: string[]): string {
  if (homes.length === 0) {
    return "No ADR homes are set";
  }
  return ["ADR Homes: ", ...homes].join("\n");
}

/**
 * Fake that answers `show base`, `show homes` and the profile dump
 */
export function createFakeAdrci(options: FakeAdrciOptions): FakeRunner {
  return createFakeRunner((command, args) => {
    if (command === "bash") {
      return options.profileDump ?? "";
    }
    const exec = args[0] ?? "";
    if (exec.endsWith("show base")) {
      return options.base ?? 'ADR base is "/u01/app/oracle"';
    }
    if (exec.endsWith("show homes")) {
      return options.homes ?? homesListing([]);
    }
    return new Error(`unexpected command ${command} ${args.join(" ")}`);
  });
}
