// pattern: Imperative Shell

import { QueryFailedError } from "../utils/errors.js";

import type { CommandRunner } from "../utils/command/index.js";

// adrci reports its own failures as DIA-nnnnn lines while still exiting 0
const DIA_ERROR = /^DIA-\d+:.*$/m;

/**
 * Extract the base from `show base` output: ADR base is "/u01/app/oracle"
 */
export function parseBase(output: string): string | undefined {
  const match = /ADR base is "([^"]+)"/.exec(output);
  return match?.[1];
}

/**
 * Thin client for the adrci command line
 */
export class AdrciClient {
  constructor(
    private readonly adrciPath: string,
    private readonly env: Record<string, string>,
    private readonly runner: CommandRunner,
    private readonly timeoutMs: number
  ) {}

  /**
   * Run one or more adrci commands through exec=
   * @throws QueryFailedError when adrci cannot be run or reports DIA- errors
   */
  async exec(commands: string[]): Promise<string> {
    const query = commands.join("; ");
    let output: string;
    try {
      output = await this.runner.run(this.adrciPath, [`exec=${query}`], {
        env: this.env,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new QueryFailedError(query, error);
    }

    const diaError = DIA_ERROR.exec(output);
    if (diaError) {
      throw new QueryFailedError(query, diaError[0]);
    }
    return output;
  }

  /**
   * @throws QueryFailedError when the base is not reported
   */
  async showBase(): Promise<string> {
    const output = await this.exec(["show base"]);
    const base = parseBase(output);
    if (!base) {
      throw new QueryFailedError("show base", `unexpected output: ${output}`);
    }
    return base;
  }

  /**
   * Raw `show homes` listing, optionally against an explicit base
   */
  async showHomes(base?: string): Promise<string> {
    const commands = base ? [`set base ${base}`, "show homes"] : ["show homes"];
    return await this.exec(commands);
  }
}
