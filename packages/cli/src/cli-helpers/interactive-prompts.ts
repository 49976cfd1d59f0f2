// pattern: Imperative Shell

import { input } from "@inquirer/prompts";

import { UsageError } from "../utils/errors.js";

import type { ComponentSelection } from "../adr/component-kind.js";

/**
 * TTY detection utility. The menu is drawn on stderr, so stdout may be piped.
 * @returns True if we're in an interactive terminal environment
 */
export function isInteractiveEnvironment(): boolean {
  return (
    process.stdin.isTTY &&
    process.stderr.isTTY &&
    process.env["ADRLOGS_NON_INTERACTIVE"] !== "1"
  );
}

/**
 * Numbered menu text shown above the answer field
 */
export function formatComponentMenu(
  menu: readonly ComponentSelection[]
): string {
  const lines = menu.map((entry, index) => `  ${index + 1}) ${entry}`);
  return ["Which component's logs?", ...lines, "Choice"].join("\n");
}

/**
 * Ask for one menu entry by number or name. Closing the prompt rejects with
 * Inquirer's ExitPromptError.
 */
export async function promptForComponent(
  menu: readonly ComponentSelection[]
): Promise<string> {
  if (!isInteractiveEnvironment()) {
    throw new UsageError(
      "cannot show the component menu in a non-interactive session; name a component"
    );
  }

  return await input(
    { message: formatComponentMenu(menu) },
    { output: process.stderr }
  );
}
