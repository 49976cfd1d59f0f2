// pattern: Functional Core

import {
  type ComponentKind,
  type ComponentSelection,
  REQUIRED_ROLE,
} from "../adr/component-kind.js";
import {
  availableKinds,
  type Environment,
} from "../adr/environment-probe.js";
import {
  CapabilityMismatchError,
  NoComponentsAvailableError,
  NoHomesFoundError,
  UserCancellationError,
} from "../utils/errors.js";

import { MenuState, MenuStateMachine } from "./menu-state-machine.js";

import type { DiagnosticHome } from "../adr/home-catalog.js";
import type { Logger } from "pino";

/**
 * Shows the menu and returns the raw answer. Rejects with an error named
 * ExitPromptError (or a UserCancellationError) when the session ends.
 */
export type ChoicePrompt = (
  menu: readonly ComponentSelection[]
) => Promise<string>;

/**
 * Menu entries: available kinds in fixed order, then `all` if any exist
 */
export function buildMenu(environment: Environment): ComponentSelection[] {
  const kinds = availableKinds(environment.capabilities);
  return kinds.length > 0 ? [...kinds, "all"] : [];
}

function isPromptExit(error: unknown): boolean {
  return (
    error instanceof UserCancellationError ||
    (error instanceof Error && error.name === "ExitPromptError")
  );
}

/**
 * Drive the menu state machine until it resolves or the session ends
 *
 * @throws UserCancellationError when the prompt is closed
 */
export async function runMenu(
  menu: readonly ComponentSelection[],
  prompt: ChoicePrompt,
  logger: Logger
): Promise<ComponentSelection> {
  const machine = new MenuStateMachine(menu);

  for (;;) {
    let answer: string;
    try {
      answer = await prompt(machine.getOptions());
    } catch (error) {
      if (!isPromptExit(error)) {
        throw error;
      }
      machine.cancel();
      throw new UserCancellationError("component selection cancelled");
    }

    const state = machine.submit(answer);
    if (state === MenuState.RESOLVED) {
      const choice = machine.getResolved();
      if (choice !== undefined) {
        return choice;
      }
    }

    logger.warn(
      `invalid choice "${answer.trim()}"; enter a number from 1 to ${menu.length} or a component name`
    );
    machine.retry();
  }
}

/**
 * Resolve the kinds to process, from the command argument or the menu
 *
 * @throws CapabilityMismatchError for a concrete kind the host lacks
 * @throws NoComponentsAvailableError when nothing is available
 */
export async function resolveComponents(
  requested: ComponentSelection | undefined,
  environment: Environment,
  prompt: ChoicePrompt,
  logger: Logger
): Promise<ComponentKind[]> {
  const available = availableKinds(environment.capabilities);

  if (requested !== undefined && requested !== "all") {
    if (!environment.capabilities[requested]) {
      throw new CapabilityMismatchError(requested, REQUIRED_ROLE[requested]);
    }
    return [requested];
  }

  if (available.length === 0) {
    throw new NoComponentsAvailableError();
  }
  if (requested === "all") {
    return available;
  }

  const choice = await runMenu(buildMenu(environment), prompt, logger);
  return choice === "all" ? available : [choice];
}

/**
 * Warn about kinds without homes; fail when no kind has any
 *
 * @throws NoHomesFoundError
 */
export function checkHomeCoverage(
  kinds: readonly ComponentKind[],
  homes: readonly DiagnosticHome[],
  logger: Logger
): void {
  for (const kind of kinds) {
    if (!homes.some(home => home.kind === kind)) {
      logger.warn(`no ${kind} homes found under the ADR base`);
    }
  }

  if (!homes.some(home => kinds.includes(home.kind))) {
    throw new NoHomesFoundError([...kinds]);
  }
}
