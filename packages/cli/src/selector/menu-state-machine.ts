// pattern: Functional Core

import type { ComponentSelection } from "../adr/component-kind.js";

/**
 * States of the component menu
 */
export enum MenuState {
  AWAITING_CHOICE = "awaiting_choice",
  INVALID = "invalid",
  RESOLVED = "resolved",
  CANCELLED = "cancelled",
}

/**
 * Triggers for menu transitions
 */
export type MenuTrigger = "valid" | "invalid" | "retry" | "cancel";

/**
 * State transition definition
 */
export interface MenuTransition {
  from: MenuState;
  to: MenuState;
  trigger: MenuTrigger;
}

// Invalid always returns to AwaitingChoice; Resolved and Cancelled are terminal
export const MENU_TRANSITIONS: MenuTransition[] = [
  { from: MenuState.AWAITING_CHOICE, to: MenuState.RESOLVED, trigger: "valid" },
  { from: MenuState.AWAITING_CHOICE, to: MenuState.INVALID, trigger: "invalid" },
  { from: MenuState.AWAITING_CHOICE, to: MenuState.CANCELLED, trigger: "cancel" },
  { from: MenuState.INVALID, to: MenuState.AWAITING_CHOICE, trigger: "retry" },
  { from: MenuState.INVALID, to: MenuState.CANCELLED, trigger: "cancel" },
];

/**
 * Resolve a typed answer to a menu entry: its 1-based number or its name
 */
export function matchMenuAnswer(
  answer: string,
  options: readonly ComponentSelection[]
): ComponentSelection | undefined {
  const normalized = answer.trim().toLowerCase();
  if (/^\d+$/.test(normalized)) {
    return options[Number(normalized) - 1];
  }
  return options.find(option => option === normalized);
}

/**
 * The component menu as an explicit state machine. Each submitted answer
 * either resolves the menu or moves it to Invalid, from which retry()
 * returns to AwaitingChoice.
 */
export class MenuStateMachine {
  private currentState = MenuState.AWAITING_CHOICE;
  private transitions: Map<string, MenuState>;
  private resolved: ComponentSelection | undefined;
  private lastInvalidAnswer: string | undefined;
  private stateHistory: MenuState[] = [MenuState.AWAITING_CHOICE];

  constructor(private readonly options: readonly ComponentSelection[]) {
    if (options.length === 0) {
      throw new Error("A menu needs at least one option");
    }

    // Build transition map for O(1) lookups
    this.transitions = new Map();
    for (const transition of MENU_TRANSITIONS) {
      this.transitions.set(`${transition.from}:${transition.trigger}`, transition.to);
    }
  }

  private transition(trigger: MenuTrigger): MenuState {
    const next = this.transitions.get(`${this.currentState}:${trigger}`);
    if (!next) {
      throw new Error(`Invalid transition: ${this.currentState} -> ${trigger}`);
    }
    this.currentState = next;
    this.stateHistory.push(next);
    return next;
  }

  /**
   * Submit an answer typed at the prompt
   */
  submit(answer: string): MenuState {
    const choice = matchMenuAnswer(answer, this.options);
    if (choice === undefined) {
      this.lastInvalidAnswer = answer;
      return this.transition("invalid");
    }
    this.resolved = choice;
    return this.transition("valid");
  }

  /**
   * Leave Invalid and wait for the next answer
   */
  retry(): MenuState {
    return this.transition("retry");
  }

  /**
   * The session ended without a choice
   */
  cancel(): MenuState {
    return this.transition("cancel");
  }

  getCurrentState(): MenuState {
    return this.currentState;
  }

  getOptions(): readonly ComponentSelection[] {
    return this.options;
  }

  /**
   * The chosen entry; defined only in Resolved
   */
  getResolved(): ComponentSelection | undefined {
    return this.currentState === MenuState.RESOLVED ? this.resolved : undefined;
  }

  getLastInvalidAnswer(): string | undefined {
    return this.lastInvalidAnswer;
  }

  getStateHistory(): MenuState[] {
    return [...this.stateHistory];
  }
}
