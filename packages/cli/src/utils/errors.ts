// pattern: Functional Core

import type { ComponentKind } from "../adr/component-kind.js";

export type ErrorCategory =
  | "configuration"
  | "validation"
  | "tool"
  | "query"
  | "capability"
  | "environment"
  | "usage"
  | "cancellation";

/**
 * Base class for adrlogs application errors
 * Subclasses carry a category used by error analysis and exit handling
 */
export abstract class AdrLogsError extends Error {
  public readonly category: ErrorCategory;

  protected constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to the settings file
 */
export class ConfigurationError extends AdrLogsError {
  public readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super("configuration", message);
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Errors related to schema validation failures
 */
export class ValidationError extends AdrLogsError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * The diagnostic query executable could not be located
 */
export class ToolUnavailableError extends AdrLogsError {
  public readonly toolName: string;
  public readonly searchPath: string;

  constructor(toolName: string, searchPath: string) {
    super("tool", `${toolName} not found in PATH or ORACLE_HOME/bin`);
    this.toolName = toolName;
    this.searchPath = searchPath;
  }
}

/**
 * An adrci query could not be run or returned a failure
 */
export class QueryFailedError extends AdrLogsError {
  public readonly query: string;

  constructor(query: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("query", `adrci query "${query}" failed: ${detail}`);
    this.query = query;
  }
}

/**
 * A component was requested that the environment does not provide
 */
export class CapabilityMismatchError extends AdrLogsError {
  public readonly component: ComponentKind;
  public readonly requiredRole: string;

  constructor(component: ComponentKind, requiredRole: string) {
    super("capability", `${component} requires ${requiredRole}`);
    this.component = component;
    this.requiredRole = requiredRole;
  }
}

/**
 * The environment has no diagnostic component at all
 */
export class NoComponentsAvailableError extends AdrLogsError {
  constructor() {
    super("environment", "no components available");
  }
}

/**
 * None of the resolved components has a diagnostic home
 */
export class NoHomesFoundError extends AdrLogsError {
  public readonly components: ComponentKind[];

  constructor(components: ComponentKind[]) {
    super("environment", "no homes found, check environment");
    this.components = components;
  }
}

/**
 * Invalid command line usage; the CLI prints usage alongside it
 */
export class UsageError extends AdrLogsError {
  constructor(message: string) {
    super("usage", message);
  }
}

/**
 * Errors related to user cancellation (Ctrl+C, end of input)
 */
export class UserCancellationError extends AdrLogsError {
  public readonly silent: boolean;

  constructor(message: string, silent = true) {
    super("cancellation", message);
    this.silent = silent;
  }
}
