// pattern: Functional Core

import {
  AdrLogsError,
  CapabilityMismatchError,
  ConfigurationError,
  type ErrorCategory,
  NoComponentsAvailableError,
  NoHomesFoundError,
  QueryFailedError,
  ToolUnavailableError,
  UsageError,
  UserCancellationError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category: ErrorCategory | "filesystem" | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const DEBUG_HINT = "Run with --log-level debug for more detailed information";

/**
 * Analyzes an error and provides structured information with user-friendly messages
 *
 * @param error The error to analyze (can be Error, string, or unknown)
 * @returns Structured error information with category and user-friendly messaging
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof AdrLogsError) {
    const errorMessage = error.message;
    const analyzed = (suggestions: string[]): AnalyzedError => ({
      category: error.category,
      userMessage: errorMessage,
      technicalMessage: errorMessage,
      suggestions,
    });

    if (error instanceof ToolUnavailableError) {
      return analyzed([
        "Run adrlogs as the Oracle software owner (oracle or grid)",
        "Check that ORACLE_HOME is set in your shell profile",
        "Set adrciPath in ~/.adrlogs.yaml to the adrci executable",
      ]);
    }

    if (error instanceof CapabilityMismatchError) {
      return analyzed([
        `Run adrlogs as the owner of the ${error.requiredRole}`,
        "Run adrlogs without a component to choose from what this host offers",
      ]);
    }

    if (error instanceof NoComponentsAvailableError) {
      return analyzed([
        "Check that adrci lists homes: adrci exec=\"show homes\"",
        "Set adrBase in ~/.adrlogs.yaml if the ADR base is not detected",
      ]);
    }

    if (error instanceof NoHomesFoundError) {
      return analyzed([
        `No diagnostic homes for: ${error.components.join(", ")}`,
        "Check that ADR_BASE or the adrBase setting points at the right base",
      ]);
    }

    if (error instanceof ValidationError) {
      const suggestions = ["Check your settings file against the documented keys"];
      if (error.validationErrors && error.validationErrors.length > 0) {
        suggestions.push(...error.validationErrors.map(e => `- ${e}`));
      }
      return analyzed(suggestions);
    }

    if (error instanceof ConfigurationError) {
      return analyzed(
        error.filePath
          ? [`Check ${error.filePath} for syntax errors`, DEBUG_HINT]
          : [DEBUG_HINT]
      );
    }

    if (error instanceof QueryFailedError) {
      return analyzed([
        "Check that adrci runs for this user",
        "Raise queryTimeoutMs in ~/.adrlogs.yaml if adrci is slow",
      ]);
    }

    if (error instanceof UsageError) {
      return analyzed(["Run adrlogs --help for usage"]);
    }

    if (error instanceof UserCancellationError) {
      // For cancellation, we respect the silent flag
      return {
        category: "cancellation",
        userMessage: error.silent ? "" : errorMessage,
        technicalMessage: errorMessage,
        suggestions: [],
      };
    }

    return analyzed([DEBUG_HINT]);
  }

  // Fall back to string-based analysis for other errors
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Run adrlogs as the owner of the diagnostic files",
        "Check that the archive directory is writable",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the file or directory path exists",
        "Check the archiveDir and adrBase settings",
      ],
    };
  }

  // User cancellation (Ctrl+C in interactive prompts)
  if (errorString.includes("force closed")) {
    return {
      category: "cancellation",
      userMessage: "", // Silent - no error message for user cancellation
      technicalMessage: errorMessage,
      suggestions: [],
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: ["Try the operation again", DEBUG_HINT],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
