/**
 * Error types and CLI error formatting
 *
 * The error classes live in @treecrawl/types so that remote integrations can
 * throw them; this module re-exports them and renders them for the terminal.
 */

import {
  isConfigError,
  isRemoteError,
  isValidationError,
  DecodeError,
  TreecrawlError,
} from "@treecrawl/types";

export {
  TreecrawlError,
  RemoteError,
  DecodeError,
  ConfigError,
  ValidationError,
  isRemoteError,
  isConfigError,
  isValidationError,
} from "@treecrawl/types";

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

/**
 * Formatted error message structure
 */
export interface FormattedError {
  title: string;
  explanation: string;
  action?: string;
  command?: string;
  context?: string;
}

/**
 * Helper to format error messages for CLI output with consistent styling
 */
export function formatErrorMessage(error: unknown): string {
  if (isConfigError(error)) {
    return formatErrorOutput({
      title: `Invalid configuration${error.field ? `: ${error.field}` : ""}`,
      explanation: error.message,
      action: "Set the missing values in the environment or in",
      command: ".treecrawl/config.json",
    });
  }

  if (isRemoteError(error)) {
    return formatErrorOutput({
      title: `Jira request failed${error.status ? ` (HTTP ${error.status})` : ""}`,
      explanation: error.message,
      context: error.originalError?.message,
      action: "Check the server URL and access token, then retry failed keys",
      command: "treecrawl retry-failed",
    });
  }

  if (isValidationError(error)) {
    return formatErrorOutput({
      title: error.key ? `Cannot build tree for ${error.key}` : "Invalid input",
      explanation: error.message,
    });
  }

  if (error instanceof TreecrawlError) {
    return formatErrorOutput({
      title: "treecrawl failed",
      explanation: error.message,
    });
  }

  if (error instanceof Error) {
    return formatErrorOutput({
      title: "An error occurred",
      explanation: error.message,
    });
  }

  return formatErrorOutput({
    title: "An unexpected error occurred",
    explanation: String(error),
  });
}

/**
 * Format error output with consistent structure
 */
function formatErrorOutput(error: FormattedError): string {
  const lines: string[] = [];

  lines.push(`✗ ${error.title}`);
  lines.push("");

  if (error.explanation) {
    lines.push(`  ${error.explanation}`);
    lines.push("");
  }

  if (error.context) {
    lines.push(`  Context: ${error.context}`);
    lines.push("");
  }

  if (error.action) {
    lines.push(`  ${error.action}:`);
    if (error.command) {
      lines.push(`    ${error.command}`);
    }
  }

  return lines.join("\n").trimEnd();
}
