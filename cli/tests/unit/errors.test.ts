/**
 * Tests for CLI error formatting
 */

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  DecodeError,
  RemoteError,
  ValidationError,
  formatErrorMessage,
  isDecodeError,
  isRemoteError,
} from "../../src/errors.js";

describe("formatErrorMessage", () => {
  it("should format a ConfigError with the config file hint", () => {
    const message = formatErrorMessage(
      new ConfigError("JIRA_ACCESS_TOKEN is not set", "JIRA_ACCESS_TOKEN")
    );

    expect(message).toBe(
      [
        "✗ Invalid configuration: JIRA_ACCESS_TOKEN",
        "",
        "  JIRA_ACCESS_TOKEN is not set",
        "",
        "  Set the missing values in the environment or in:",
        "    .treecrawl/config.json",
      ].join("\n")
    );
  });

  it("should include the HTTP status and cause of a RemoteError", () => {
    const message = formatErrorMessage(
      new RemoteError("HTTP 503 fetching PROJ-1", "fetchIssue", 503, new Error("Service Unavailable"))
    );

    expect(message).toBe(
      [
        "✗ Jira request failed (HTTP 503)",
        "",
        "  HTTP 503 fetching PROJ-1",
        "",
        "  Context: Service Unavailable",
        "",
        "  Check the server URL and access token, then retry failed keys:",
        "    treecrawl retry-failed",
      ].join("\n")
    );
  });

  it("should name the key of a ValidationError", () => {
    const message = formatErrorMessage(
      new ValidationError("No cached data for root issue PROJ-1", "PROJ-1")
    );

    expect(message).toBe(
      "✗ Cannot build tree for PROJ-1\n\n  No cached data for root issue PROJ-1"
    );
  });

  it("should format plain errors and other values", () => {
    expect(formatErrorMessage(new Error("boom"))).toBe("✗ An error occurred\n\n  boom");
    expect(formatErrorMessage("boom")).toBe("✗ An unexpected error occurred\n\n  boom");
  });
});

describe("error guards", () => {
  it("should survive instanceof checks through the subclass chain", () => {
    const error = new DecodeError("bad payload", "PROJ-1");

    expect(isDecodeError(error)).toBe(true);
    expect(isRemoteError(error)).toBe(false);
    expect(error.code).toBe("DECODE_ERROR");
    expect(error.name).toBe("DecodeError");
  });
});
