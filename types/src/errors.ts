/**
 * Error types shared by the crawler, the stores and the remote integrations
 */

/**
 * Base class for all treecrawl errors
 */
export class TreecrawlError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = "TreecrawlError";
    Object.setPrototypeOf(this, TreecrawlError.prototype);
  }
}

/**
 * Transport or HTTP failure talking to the remote record API.
 * Retried once per run, then recorded as a per-key failure.
 */
export class RemoteError extends TreecrawlError {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly status?: number,
    public readonly originalError?: Error
  ) {
    super(message, "REMOTE_ERROR");
    this.name = "RemoteError";
    Object.setPrototypeOf(this, RemoteError.prototype);
  }
}

/**
 * Corrupt cached payload. Treated as a cache miss, never surfaced to callers.
 */
export class DecodeError extends TreecrawlError {
  constructor(
    message: string,
    public readonly key: string,
    public readonly originalError?: Error
  ) {
    super(message, "DECODE_ERROR");
    this.name = "DecodeError";
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Missing or invalid credentials, paths or settings. Fatal at startup.
 */
export class ConfigError extends TreecrawlError {
  constructor(message: string, public readonly field?: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Invalid input for a single request (bad root key, unknown relation kind)
 */
export class ValidationError extends TreecrawlError {
  constructor(message: string, public readonly key?: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export function isRemoteError(error: unknown): error is RemoteError {
  return error instanceof RemoteError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
