/** Invalid or missing configuration. Raised before any repository is scanned. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Failure reported by the repository provider (GitHub REST API).
 * `retryable` is false for failures that will not change on a second attempt.
 */
export class ProviderError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.status = options.status;
    this.retryable = options.retryable ?? true;
  }
}

export class NotFoundError extends ProviderError {
  constructor(message: string, cause?: unknown) {
    super(message, { status: 404, retryable: false, cause });
    this.name = "NotFoundError";
  }
}

export class AuthenticationError extends ProviderError {
  constructor(message: string, status?: number, cause?: unknown) {
    super(message, { status, retryable: false, cause });
    this.name = "AuthenticationError";
  }
}

/** A release, pull request or commit payload that cannot be mapped, e.g. one authored by a deleted (ghost) account. */
export class MalformedRecordError extends ProviderError {
  constructor(message: string) {
    super(message, { retryable: false });
    this.name = "MalformedRecordError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
