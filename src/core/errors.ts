export type ScanLimitKind = "folders" | "files";

/** The user has no usable Google grant; only a new sign-in fixes it. */
export class UnauthenticatedError extends Error {
  constructor(message = "Re-authentication required") {
    super(message);
    this.name = "UnauthenticatedError";
  }
}

export class ScanLimitExceededError extends Error {
  readonly kind: ScanLimitKind;
  readonly limit: number;
  readonly reached: number;

  constructor(kind: ScanLimitKind, limit: number, reached: number) {
    const subject = kind === "folders" ? "folders" : "eligible files";
    super(`Scan limit exceeded: max ${limit} ${subject} (reached ${reached})`);
    this.name = "ScanLimitExceededError";
    this.kind = kind;
    this.limit = limit;
    this.reached = reached;
  }
}

export class SizeExceededError extends Error {
  readonly limit: number;
  readonly reached: number;

  constructor(limit: number, reached: number) {
    super(`File exceeds max size (${limit} bytes); aborted at ${reached} bytes`);
    this.name = "SizeExceededError";
    this.limit = limit;
    this.reached = reached;
  }
}

/**
 * Non-2xx, malformed or failed call against the Drive API. `status` is null
 * when no HTTP response was received (timeout, network failure).
 */
export class ProviderError extends Error {
  readonly status: number | null;

  constructor(status: number | null, message = "Drive request failed") {
    super(message);
    this.name = "ProviderError";
    this.status = status;
  }
}

export function isUnauthorizedProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError && error.status === 401;
}

/** A request the caller can fix: bad input or a missing precondition. */
export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}
