export type BackendFailureKind = "rate_limited" | "backend_failure";

/**
 * A backend call that failed. `detail` holds the original message for the
 * server log; it is never shown to users.
 */
export abstract class BackendError extends Error {
  abstract readonly kind: BackendFailureKind;

  constructor(
    message: string,
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RateLimitedError extends BackendError {
  readonly kind = "rate_limited";

  constructor(detail: string, options?: { cause?: unknown }) {
    super("Backend rate limit or quota exceeded", detail, options);
    this.name = "RateLimitedError";
  }
}

export class GenericBackendError extends BackendError {
  readonly kind = "backend_failure";

  constructor(detail: string, options?: { cause?: unknown }) {
    super("Backend request failed", detail, options);
    this.name = "GenericBackendError";
  }
}
