import { BackendError, GenericBackendError, RateLimitedError, type BackendFailureKind } from "./errors";
import { NOTICES } from "./constants";

// The error text is the only signal the backend gives us
const RATE_LIMIT_PATTERNS = [
  /429/,
  /quota/i,
];

function errorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function classifyBackendError(err: unknown): BackendError {
  if (err instanceof BackendError) {
    return err;
  }

  const detail = errorText(err);
  for (const pattern of RATE_LIMIT_PATTERNS) {
    if (pattern.test(detail)) {
      return new RateLimitedError(detail, { cause: err });
    }
  }
  return new GenericBackendError(detail, { cause: err });
}

export function getFailureNotice(kind: BackendFailureKind): string {
  switch (kind) {
    case "rate_limited":
      return NOTICES.rateLimited;
    case "backend_failure":
      return NOTICES.backendFailure;
  }
}
