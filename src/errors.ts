import { HttpError, isTransientStatus } from './http.js';
import type { ProviderName } from './model.js';

export type ErrorCode = 'transient' | 'fatal_auth' | 'data' | 'not_found';

export abstract class DayplanError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network, rate-limit or 5xx trouble. Retry later; credentials stay usable. */
export class TransientFailure extends DayplanError {
  readonly code = 'transient' as const;
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Refresh token rejected, client credentials invalid, or stored credential malformed. */
export class FatalAuthFailure extends DayplanError {
  readonly code = 'fatal_auth' as const;

  constructor(
    message: string,
    readonly provider?: ProviderName,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Malformed provider payload, e.g. an unparsable due date. */
export class DataError extends DayplanError {
  readonly code = 'data' as const;
}

export class NotFoundError extends DayplanError {
  readonly code = 'not_found' as const;
}

/**
 * Returned (never thrown) when the user has to go through an interactive
 * OAuth or setup flow before the account can be used.
 */
export interface NeedsInteractiveAuth {
  kind: 'needs_auth';
  provider: ProviderName;
  redirectTo: string;
  reason?: string;
}

export function needsAuth(provider: ProviderName, redirectTo: string, reason?: string): NeedsInteractiveAuth {
  return { kind: 'needs_auth', provider, redirectTo, ...(reason ? { reason } : {}) };
}

export function isNeedsAuth(value: unknown): value is NeedsInteractiveAuth {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'needs_auth'
  );
}

export type Outcome<T> =
  | { kind: 'ok'; value: T }
  | NeedsInteractiveAuth
  | { kind: 'transient'; error: TransientFailure }
  | { kind: 'fatal_auth'; error: FatalAuthFailure }
  | { kind: 'error'; error: Error };

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const AUTH_MESSAGE_HINTS = [
  'invalidauthenticationtoken',
  'token is expired',
  'aadsts',
  'access has been blocked',
  'conditional access',
  'unauthorized',
  'invalid_grant',
];

// Google reports throttling as 403 with one of these reasons
const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded', 'quotaExceeded']);

/** Map any thrown value onto the error taxonomy. */
export function classifyError(err: unknown, provider?: ProviderName): Error {
  if (err instanceof DayplanError) return err;

  if (err instanceof HttpError) {
    if (err.status === 403 && err.errorReasons().some((r) => RATE_LIMIT_REASONS.has(r))) {
      return new TransientFailure(`${err.message}: rate limited`, { cause: err, retryAfterMs: err.retryAfterMs });
    }
    if (err.status === 401 || err.status === 403) {
      return new FatalAuthFailure(`${err.message}: ${err.responseText ?? ''}`.trim(), provider, { cause: err });
    }
    if (isTransientStatus(err.status)) {
      return new TransientFailure(err.message, { cause: err, retryAfterMs: err.retryAfterMs });
    }
    if (err.status === 404) return new NotFoundError(err.message, { cause: err });
    return new DataError(err.message, { cause: err });
  }

  if (err instanceof SyntaxError) return new DataError(`Malformed provider response: ${err.message}`, { cause: err });

  if (err instanceof Error) {
    if (err.name === 'AbortError' || err.name === 'TimeoutError') {
      return new TransientFailure(err.message, { cause: err });
    }
    // undici reports network failures as TypeError('fetch failed')
    if (err instanceof TypeError && /fetch failed|network/i.test(err.message)) {
      return new TransientFailure(err.message, { cause: err });
    }
    const lower = err.message.toLowerCase();
    if (AUTH_MESSAGE_HINTS.some((h) => lower.includes(h))) {
      return new FatalAuthFailure(err.message, provider, { cause: err });
    }
    return err;
  }

  return new Error(String(err));
}

export function toOutcome<T>(err: unknown, provider?: ProviderName): Outcome<T> {
  if (isNeedsAuth(err)) return err;
  const classified = classifyError(err, provider);
  if (classified instanceof TransientFailure) return { kind: 'transient', error: classified };
  if (classified instanceof FatalAuthFailure) return { kind: 'fatal_auth', error: classified };
  return { kind: 'error', error: classified };
}
