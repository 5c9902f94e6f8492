import { ErrorCode } from './error-codes';
import { TollgateError } from './tollgate-error';

export type SessionInvalidReason = 'NotFound' | 'Expired';

export interface RateLimitDetails {
  retryAfterSeconds: number;
  remaining: number;
  limit: number;
  /** Only set for the login route */
  maxAttempts?: number;
}

export const ERRORS = {
  // Auth errors
  InvalidCredentials: () =>
    new TollgateError({
      code: ErrorCode.InvalidCredentials,
      message: 'Invalid credentials',
      httpStatusCode: 401,
    }),

  // NotFound and Expired share one public shape to avoid leaking token state
  SessionInvalid: (reason: SessionInvalidReason) =>
    new TollgateError({
      code: ErrorCode.SessionInvalid,
      message: 'Invalid or expired refresh token',
      httpStatusCode: 401,
      metadata: { reason },
    }),

  TokenInvalid: (e?: unknown) =>
    new TollgateError({
      code: ErrorCode.TokenInvalid,
      message: 'Invalid or expired token',
      httpStatusCode: 401,
      originalError: e,
    }),

  // Admission errors
  RateLimitExceeded: (info: RateLimitDetails) => {
    const details: Record<string, number> = {
      retry_after: info.retryAfterSeconds,
      remaining: info.remaining,
    };
    if (info.maxAttempts !== undefined) {
      details.max_attempts = info.maxAttempts;
    }

    const message =
      info.maxAttempts !== undefined
        ? `Too many login attempts. The limit is ${info.maxAttempts} attempts; try again in ${formatWait(info.retryAfterSeconds)}.`
        : `Too many requests. Try again in ${formatWait(info.retryAfterSeconds)}.`;

    return new TollgateError({
      code: ErrorCode.RateLimitExceeded,
      message,
      httpStatusCode: 429,
      details,
      headers: {
        'Retry-After': String(info.retryAfterSeconds),
        'X-RateLimit-Limit': String(info.limit),
        'X-RateLimit-Remaining': String(info.remaining),
      },
    });
  },

  // Infrastructure errors
  SigningKeyUnavailable: (reason: string, e?: unknown) =>
    new TollgateError({
      code: ErrorCode.SigningKeyUnavailable,
      message: `Signing key unavailable: ${reason}`,
      httpStatusCode: 500,
      originalError: e,
    }),

  PersistenceUnavailable: (operation: string, e?: unknown) =>
    new TollgateError({
      code: ErrorCode.PersistenceUnavailable,
      message: 'Service temporarily unavailable',
      httpStatusCode: 503,
      metadata: { operation },
      originalError: e,
    }),

  // General
  ValidationError: (message: string) =>
    new TollgateError({
      code: ErrorCode.ValidationError,
      message,
      httpStatusCode: 400,
    }),

  InternalError: (message: string, e?: unknown) =>
    new TollgateError({
      code: ErrorCode.InternalError,
      message: message || 'Internal server error',
      httpStatusCode: 500,
      originalError: e,
    }),
};

/**
 * Human-readable wait: whole minutes when at least one, else seconds
 */
export function formatWait(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''}`;
  }
  return `${seconds} second${seconds !== 1 ? 's' : ''}`;
}
