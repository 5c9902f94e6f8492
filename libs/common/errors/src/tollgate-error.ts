import { ErrorCode } from './error-codes';

export interface TollgateErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  /** Extra fields merged into the response body */
  details?: Record<string, string | number>;
  /** Response headers set by the error filter */
  headers?: Record<string, string>;
  /** Internal context for logs only, never serialized */
  metadata?: Record<string, unknown>;
  originalError?: unknown;
}

export class TollgateError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly details: Record<string, string | number>;
  readonly headers: Record<string, string>;
  readonly metadata: Record<string, unknown>;
  readonly originalError?: unknown;

  constructor(options: TollgateErrorOptions) {
    super(options.message);
    this.name = 'TollgateError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.details = options.details ?? {};
    this.headers = options.headers ?? {};
    this.metadata = options.metadata ?? {};
    this.originalError = options.originalError;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, string | number> {
    return {
      error: this.code,
      message: this.message,
      statusCode: this.httpStatusCode,
      ...this.details,
    };
  }
}

export function isTollgateError(
  error: unknown,
  code?: ErrorCode,
): error is TollgateError {
  return (
    error instanceof TollgateError && (code === undefined || error.code === code)
  );
}

/**
 * Message of an unknown thrown value, for log lines
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
