/**
 * Application errors
 *
 * Every error that reaches the HTTP boundary is rendered through
 * `formatErrorResponse`, so clients always see the same envelope.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, true, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * The upstream message source failed or returned something unusable.
 */
export class UpstreamError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 502, true, details);
    this.name = 'UpstreamError';
  }
}

export class TimeoutError extends AppError {
  constructor(message: string) {
    super(message, 504);
    this.name = 'TimeoutError';
  }
}

export interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    details?: unknown;
    timestamp: string;
    path?: string;
    requestId?: string;
  };
}

function statusCodeOf(error: Error): number {
  if (error instanceof AppError) return error.statusCode;
  // Fastify's own errors (schema validation, payload limits) carry a status
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

function codeOf(error: Error): string {
  if (error instanceof AppError) return error.name;
  if ('code' in error && typeof error.code === 'string') return error.code;
  return error.name;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function formatErrorResponse(
  error: Error,
  path?: string,
  requestId?: string
): ErrorResponse {
  return {
    success: false,
    error: {
      message: error.message,
      code: codeOf(error),
      statusCode: statusCodeOf(error),
      details: error instanceof AppError ? error.details : undefined,
      timestamp: new Date().toISOString(),
      path,
      requestId,
    },
  };
}
