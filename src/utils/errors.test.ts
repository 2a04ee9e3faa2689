import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AppError,
  ValidationError,
  NotFoundError,
  UpstreamError,
  TimeoutError,
  formatErrorResponse,
  toError,
} from './errors';

describe('AppError', () => {
  it('creates error with default values', () => {
    const error = new AppError('Something went wrong');
    expect(error.message).toBe('Something went wrong');
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(true);
    expect(error.details).toBeUndefined();
  });

  it('creates error with custom values', () => {
    const details = { field: 'q' };
    const error = new AppError('Custom error', 418, false, details);
    expect(error.statusCode).toBe(418);
    expect(error.isOperational).toBe(false);
    expect(error.details).toEqual(details);
  });

  it('is an instance of Error', () => {
    const error = new AppError('Test');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
  });
});

describe('ValidationError', () => {
  it('has status code 400', () => {
    const error = new ValidationError('Invalid input');
    expect(error.statusCode).toBe(400);
    expect(error.name).toBe('ValidationError');
  });
});

describe('NotFoundError', () => {
  it('has status code 404 with default message', () => {
    const error = new NotFoundError();
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('Resource not found');
    expect(error.name).toBe('NotFoundError');
  });
});

describe('UpstreamError', () => {
  it('is a gateway error', () => {
    const error = new UpstreamError('Upstream down', { status: 503 });
    expect(error.statusCode).toBe(502);
    expect(error.name).toBe('UpstreamError');
    expect(error.details).toEqual({ status: 503 });
  });
});

describe('TimeoutError', () => {
  it('has status code 504', () => {
    expect(new TimeoutError('Too slow').statusCode).toBe(504);
  });
});

describe('toError', () => {
  it('keeps Error instances and wraps anything else', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
    expect(toError('boom').message).toBe('boom');
  });
});

describe('formatErrorResponse', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('formats AppError correctly', () => {
    const error = new ValidationError("Query parameter 'q' must not be empty.", { field: 'q' });
    const response = formatErrorResponse(error, '/ask?q=', 'req-123');

    expect(response).toEqual({
      success: false,
      error: {
        message: "Query parameter 'q' must not be empty.",
        code: 'ValidationError',
        statusCode: 400,
        details: { field: 'q' },
        timestamp: '2024-01-15T12:00:00.000Z',
        path: '/ask?q=',
        requestId: 'req-123',
      },
    });
  });

  it('formats generic Error with status 500', () => {
    const response = formatErrorResponse(new Error('Something broke'));

    expect(response.success).toBe(false);
    expect(response.error.statusCode).toBe(500);
    expect(response.error.code).toBe('Error');
    expect(response.error.message).toBe('Something broke');
    expect(response.error.details).toBeUndefined();
  });

  it('keeps the status and code of framework errors', () => {
    const error = Object.assign(new Error("querystring must have required property 'q'"), {
      statusCode: 400,
      code: 'FST_ERR_VALIDATION',
    });
    const response = formatErrorResponse(error);

    expect(response.error.statusCode).toBe(400);
    expect(response.error.code).toBe('FST_ERR_VALIDATION');
  });

  it('omits path and requestId when not provided', () => {
    const response = formatErrorResponse(new AppError('Test'));

    expect(response.error.path).toBeUndefined();
    expect(response.error.requestId).toBeUndefined();
  });
});
