// Standardized error handling utilities
// Every request failure surfaced by the API is an AppError

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  RATE_LIMITED = 'rate_limited',
  VALIDATION_ERROR = 'validation_error',
  PROVIDER_UNAVAILABLE = 'provider_unavailable',
  PROVIDER_ERROR = 'provider_error',
  MAX_ITERATIONS_EXCEEDED = 'max_iterations_exceeded',
  CANCELLED = 'cancelled',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static rateLimited(retryAfter: number, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static providerUnavailable(provider: string): AppError {
    return new AppError(ErrorCode.PROVIDER_UNAVAILABLE, `LLM provider ${provider} is not available`, 503, { provider });
  }

  static providerError(provider: string, cause: unknown): AppError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new AppError(ErrorCode.PROVIDER_ERROR, `LLM request failed: ${reason}`, 502, { provider }, { cause });
  }

  static maxIterationsExceeded(maxIterations: number, details?: Record<string, unknown>): AppError {
    return new AppError(
      ErrorCode.MAX_ITERATIONS_EXCEEDED,
      `exceeded maximum tool call iterations (${maxIterations})`,
      500,
      { maxIterations, ...details }
    );
  }

  static cancelled(message: string = 'Request cancelled'): AppError {
    return new AppError(ErrorCode.CANCELLED, message, 499);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
  retry_after_seconds?: number;
}

function readRetryAfter(details: unknown): number | undefined {
  if (typeof details !== 'object' || details === null || !('retryAfter' in details)) {
    return undefined;
  }
  return typeof details.retryAfter === 'number' ? details.retryAfter : undefined;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  if (error.code === ErrorCode.RATE_LIMITED) {
    const retryAfter = readRetryAfter(error.details);
    if (retryAfter) {
      response.retry_after_seconds = retryAfter;
    }
  }

  return response;
}
