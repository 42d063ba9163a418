// Common error classes and Fastify error mapping utilities

export type ErrorBody = {
  message: string;
  code?: string;
  details?: unknown;
};

export class AppError extends Error {
  statusCode: number;
  code?: string;
  details?: unknown;
  constructor(message: string, statusCode = 400, options?: { code?: string; details?: unknown }) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code;
    this.details = options?.details;
  }
}

// Raised for programmer errors, e.g. a renderer asking for pagination data that was never computed
export class PaginationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, { code: 'PAGINATION_ERROR', details });
    this.name = 'PaginationError';
  }
}

function isValidationError(err: unknown): err is { validation: unknown[]; message: string } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'validation' in err &&
    Array.isArray(err.validation) &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

export function toErrorResponse(err: unknown): { statusCode: number; body: ErrorBody } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: { message: err.message, code: err.code, details: err.details },
    };
  }
  if (isValidationError(err)) {
    return {
      statusCode: 400,
      body: { message: err.message, code: 'VALIDATION_ERROR', details: err.validation },
    };
  }
  // Client errors raised by Fastify plugins (rate limit, unsupported media type, ...)
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500) {
    return { statusCode: err.statusCode, body: { message: err.message } };
  }
  return { statusCode: 500, body: { message: 'Internal Server Error' } };
}
