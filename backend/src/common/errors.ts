/**
 * APP ERRORS
 * ==========
 *
 * Error taxonomy shared by every module. The global error handler in app.ts
 * turns any AppError into `{ ok: false, error: code, message }`.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

// Provider returned nothing for the symbol/range (unknown ticker, closed market)
export class NoDataError extends AppError {
  readonly symbol: string;

  constructor(symbol: string, message = `No valid data available for ${symbol}`) {
    super('NO_DATA', message, 404);
    this.symbol = symbol;
  }
}

export class InsufficientHistoryError extends AppError {
  readonly required: number;
  readonly available: number;

  constructor(what: string, required: number, available: number) {
    super(
      'INSUFFICIENT_HISTORY',
      `Insufficient data for ${what}: need ${required}, have ${available}`,
      422,
    );
    this.required = required;
    this.available = available;
  }
}

export class FitError extends AppError {
  constructor(model: string, cause: unknown) {
    super('FIT_ERROR', `Model ${model} failed to fit: ${describeCause(cause)}`, 422, { cause });
  }
}

export class RemoteServiceError extends AppError {
  readonly service: string;

  constructor(service: string, cause: unknown) {
    super('REMOTE_SERVICE_ERROR', `${service} request failed: ${describeCause(cause)}`, 502, { cause });
    this.service = service;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return String(cause);
}
