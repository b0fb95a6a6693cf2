export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message, true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return undefined;
}

/**
 * Wraps an SDK failure. Client errors other than 429 are marked
 * non-retryable.
 */
export function toProviderError(service: string, operation: string, error: unknown): ServiceError {
  const status = statusOf(error);
  const retryable = status === undefined || status === 429 || status >= 500;
  return new ServiceError(service, operation, toError(error), retryable);
}
