export type ApiErrorKind = 'invalid_request' | 'not_found' | 'service_unavailable' | 'internal';

const STATUS_BY_KIND: Record<ApiErrorKind, number> = {
  invalid_request: 400,
  not_found: 404,
  service_unavailable: 503,
  internal: 500,
};

/**
 * A failure that has already been classified for the wire. Its message is
 * sent to the client verbatim, so it must never carry a stack or a path.
 */
export class ApiError extends Error {
  public readonly kind: ApiErrorKind;
  public readonly status: number;

  constructor(kind: ApiErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ApiError';
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export function invalidRequest(message: string, cause?: unknown): ApiError {
  return new ApiError('invalid_request', message, { cause });
}

export function notFound(message = 'Not found'): ApiError {
  return new ApiError('not_found', message);
}

export function serviceUnavailable(message = 'Local model not available'): ApiError {
  return new ApiError('service_unavailable', message);
}

export function internalError(message: string, cause?: unknown): ApiError {
  return new ApiError('internal', message, { cause });
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
