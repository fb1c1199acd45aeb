export class HttpError extends Error {
  status: number;
  code: string;

  constructor(status: number, code: string, message?: string) {
    super(message || code);
    this.name = new.target.name;
    this.status = Number.isInteger(status) ? status : 500;
    this.code = code || 'INTERNAL_ERROR';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Bad or missing input; raised before any work starts. */
export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

export class AccessDeniedError extends HttpError {
  constructor(message: string) {
    super(403, 'ACCESS_DENIED', message);
  }
}

/** Unknown or consumed token, or an output file that never appeared. */
export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

/** The external engine failed; the message is the engine's own. */
export class EngineError extends HttpError {
  constructor(message: string) {
    super(500, 'ENGINE_ERROR', message);
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error ?? 'unknown error');
}
