import type { Request, Response, NextFunction } from 'express';
import { HttpError, errorMessage, isHttpError } from '../core/httpError.js';
import type { Logger } from '../core/logger.js';

/**
 * Render every error as `{ error: message }` with its status.
 * Keep the 4-arg signature: Express detects error middleware by arity.
 */
export function createErrorHandler(log: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    const normalized = normalizeError(err);
    if (normalized.status >= 500) {
      log.error('request_failed', { path: req.path, code: normalized.code, error: normalized.message });
    }
    if (res.headersSent) {
      // Mid-stream failure: nothing left to send but a broken connection
      next(err);
      return;
    }
    res.status(normalized.status).json({ error: normalized.message });
  };
}

function normalizeError(err: unknown): HttpError {
  if (isHttpError(err)) return err;
  // body-parser and friends attach a numeric status
  const status = err instanceof Error && 'status' in err && typeof err.status === 'number' ? err.status : 500;
  return new HttpError(status, 'INTERNAL_ERROR', errorMessage(err) || 'Unexpected server error');
}
