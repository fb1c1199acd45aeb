import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'node:crypto';
import { AccessDeniedError } from '../core/httpError.js';

export const API_KEY_HEADER = 'X-API-Key';

const digest = (value: string) => createHash('sha256').update(value, 'utf8').digest();

export function keysMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Require `X-API-Key` to equal the configured secret. With no secret
 * configured every request passes.
 */
export function requireApiKey(getKey: () => string | undefined): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const expected = getKey();
    if (!expected) return next();

    const provided = req.header(API_KEY_HEADER);
    if (!provided) return next(new AccessDeniedError(`missing ${API_KEY_HEADER} header`));
    if (!keysMatch(provided, expected)) return next(new AccessDeniedError('invalid api key'));
    return next();
  };
}
