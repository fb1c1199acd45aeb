import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ValidationError } from './httpError.js';
import { isSupportedUrl } from './urlAllow.js';

export const MISSING_URL = 'missing url parameter';
export const UNSUPPORTED_URL = 'unsupported url domain';

export const ConvertQuery = z.object({
  url: z
    .string({ required_error: MISSING_URL, invalid_type_error: MISSING_URL })
    .trim()
    .min(1, MISSING_URL)
    .max(2000, UNSUPPORTED_URL)
    .refine(isSupportedUrl, UNSUPPORTED_URL),
});

export type ConvertQueryType = z.infer<typeof ConvertQuery>;

/**
 * Validate `?url=` or throw a ValidationError carrying the first issue
 */
export function parseConvertQuery(query: unknown): ConvertQueryType {
  const parsed = ConvertQuery.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? UNSUPPORTED_URL);
  }
  return parsed.data;
}

/**
 * Reject a missing `?url=` before the API key is looked at; the domain check
 * still runs after it, inside the handler.
 */
export function requireUrlParam(req: Request, _res: Response, next: NextFunction) {
  const raw = req.query.url;
  if (typeof raw !== 'string' || !raw.trim()) {
    next(new ValidationError(MISSING_URL));
    return;
  }
  next();
}
