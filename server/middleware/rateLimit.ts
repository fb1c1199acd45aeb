/**
 * Rate limiting middleware
 * Protects the engine from request floods
 */

import rateLimit from 'express-rate-limit';

/**
 * Global per-IP limiter (fallback for all routes)
 */
export function globalRateLimit(maxPerMinute: number) {
  return rateLimit({
    windowMs: 60_000, // 1 minute
    max: maxPerMinute,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests. Please slow down.' },
  });
}

/**
 * Conversion starts are expensive: /progress and /fetch get a tighter budget
 */
export function conversionRateLimit(maxPerMinute: number) {
  return rateLimit({
    windowMs: 60_000,
    max: Math.max(1, Math.floor(maxPerMinute / 4)),
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many conversion requests. Please slow down.' },
  });
}
