import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { Logger } from '../core/logger.js';

const SENSITIVE = /^(authorization|cookie|x-api-key)$/i;

function redactHeaders(h: Request['headers']) {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(h)) {
    out[key] = SENSITIVE.test(key) ? '***' : value;
  }
  return out;
}

const QUIET_PATHS = new Set(['/health', '/ready', '/metrics']);

/**
 * One JSON line per finished response, tagged with an x-request-id
 */
export function createRequestLogger(log: Logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const incoming = req.header('x-request-id');
    const id = incoming && incoming.length <= 128 ? incoming : randomUUID();
    res.setHeader('x-request-id', id);
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      if (process.env.VERBOSE_REQUEST_LOGS !== '1' && QUIET_PATHS.has(req.path)) return;
      const durMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
      log.info('request', {
        id,
        ip: req.ip,
        m: req.method,
        u: req.originalUrl || req.url,
        s: res.statusCode,
        durMs,
        h: redactHeaders(req.headers),
      });
    });

    next();
  };
}
