import path from 'node:path';
import { stat } from 'node:fs/promises';
import type { Express, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../core/logger.js';
import type { JobStore } from '../core/JobStore.js';
import { NotFoundError } from '../core/httpError.js';
import { contentTypeFor, setDownloadHeaders, streamAttachment } from '../core/http.js';
import { removeDir } from '../core/cleanup.js';
import { jobsReclaimed, metricsMiddleware } from '../core/metrics.js';
import { wrap } from '../core/wrap.js';

export const INVALID_TOKEN = 'invalid or expired token';

export type DownloadDeps = {
  store: JobStore;
  log: Logger;
  guards: RequestHandler[];
};

/**
 * GET /download/:token hands over a finished file exactly once.
 * HEAD answers with the same headers without consuming the token.
 */
export function setupDownloadRoutes(app: Express, deps: DownloadDeps) {
  const { store, log, guards } = deps;

  app.head('/download/:token', metricsMiddleware('download'), ...guards, wrap(async (req: Request, res: Response) => {
    const job = store.peek(req.params.token);
    if (!job) throw new NotFoundError(INVALID_TOKEN);
    const info = await stat(job.outputPath).catch(() => undefined);
    if (!info) throw new NotFoundError(INVALID_TOKEN);
    res.setHeader('Content-Type', contentTypeFor(job.displayName));
    setDownloadHeaders(res, job.displayName, info.size);
    res.status(200).end();
  }));

  app.get('/download/:token', metricsMiddleware('download'), ...guards, wrap(async (req: Request, res: Response) => {
    const job = store.take(req.params.token);
    if (!job) throw new NotFoundError(INVALID_TOKEN);

    const jobDir = path.dirname(job.outputPath);
    const release = () => {
      void removeDir(jobDir, log, 'downloaded').then((removed) => {
        if (removed) jobsReclaimed.inc({ via: 'download' });
      });
    };

    try {
      await streamAttachment(res, job.outputPath, job.displayName, log, release);
    } catch (err) {
      log.warn('download_file_missing', { token: job.token, error: String(err) });
      release();
      throw new NotFoundError(INVALID_TOKEN);
    }
    log.info('download_started', { token: job.token, filename: job.displayName });
  }));
}
