import type { Express, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../core/logger.js';
import type { ConversionOrchestrator, ConvertedFile } from '../core/ConversionOrchestrator.js';
import { EngineError, errorMessage } from '../core/httpError.js';
import { streamAttachment } from '../core/http.js';
import { removeDir } from '../core/cleanup.js';
import { parseConvertQuery, requireUrlParam } from '../core/validate.js';
import { metricsMiddleware } from '../core/metrics.js';
import { wrap } from '../core/wrap.js';

export type FetchDeps = {
  orchestrator: ConversionOrchestrator;
  log: Logger;
  guards: RequestHandler[];
};

/**
 * GET /fetch?url=... converts synchronously and answers with the file itself.
 * Every conversion failure is a 500 with the engine's message.
 */
export function setupFetchRoutes(app: Express, deps: FetchDeps) {
  const { orchestrator, log, guards } = deps;

  app.get('/fetch', metricsMiddleware('fetch'), requireUrlParam, ...guards, wrap(async (req: Request, res: Response) => {
    const { url } = parseConvertQuery(req.query);

    // A client that leaves mid-conversion has already fired 'close'
    let clientGone = false;
    res.once('close', () => {
      clientGone = true;
    });

    let file: ConvertedFile;
    try {
      file = await orchestrator.convert(url);
    } catch (err) {
      throw new EngineError(errorMessage(err));
    }

    const { tempDir } = file;
    const release = () => {
      void removeDir(tempDir, log, 'fetched');
    };
    if (clientGone || res.destroyed) {
      log.info('fetch_client_gone', { url });
      release();
      return;
    }
    try {
      await streamAttachment(res, file.outputPath, file.displayName, log, release);
    } catch (err) {
      release();
      throw new EngineError(errorMessage(err));
    }
  }));
}
