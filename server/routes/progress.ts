/**
 * Progress stream routes
 * GET /progress?url=... launches a conversion and streams its events over SSE
 */

import type { Express, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../core/logger.js';
import type { AppConfig } from '../core/config.js';
import type { ConversionOrchestrator } from '../core/ConversionOrchestrator.js';
import type { ProgressChannel } from '../core/ProgressChannel.js';
import { setSseHeaders, appendVary } from '../core/http.js';
import { SSE_KEEP_ALIVE, formatSseEvent, toWireEvent } from '../core/sse.js';
import { parseConvertQuery, requireUrlParam } from '../core/validate.js';
import { activeStreams, metricsMiddleware } from '../core/metrics.js';

export type ProgressDeps = {
  orchestrator: ConversionOrchestrator;
  log: Logger;
  config: Pick<AppConfig, 'ssePollMs' | 'sseKeepAliveMs'>;
  guards: RequestHandler[];
};

export function setupProgressRoutes(app: Express, deps: ProgressDeps) {
  const { orchestrator, log, config, guards } = deps;

  // ========================
  // GET /progress (SSE)
  // ========================
  app.get('/progress', metricsMiddleware('progress'), requireUrlParam, ...guards, (req: Request, res: Response) => {
    // Throws before any job or temp dir exists
    const { url } = parseConvertQuery(req.query);
    const { token, channel } = orchestrator.start(url);
    log.info('progress_stream_open', { token, url });

    setSseHeaders(res);
    appendVary(res, 'X-API-Key');
    res.status(200);
    res.flushHeaders();
    res.write(SSE_KEEP_ALIVE);

    // The job keeps running after a disconnect; only this stream stops
    const abort = new AbortController();
    const onClose = () => {
      if (res.writableFinished) return;
      abort.abort();
      log.info('progress_client_disconnected', { token });
    };
    res.on('close', onClose);
    activeStreams.inc();

    void pumpChannel(res, channel, config, abort.signal)
      .catch((err) => log.error('progress_stream_error', { token, error: String(err) }))
      .finally(() => {
        activeStreams.dec();
        res.off('close', onClose);
      });
  });
}

async function pumpChannel(
  res: Response,
  channel: ProgressChannel,
  config: ProgressDeps['config'],
  signal: AbortSignal,
): Promise<void> {
  const items = channel.drain({ pollMs: config.ssePollMs, keepAliveMs: config.sseKeepAliveMs, signal });
  for await (const item of items) {
    if (res.writableEnded || res.destroyed) return;
    if (item.kind === 'keepalive') {
      res.write(SSE_KEEP_ALIVE);
      continue;
    }
    const wire = toWireEvent(item.event);
    res.write(formatSseEvent(wire.name, wire.data));
  }
  if (!res.writableEnded && !res.destroyed) res.end();
}
