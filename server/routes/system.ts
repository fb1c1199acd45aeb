import type { Express, Request, RequestHandler, Response } from 'express';
import type { JobStore } from '../core/JobStore.js';
import type { Reclaimer } from '../core/Reclaimer.js';
import type { ConversionOrchestrator } from '../core/ConversionOrchestrator.js';
import { prometheusRegister } from '../core/metrics.js';
import { wrap } from '../core/wrap.js';

export type SystemDeps = {
  store: JobStore;
  reclaimer: Reclaimer;
  orchestrator: ConversionOrchestrator;
  guards: RequestHandler[];
};

export function setupSystemRoutes(app: Express, deps: SystemDeps) {
  const { store, reclaimer, orchestrator, guards } = deps;

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get('/ready', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get('/metrics', wrap(async (_req: Request, res: Response) => {
    res.setHeader('Content-Type', prometheusRegister.contentType);
    res.end(await prometheusRegister.metrics());
  }));

  app.get('/api/stats', ...guards, (_req: Request, res: Response) => {
    res.json({
      jobsRunning: orchestrator.running,
      jobsAwaitingDownload: store.size,
      reclaimScheduled: reclaimer.scheduled,
      uptimeSec: Math.round(process.uptime()),
    });
  });
}
