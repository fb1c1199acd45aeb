import express from 'express';
import type { Express } from 'express';
import type { AppConfig } from './core/config.js';
import { getLogger, type Logger } from './core/logger.js';
import type { MediaEngine } from './core/engine.js';
import { JobStore } from './core/JobStore.js';
import { Reclaimer } from './core/Reclaimer.js';
import { ConversionOrchestrator } from './core/ConversionOrchestrator.js';
import { applySecurity } from './middleware/security.js';
import { globalRateLimit, conversionRateLimit } from './middleware/rateLimit.js';
import { createRequestLogger } from './middleware/requestLog.js';
import { requireApiKey } from './middleware/apiKey.js';
import { createErrorHandler } from './middleware/error.js';
import { setupProgressRoutes } from './routes/progress.js';
import { setupDownloadRoutes } from './routes/download.js';
import { setupFetchRoutes } from './routes/fetch.js';
import { setupSystemRoutes } from './routes/system.js';
import { setupUiRoutes } from './routes/ui.js';

export type AppDeps = {
  config: AppConfig;
  engine: MediaEngine;
  log?: Logger;
  now?: () => number;
};

export type AppContext = {
  app: Express;
  store: JobStore;
  reclaimer: Reclaimer;
  orchestrator: ConversionOrchestrator;
  /** Cancel pending timers and delete every stored job's directory. */
  shutdown: () => Promise<number>;
};

/**
 * Build the HTTP app around one process-wide store, reclaimer and orchestrator
 */
export function createApp(deps: AppDeps): AppContext {
  const { config, engine } = deps;
  const log = deps.log ?? getLogger('server');

  const store = new JobStore(log);
  const reclaimer = new Reclaimer(store, log);
  const orchestrator = new ConversionOrchestrator({
    engine,
    store,
    reclaimer,
    log,
    tmpRoot: config.tmpRoot,
    retentionMs: config.retentionMs,
    audioFormat: config.audioFormat,
    now: deps.now,
  });

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  applySecurity(app, config.corsOrigin);
  app.use(globalRateLimit(config.rateLimitPerMin));
  app.use(createRequestLogger(log));

  const apiKey = requireApiKey(() => config.apiKey);
  const conversionGuards = [apiKey, conversionRateLimit(config.rateLimitPerMin)];

  setupSystemRoutes(app, { store, reclaimer, orchestrator, guards: [apiKey] });
  setupProgressRoutes(app, { orchestrator, log, config, guards: conversionGuards });
  setupDownloadRoutes(app, { store, log, guards: [apiKey] });
  setupFetchRoutes(app, { orchestrator, log, guards: conversionGuards });
  setupUiRoutes(app, config.publicDir);

  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' });
  });
  app.use(createErrorHandler(log));

  return {
    app,
    store,
    reclaimer,
    orchestrator,
    shutdown: () => reclaimer.shutdown(),
  };
}
