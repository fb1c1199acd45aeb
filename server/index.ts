import type { Server } from 'node:http';
import { loadConfig } from './core/config.js';
import { getLogger } from './core/logger.js';
import { Downloader } from './core/Downloader.js';
import { createApp } from './app.js';

const log = getLogger('server');
const config = loadConfig();

const context = createApp({
  config,
  log,
  engine: new Downloader(log, {
    ytDlpPath: config.ytDlpPath,
    audioFormat: config.audioFormat,
    audioQuality: config.audioQuality,
  }),
});

export const app = context.app;

let server: Server | undefined;

if (process.env.NODE_ENV !== 'test') {
  server = app.listen(config.port);
  // Conversions can take minutes before the first byte of a /fetch response
  server.requestTimeout = 0;
  server.keepAliveTimeout = 120_000;
  server.headersTimeout = 125_000;
  server.once('listening', () => {
    log.info(`audio relay listening on http://localhost:${config.port}`);
    log.info('config', {
      tmpRoot: config.tmpRoot,
      retentionSec: config.retentionMs / 1000,
      audioFormat: config.audioFormat,
      apiKey: config.apiKey ? 'set' : 'unset',
    });
  });
  server.once('error', (err) => {
    log.error('fatal_startup', String(err));
    process.exitCode = 1;
  });
}

// ========================
// Graceful shutdown & crash guards
// ========================
let shuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`shutdown_${signal.toLowerCase()}`, 'Shutting down, reclaiming stored jobs...');
  server?.close();
  try {
    const removed = await context.shutdown();
    log.info('shutdown_complete', { removed });
  } catch (err) {
    log.error('shutdown_failed', String(err));
  }
  process.exit(0);
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

const BENIGN = /aborted|socket hang up|econnreset|stream prematurely closed/;

process.on('uncaughtException', (err) => {
  if (BENIGN.test(String(err.message).toLowerCase())) return;
  log.error('uncaught_exception', err.stack || String(err));
});
process.on('unhandledRejection', (reason: unknown) => {
  const text = reason instanceof Error ? reason.stack || reason.message : String(reason);
  if (BENIGN.test(text.toLowerCase())) return;
  log.error('unhandled_rejection', text);
});
