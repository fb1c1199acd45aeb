import type { Request, Response, NextFunction } from 'express';
import client from 'prom-client';

const requestCounter = new client.Counter({
  name: 'http_requests_total',
  help: 'HTTP requests count',
  labelNames: ['route', 'method', 'code'] as const,
});

const requestDuration = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route', 'method', 'code'] as const,
  buckets: [0.05, 0.1, 0.3, 0.6, 1, 3, 5, 30, 120],
});

export const jobsStarted = new client.Counter({
  name: 'conversion_jobs_started_total',
  help: 'Conversion jobs launched',
});

export const jobsFinished = new client.Counter({
  name: 'conversion_jobs_finished_total',
  help: 'Conversion jobs finished, by outcome',
  labelNames: ['outcome'] as const,
});

export const jobsReclaimed = new client.Counter({
  name: 'conversion_jobs_reclaimed_total',
  help: 'Job directories deleted, by path (download, expired, shutdown)',
  labelNames: ['via'] as const,
});

export const activeStreams = new client.Gauge({
  name: 'progress_streams_active',
  help: 'Open /progress event streams',
});

client.collectDefaultMetrics();

export function metricsMiddleware(routeLabel: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const code = String(res.statusCode);
      requestCounter.inc({ route: routeLabel, method: req.method, code });
      const elapsed = Number(process.hrtime.bigint() - start) / 1e9;
      requestDuration.observe({ route: routeLabel, method: req.method, code }, elapsed);
    });
    next();
  };
}

export const prometheusRegister = client.register;
