import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Prometheus metrics for the transcription API.
 *
 * prom-client Histogram.startTimer() measures SECONDS; everything here records
 * milliseconds to match the *_ms metric names.
 */

export const register = new client.Registry();
const METRICS_PREFIX = 'transcription_api_';

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [register],
});

// decode, engine
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Transcription stage duration in milliseconds',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by transcription stage',
  labelNames: ['stage'] as const,
  registers: [register],
});

const engineQueueDepth = new client.Gauge({
  name: `${METRICS_PREFIX}engine_queue_depth`,
  help: 'Transcriptions waiting for or holding the engine',
  registers: [register],
});

let defaultMetricsCollected = false;

export function collectDefaultMetrics(): void {
  if (defaultMetricsCollected) return;
  defaultMetricsCollected = true;
  client.collectDefaultMetrics({ register, prefix: METRICS_PREFIX });
}

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Only the fixed routes get their own label; anything else is collapsed.
const KNOWN_ROUTES = new Set(['/v1/models', '/v1/audio/transcriptions', '/metrics']);

function getRouteLabel(req: Request): string {
  const path = req.path.length > 1 ? req.path.replace(/\/+$/, '') : req.path;
  return KNOWN_ROUTES.has(path) ? path : 'unmatched';
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    httpRequestDurationMs.observe(
      {
        method: req.method,
        route: getRouteLabel(req),
        code: String(res.statusCode),
      },
      nsToMs(nowNs() - start),
    );
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function that records
 * milliseconds into stageDurationMs.
 */
export function startStageTimer(stage: string): () => number {
  const start = nowNs();
  return () => {
    const durationMs = nsToMs(nowNs() - start);
    stageDurationMs.observe({ stage }, durationMs);
    return durationMs;
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function setEngineQueueDepth(depth: number): void {
  engineQueueDepth.set(depth);
}
