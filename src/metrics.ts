import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS.
 * This module records milliseconds to match *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'hotline_voice_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [register],
});

// Backend stage duration (respond / synthesize / transcribe)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Backend stage duration in milliseconds',
  labelNames: ['stage', 'provider'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of backend failures by stage',
  labelNames: ['stage', 'provider'] as const,
  registers: [register],
});

const turnsTotal = new client.Counter({
  name: `${METRICS_PREFIX}turns_total`,
  help: 'Dialogue turns processed, by provider and outcome kind',
  labelNames: ['provider', 'kind', 'audio'] as const,
  registers: [register],
});

// ---------- helpers ----------

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;

  if (typeof routePath === 'string') return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id');
}

// ---------- exports used by server ----------

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

// ---------- stage timing API ----------

/**
 * Starts a stage timer and returns an end() function.
 */
export function startStageTimer(stage: string, provider: string | undefined): () => void {
  const start = nowNs();
  const providerLabel = provider ?? 'unknown';

  return () => {
    stageDurationMs.observe({ stage, provider: providerLabel }, nsToMs(nowNs() - start));
  };
}

export function incStageError(stage: string, provider: string | undefined): void {
  stageErrorsTotal.inc({ stage, provider: provider ?? 'unknown' });
}

export function recordTurn(provider: string, kind: string, hasAudio: boolean): void {
  turnsTotal.inc({ provider, kind, audio: hasAudio ? 'cloned' : 'native' });
}
