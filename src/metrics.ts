import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; the *_ms histograms
 * below are observed with true milliseconds instead.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_bridge_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const audioFramesRelayedTotal = new client.Counter({
  name: `${METRICS_PREFIX}audio_frames_relayed_total`,
  help: 'Audio frames relayed between transport and AI session',
  labelNames: ['direction'] as const,
  registers: [register],
});

const audioFramesDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}audio_frames_dropped_total`,
  help: 'Audio frames dropped before delivery',
  labelNames: ['direction', 'reason'] as const,
  registers: [register],
});

const interruptionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}interruptions_total`,
  help: 'Barge-in interruptions of assistant playback',
  registers: [register],
});

const toolCallsTotal = new client.Counter({
  name: `${METRICS_PREFIX}tool_calls_total`,
  help: 'Tool calls dispatched, by tool and outcome',
  labelNames: ['tool', 'outcome'] as const,
  registers: [register],
});

const toolDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}tool_duration_ms`,
  help: 'Tool call duration in milliseconds',
  labelNames: ['tool'] as const,
  buckets: [10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000],
  registers: [register],
});

const activeCalls = new client.Gauge({
  name: `${METRICS_PREFIX}active_calls`,
  help: 'Calls currently registered',
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls terminated, by reason',
  labelNames: ['reason'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 600],
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
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

export type RelayDirection = 'caller_to_ai' | 'ai_to_caller';

export function incAudioFramesRelayed(direction: RelayDirection, count = 1): void {
  audioFramesRelayedTotal.inc({ direction }, count);
}

export function incAudioFramesDropped(direction: RelayDirection, reason: string, count = 1): void {
  const label = reason && reason.trim() !== '' ? reason : 'unknown';
  audioFramesDroppedTotal.inc({ direction, reason: label }, count);
}

export function incInterruptions(): void {
  interruptionsTotal.inc();
}

export function recordToolCall(tool: string, outcome: string, durationMs: number): void {
  toolCallsTotal.inc({ tool, outcome });
  toolDurationMs.observe({ tool }, durationMs);
}

export function setActiveCalls(count: number): void {
  activeCalls.set(count);
}

export function recordCallCompletion(reason: string, durationMs: number): void {
  callCompletionsTotal.inc({ reason });
  callDurationSeconds.observe(durationMs / 1000);
}
