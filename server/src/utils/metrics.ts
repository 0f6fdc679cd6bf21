import type { Logger } from 'pino';

interface MetricRecord {
  count: number;
  errorCount: number;
  totalDurationMs: number;
  outcomes: Record<string, number>;
}

export type MetricKind = 'request' | 'model';

export interface MetricSnapshot {
  kind: MetricKind;
  key: string;
  count: number;
  averageDurationMs: number;
  errorRate: number;
  outcomes: Record<string, number>;
}

const metrics = new Map<string, MetricRecord>();

let loggerRef: Logger | null = null;
let flushTimer: NodeJS.Timeout | null = null;

function splitKey(compound: string): { kind: MetricKind; key: string } {
  const [kind, ...rest] = compound.split('|');
  return { kind: kind === 'model' ? 'model' : 'request', key: rest.join('|') };
}

function toSnapshot([compound, record]: [string, MetricRecord]): MetricSnapshot {
  const averageDurationMs = record.count > 0 ? record.totalDurationMs / record.count : 0;
  const errorRate = record.count > 0 ? record.errorCount / record.count : 0;
  return {
    ...splitKey(compound),
    count: record.count,
    averageDurationMs: Number(averageDurationMs.toFixed(2)),
    errorRate: Number(errorRate.toFixed(3)),
    outcomes: { ...record.outcomes },
  };
}

function record(kind: MetricKind, key: string, durationMs: number, outcome: string, errored: boolean): void {
  const compound = `${kind}|${key}`;
  const entry = metrics.get(compound) ?? { count: 0, errorCount: 0, totalDurationMs: 0, outcomes: {} };
  entry.count += 1;
  entry.totalDurationMs += durationMs;
  entry.outcomes[outcome] = (entry.outcomes[outcome] ?? 0) + 1;
  if (errored) {
    entry.errorCount += 1;
  }
  metrics.set(compound, entry);
}

function flushMetrics(): void {
  if (!loggerRef || metrics.size === 0) {
    return;
  }
  loggerRef.info({ metrics: Array.from(metrics.entries()).map(toSnapshot) }, 'metrics');
  metrics.clear();
}

export function initialiseMetrics(logger: Logger, intervalMs: number): void {
  loggerRef = logger;
  if (intervalMs <= 0 || flushTimer) {
    return;
  }
  flushTimer = setInterval(flushMetrics, intervalMs);
  flushTimer.unref();
}

export function recordRequestMetric(key: string, durationMs: number, statusCode: number): void {
  record('request', key, durationMs, String(statusCode), statusCode >= 400);
}

/** Outcome is "ok" or the error code the call failed with. */
export function recordModelCall(purpose: string, durationMs: number, outcome: string): void {
  record('model', purpose, durationMs, outcome, outcome !== 'ok');
}

export function stopMetricsTimer(): void {
  if (flushTimer) {
    clearInterval(flushTimer);
    flushTimer = null;
  }
  flushMetrics();
}

export function getMetricsSnapshot(): MetricSnapshot[] {
  return Array.from(metrics.entries()).map(toSnapshot);
}

export function resetMetrics(): void {
  metrics.clear();
}
