import type { NextFunction, Request, Response } from 'express';
import { recordRequestMetric } from '../utils/metrics';

function resolveRouteKey(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    const base = req.baseUrl === '/' || !req.baseUrl ? '' : req.baseUrl;
    return `${req.method} ${`${base}${routePath}`.replace(/\/$/, '') || '/'}`;
  }
  return `${req.method} (unmatched)`;
}

export function requestMetricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();
  let finished = false;

  const finalize = () => {
    if (finished) {
      return;
    }
    finished = true;
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    recordRequestMetric(resolveRouteKey(req), durationMs, res.statusCode);
  };

  res.on('finish', finalize);
  res.on('close', finalize);

  next();
}
