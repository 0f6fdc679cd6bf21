import rateLimit from 'express-rate-limit';
import type { Request, RequestHandler, Response } from 'express';
import { appConfig } from '../config/appConfig';

const { windowMs, generationMax } = appConfig.rateLimit;

function getRetryAfterSeconds(res: Response): number {
  const reset = Number(res.getHeader('RateLimit-Reset'));
  if (Number.isFinite(reset) && reset > 0) {
    return Math.ceil(reset);
  }
  return Math.ceil(windowMs / 1000);
}

function rateLimitHandler(routeName: string) {
  return (_req: Request, res: Response): void => {
    const retryAfter = getRetryAfterSeconds(res);
    res.setHeader('Retry-After', retryAfter.toString());
    res.status(429).json({
      code: 'RATE_LIMITED',
      message: 'Too many generation requests; try again shortly',
      details: {
        retryAfter,
        limit: generationMax,
        windowSeconds: Math.ceil(windowMs / 1000),
        route: routeName,
      },
    });
  };
}

/** Limits the commands that call the model; reads and edits are not limited. */
export function createGenerationLimiter(routeName: string, max: number = generationMax): RequestHandler {
  return rateLimit({
    windowMs,
    limit: max,
    legacyHeaders: false,
    standardHeaders: true,
    handler: rateLimitHandler(routeName),
  });
}
