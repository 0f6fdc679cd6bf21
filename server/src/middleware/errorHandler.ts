import type { NextFunction, Request, Response } from 'express';
import ApiError from '../utils/ApiError';
import { getLogger } from '../utils/logger';

const fallbackLogger = getLogger({ module: 'http' });

function resolveErrorCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    case 422:
      return 'UNPROCESSABLE_ENTITY';
    case 429:
      return 'RATE_LIMITED';
    case 499:
      return 'CLIENT_CLOSED_REQUEST';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    case 504:
      return 'GATEWAY_TIMEOUT';
    default:
      return statusCode >= 500 ? 'INTERNAL_ERROR' : 'UNKNOWN_ERROR';
  }
}

/** Status carried by errors from body-parser and other http-errors producers. */
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : undefined;
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, 'Route not found', undefined, 'NOT_FOUND'));
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const isApiError = err instanceof ApiError;
  const statusCode = isApiError ? err.statusCode : httpStatusOf(err) ?? 500;
  const exposeMessage = isApiError || (statusCode < 500 && err instanceof Error);

  const payload = isApiError
    ? err.toPayload(resolveErrorCode(statusCode))
    : {
        code: resolveErrorCode(statusCode),
        message: exposeMessage && err instanceof Error ? err.message : 'Internal Server Error',
      };

  const requestLogger = req.log ?? fallbackLogger;
  const logFields = { requestId: req.id, code: payload.code, statusCode };
  if (statusCode >= 500) {
    requestLogger.error({ ...logFields, err }, err instanceof Error ? err.message : 'Unhandled error');
  } else {
    requestLogger.warn(logFields, payload.message);
  }

  if (res.headersSent) {
    return;
  }
  res.status(statusCode).json(payload);
}
