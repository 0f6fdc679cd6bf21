import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import { nanoid } from 'nanoid';
import routes from './routes';
import type PhaseOrchestrator from './services/phaseOrchestrator';
import type ExportService from './services/exportService';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestMetricsMiddleware } from './middleware/requestMetrics';
import { databaseState } from './config/database';
import { appConfig } from './config/appConfig';
import { getLogger } from './utils/logger';
import ApiError from './utils/ApiError';

export interface AppDependencies {
  orchestrator: PhaseOrchestrator;
  exportService: ExportService;
  clientOrigin?: string;
  /** Reports the persistence layer's connection state on /health. */
  healthCheck?: () => string;
}

export function createApp({
  orchestrator,
  exportService,
  clientOrigin = appConfig.server.clientOrigin,
  healthCheck = databaseState,
}: AppDependencies): Express {
  const app = express();
  app.disable('x-powered-by');

  const requestLogger = pinoHttp({
    logger: getLogger({ module: 'http' }),
    genReqId(req, res) {
      const header = req.headers['x-request-id'];
      const headerId = typeof header === 'string' ? header.trim() : '';
      const requestId = headerId && headerId.length <= 128 ? headerId : nanoid(16);
      res.setHeader('X-Request-Id', requestId);
      return requestId;
    },
    customLogLevel(_req, res, err) {
      if (err || res.statusCode >= 500) {
        return 'error';
      }
      if (res.statusCode >= 400) {
        return 'warn';
      }
      return 'info';
    },
    customSuccessMessage(req, res) {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },
    customErrorMessage(req, res, err) {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },
  });

  app.use(requestLogger);
  app.use(requestMetricsMiddleware);
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  const allowedOrigins = (clientOrigin ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  const allowAllOrigins = allowedOrigins.includes('*');

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || allowAllOrigins || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(new ApiError(403, 'Origin not allowed', { origin }, 'CORS_NOT_ALLOWED'));
      },
      exposedHeaders: ['X-Request-Id', 'X-Export-Format', 'X-Export-Chapter-Count', 'X-Export-Range'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  app.set('orchestrator', orchestrator);
  app.set('exportService', exportService);

  app.get('/health', (_req, res) => {
    const mongo = healthCheck();
    const healthy = mongo === 'connected';
    res.status(healthy ? 200 : 503).json({
      code: healthy ? 'SERVICE_HEALTHY' : 'SERVICE_UNHEALTHY',
      status: healthy ? 'ok' : 'unhealthy',
      mongo,
    });
  });

  app.use('/api', routes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
