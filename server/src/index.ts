import 'dotenv/config';
import http from 'http';
import { connectDatabase, disconnectDatabase } from './config/database';
import { appConfig } from './config/appConfig';
import { createApp } from './app';
import { MongoProjectRepository } from './services/projectRepository';
import OpenAITransport from './services/openai';
import StoryAgents from './services/storyAgents';
import PhaseOrchestrator from './services/phaseOrchestrator';
import ExportService from './services/exportService';
import ContextWindowBuilder from './services/contextBuilder';
import RetryPolicy from './utils/retryPolicy';
import { getLogger } from './utils/logger';
import { initialiseMetrics, stopMetricsTimer } from './utils/metrics';

const logger = getLogger({ module: 'server' });

async function bootstrapApplication(): Promise<void> {
  await connectDatabase();
  initialiseMetrics(getLogger({ module: 'metrics' }), appConfig.metrics.flushIntervalMs);

  const repository = new MongoProjectRepository();
  const agents = new StoryAgents({
    transport: new OpenAITransport(),
    retryPolicy: new RetryPolicy({
      maxAttempts: appConfig.retry.maxAttempts,
      baseDelayMs: appConfig.retry.baseDelayMs,
    }),
  });
  const orchestrator = new PhaseOrchestrator({
    repository,
    agents,
    builder: new ContextWindowBuilder({ trailingWindow: appConfig.story.trailingWindow }),
    settings: appConfig.story,
  });
  const app = createApp({ orchestrator, exportService: new ExportService({ repository }) });

  const { port } = appConfig.server;
  const server = http.createServer(app);
  server.listen(port, () => {
    logger.info({ port, model: appConfig.model.name, modelBaseUrl: appConfig.model.baseUrl }, 'Listening');
  });

  const shutdown = () => {
    logger.info('Shutting down');
    stopMetricsTimer();
    server.close((error) => {
      if (error) {
        logger.error({ err: error }, 'Error while closing server');
      }
      disconnectDatabase()
        .catch((disconnectError: unknown) => {
          logger.error({ err: disconnectError }, 'Error while closing the database connection');
        })
        .finally(() => {
          process.exit(error ? 1 : 0);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

async function start(): Promise<void> {
  try {
    await bootstrapApplication();
  } catch (error) {
    logger.error({ err: error }, 'Failed to start');
    process.exit(1);
  }
}

void start();
