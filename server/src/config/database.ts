import mongoose from 'mongoose';
import { appConfig } from './appConfig';
import { getLogger } from '../utils/logger';

const logger = getLogger({ module: 'database' });

let cachedConnection: typeof mongoose | null = null;

export async function connectDatabase(uri: string = appConfig.mongo.uri): Promise<typeof mongoose> {
  if (cachedConnection) {
    return cachedConnection;
  }

  mongoose.set('strictQuery', true);

  const connection = await mongoose.connect(uri);
  cachedConnection = connection;
  logger.info({ host: connection.connection.host, db: connection.connection.name }, 'MongoDB connected');
  return connection;
}

export async function disconnectDatabase(): Promise<void> {
  if (!cachedConnection) {
    return;
  }
  await mongoose.disconnect();
  cachedConnection = null;
}

export function databaseState(): 'connected' | 'connecting' | 'disconnected' | 'disconnecting' | 'unknown' {
  switch (mongoose.connection.readyState) {
    case 1:
      return 'connected';
    case 2:
      return 'connecting';
    case 0:
      return 'disconnected';
    case 3:
      return 'disconnecting';
    default:
      return 'unknown';
  }
}
