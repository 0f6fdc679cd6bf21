import { z } from 'zod';

const booleanStrings = new Map<unknown, boolean>([
  [true, true],
  [false, false],
  ['true', true],
  ['false', false],
  ['1', true],
  ['0', false],
  ['yes', true],
  ['no', false],
  ['on', true],
  ['off', false],
]);

function parseBoolean(value: unknown, field: string): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  const normalised = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (normalised === '') {
    return false;
  }
  const parsedValue = booleanStrings.get(normalised);
  if (parsedValue === undefined) {
    throw new Error(`${field} must be a boolean-like value (true/false)`);
  }
  return parsedValue;
}

function parseIntegerInRange(
  raw: unknown,
  field: string,
  { min, max, defaultValue }: { min: number; max: number; defaultValue: number }
): number {
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }
  const numeric = typeof raw === 'number' ? raw : Number(String(raw).trim());
  if (!Number.isFinite(numeric)) {
    throw new Error(`${field} must be a finite number`);
  }
  const integer = Math.floor(numeric);
  if (integer < min || integer > max) {
    throw new Error(`${field} must be between ${min} and ${max}`);
  }
  return integer;
}

const numberLike = z.union([z.string(), z.number()]).optional();

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: numberLike,
  MONGO_URI: z.string().optional(),
  MONGODB_URI: z.string().optional(),
  MODEL_BASE_URL: z
    .preprocess((value) => {
      if (typeof value !== 'string') {
        return value;
      }
      const trimmed = value.trim();
      return trimmed.length ? trimmed : undefined;
    }, z.string().url('MODEL_BASE_URL must be a valid URL'))
    .optional(),
  MODEL_NAME: z.string().optional(),
  MODEL_API_KEY: z.string().optional(),
  MAX_CONTEXT_TOKENS: numberLike,
  SESSION_MIN_WORDS: numberLike,
  SESSION_MAX_WORDS: numberLike,
  CRITIQUE_INTERVAL: numberLike,
  TRAILING_WINDOW: numberLike,
  MODEL_MAX_ATTEMPTS: numberLike,
  MODEL_RETRY_BASE_MS: numberLike,
  MODEL_TIMEOUT_MS: numberLike,
  AUTO_COMMIT: z.union([z.string(), z.boolean(), z.number()]).optional(),
  GENERATION_RATE_LIMIT_PER_MINUTE: numberLike,
  CLIENT_ORIGIN: z.string().optional(),
  METRIC_FLUSH_INTERVAL_MS: numberLike,
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  throw new Error(`Invalid environment configuration: ${issues}`);
}

const env = parsed.data;

const environment = env.NODE_ENV?.trim() || 'development';
const port = parseIntegerInRange(env.PORT, 'PORT', { min: 1, max: 65535, defaultValue: 3001 });
const mongoUri = env.MONGODB_URI?.trim() || env.MONGO_URI?.trim() || 'mongodb://localhost:27017/story_orchestrator';

const minWords = parseIntegerInRange(env.SESSION_MIN_WORDS, 'SESSION_MIN_WORDS', {
  min: 1,
  max: 50_000,
  defaultValue: 300,
});
const maxWords = parseIntegerInRange(env.SESSION_MAX_WORDS, 'SESSION_MAX_WORDS', {
  min: 1,
  max: 50_000,
  defaultValue: 4000,
});
if (minWords > maxWords) {
  throw new Error('Invalid environment configuration: SESSION_MIN_WORDS must not exceed SESSION_MAX_WORDS');
}

export const appConfig = {
  environment,
  server: {
    port,
    clientOrigin: env.CLIENT_ORIGIN?.trim() || undefined,
  },
  mongo: {
    uri: mongoUri,
  },
  model: {
    baseUrl: env.MODEL_BASE_URL ?? 'http://localhost:11434/v1',
    name: env.MODEL_NAME?.trim() || 'llama3.1:8b',
    apiKey: env.MODEL_API_KEY?.trim() || 'ollama',
    timeoutMs: parseIntegerInRange(env.MODEL_TIMEOUT_MS, 'MODEL_TIMEOUT_MS', {
      min: 1000,
      max: 3_600_000,
      defaultValue: 120_000,
    }),
  },
  retry: {
    maxAttempts: parseIntegerInRange(env.MODEL_MAX_ATTEMPTS, 'MODEL_MAX_ATTEMPTS', { min: 1, max: 10, defaultValue: 3 }),
    baseDelayMs: parseIntegerInRange(env.MODEL_RETRY_BASE_MS, 'MODEL_RETRY_BASE_MS', {
      min: 0,
      max: 60_000,
      defaultValue: 1000,
    }),
  },
  story: {
    maxContextTokens: parseIntegerInRange(env.MAX_CONTEXT_TOKENS, 'MAX_CONTEXT_TOKENS', {
      min: 256,
      max: 1_000_000,
      defaultValue: 8000,
    }),
    session: { minWords, maxWords },
    critiqueInterval: parseIntegerInRange(env.CRITIQUE_INTERVAL, 'CRITIQUE_INTERVAL', {
      min: 0,
      max: 1000,
      defaultValue: 5,
    }),
    trailingWindow: parseIntegerInRange(env.TRAILING_WINDOW, 'TRAILING_WINDOW', { min: 0, max: 20, defaultValue: 3 }),
    autoCommit: parseBoolean(env.AUTO_COMMIT, 'AUTO_COMMIT'),
  },
  metrics: {
    flushIntervalMs: parseIntegerInRange(env.METRIC_FLUSH_INTERVAL_MS, 'METRIC_FLUSH_INTERVAL_MS', {
      min: 0,
      max: 86_400_000,
      defaultValue: environment === 'test' ? 0 : 60_000,
    }),
  },
  rateLimit: {
    windowMs: 60_000,
    generationMax: parseIntegerInRange(env.GENERATION_RATE_LIMIT_PER_MINUTE, 'GENERATION_RATE_LIMIT_PER_MINUTE', {
      min: 1,
      max: 10_000,
      defaultValue: 30,
    }),
  },
} as const;

export type AppConfig = typeof appConfig;

export type ModelConfig = AppConfig['model'];

export type StoryConfig = AppConfig['story'];
