// Settings — environment-driven configuration validated with zod
// Entry points load .env first (dotenv/config); everything else receives a Settings object

import { existsSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  DATA_PATH: z.string().min(1).default('sales_data_sample.csv'),

  ANTHROPIC_API_KEY: z.string().default(''),
  GENERATION_MODEL: z.string().min(1).default('claude-haiku-4-5-20251001'),
  GENERATION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
  GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(1024),

  OPENAI_API_KEY: z.string().default(''),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(384),

  VECTOR_BACKEND: z.enum(['postgres', 'local']).default('postgres'),
  VECTOR_COLLECTION: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'must be a lowercase SQL identifier')
    .default('sales_data'),
  PG_HOST: z.string().default('localhost'),
  PG_PORT: z.coerce.number().int().positive().default(5433),
  PG_USER: z.string().default('sales'),
  PG_PASSWORD: z.string().default('sales_dev_pass'),
  PG_DATABASE: z.string().default('sales_insight'),
  PG_POOL_MIN: z.coerce.number().int().nonnegative().default(2),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),

  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(30),
  RATE_LIMIT_WINDOW: z.coerce.number().positive().default(60),
  ENRICH_TEXT: booleanFromEnv.default('true'),
  EMBEDDING_ITEM_DELAY_MS: z.coerce.number().int().nonnegative().default(100),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Settings {
  dataPath: string;
  generation: {
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  embedding: {
    apiKey: string;
    model: string;
    dimension: number;
    itemDelayMs: number;
    enrichText: boolean;
  };
  vectorStore: {
    backend: 'postgres' | 'local';
    collection: string;
    pg: {
      host: string;
      port: number;
      user: string;
      password: string;
      database: string;
      poolMin: number;
      poolMax: number;
    };
  };
  rateLimit: {
    maxRequests: number;
    windowMs: number;
  };
  logLevel: LogLevel;
}

/**
 * Parse settings from an environment map. Malformed values raise
 * ConfigurationError; absent credentials are left empty for
 * assertStartupReady to report.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Treat empty strings as unset so defaults apply
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  const e = parsed.data;

  return {
    dataPath: e.DATA_PATH,
    generation: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.GENERATION_MODEL,
      temperature: e.GENERATION_TEMPERATURE,
      maxTokens: e.GENERATION_MAX_TOKENS,
    },
    embedding: {
      apiKey: e.OPENAI_API_KEY,
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      itemDelayMs: e.EMBEDDING_ITEM_DELAY_MS,
      enrichText: e.ENRICH_TEXT,
    },
    vectorStore: {
      backend: e.VECTOR_BACKEND,
      collection: e.VECTOR_COLLECTION,
      pg: {
        host: e.PG_HOST,
        port: e.PG_PORT,
        user: e.PG_USER,
        password: e.PG_PASSWORD,
        database: e.PG_DATABASE,
        poolMin: e.PG_POOL_MIN,
        poolMax: e.PG_POOL_MAX,
      },
    },
    rateLimit: {
      maxRequests: e.RATE_LIMIT_REQUESTS,
      windowMs: e.RATE_LIMIT_WINDOW * 1000,
    },
    logLevel: e.LOG_LEVEL,
  };
}

/** Issues that must block startup: missing credentials, unreachable data source. */
export function validateSettings(
  settings: Settings,
  fileExists: (path: string) => boolean = existsSync,
): string[] {
  const issues: string[] = [];
  if (!settings.generation.apiKey) issues.push('ANTHROPIC_API_KEY is required');
  if (!settings.embedding.apiKey) issues.push('OPENAI_API_KEY is required');
  if (!fileExists(settings.dataPath)) issues.push(`Data file not found: ${settings.dataPath}`);
  return issues;
}

export function assertStartupReady(
  settings: Settings,
  fileExists: (path: string) => boolean = existsSync,
): void {
  const issues = validateSettings(settings, fileExists);
  if (issues.length > 0) throw new ConfigurationError(issues);
}
