import * as path from 'path';
import type { DatabaseConfig, PipelineConfig } from './types.js';
import { ValidationError, Validators } from './utils.js';

export const DEFAULT_BATCH_SIZE = 500;
// Five bind parameters per header row; PostgreSQL accepts at most 65535 per statement
export const MAX_BATCH_SIZE = 13000;

type Env = Record<string, string | undefined>;

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;

  const num = Number(value);
  if (!Validators.isPositiveInteger(num)) {
    throw new ValidationError(`${name} must be a positive integer`, { [name]: value });
  }
  return num;
}

export function loadDatabaseConfig(env: Env = process.env): DatabaseConfig {
  return {
    connectionString: env.DATABASE_URL || undefined,
    host: env.DB_HOST || 'localhost',
    port: parsePositiveInt('DB_PORT', env.DB_PORT, 5432),
    database: env.DB_NAME || 'repair_orders',
    user: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || 'postgres',
  };
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): PipelineConfig {
  const logLevel = env.LOG_LEVEL ? env.LOG_LEVEL.toLowerCase() : 'info';
  if (!Validators.isLogLevel(logLevel)) {
    throw new ValidationError('LOG_LEVEL must be one of debug, info, warn, error', {
      LOG_LEVEL: env.LOG_LEVEL,
    });
  }

  const batchSize = parsePositiveInt('LOAD_BATCH_SIZE', env.LOAD_BATCH_SIZE, DEFAULT_BATCH_SIZE);
  if (batchSize > MAX_BATCH_SIZE) {
    throw new ValidationError(`LOAD_BATCH_SIZE must not exceed ${MAX_BATCH_SIZE}`, {
      LOAD_BATCH_SIZE: env.LOAD_BATCH_SIZE,
    });
  }

  return {
    database: loadDatabaseConfig(env),
    // the data directory sits beside the one the job is started from
    dataDir: path.resolve(cwd, env.DATA_DIR || path.join('..', 'data')),
    logLevel,
    batchSize,
  };
}
