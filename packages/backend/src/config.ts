import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseDuration } from '@discharge/shared';

const __dirname = fileURLToPath(new URL('.', import.meta.url));

export type StorageDriver = 'file' | 'mysql';

export interface DischargeConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;

  bedrock: {
    enabled: boolean;
    region: string;
    modelId: string;
  };

  checks: {
    timeoutMs: number;
    maxConcurrency: number;
    referenceDataDir: string;
  };

  approvalWindow: string;

  storage: {
    driver: StorageDriver;
    outputDir: string;
  };

  db: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };

  corsOrigins: string[];
}

function parsePositiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  const v = raw.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

function parseStorageDriver(raw: string | undefined): StorageDriver {
  const value = raw ?? 'file';
  if (value !== 'file' && value !== 'mysql') {
    throw new Error(`STORAGE_DRIVER must be "file" or "mysql", got "${value}"`);
  }
  return value;
}

/**
 * Build the runtime configuration from environment variables.
 * Throws on malformed values so misconfiguration fails at startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DischargeConfig {
  const approvalWindow = env.APPROVAL_WINDOW ?? '6h';
  parseDuration(approvalWindow);

  return {
    port: parsePositiveInt(env.PORT, 8000, 'PORT'),
    nodeEnv: env.NODE_ENV ?? 'development',
    logLevel: env.LOG_LEVEL ?? 'info',

    bedrock: {
      enabled: parseFlag(env.LLM_ENABLED),
      region: env.AWS_REGION ?? 'us-east-1',
      modelId: env.BEDROCK_MODEL_ID ?? 'us.anthropic.claude-sonnet-4-6',
    },

    checks: {
      timeoutMs: parsePositiveInt(env.CHECK_TIMEOUT_MS, 30_000, 'CHECK_TIMEOUT_MS'),
      maxConcurrency: parsePositiveInt(env.CHECK_CONCURRENCY, 5, 'CHECK_CONCURRENCY'),
      referenceDataDir: env.REFERENCE_DATA_DIR ?? resolve(__dirname, '../data'),
    },

    approvalWindow,

    storage: {
      driver: parseStorageDriver(env.STORAGE_DRIVER),
      outputDir: env.OUTPUT_DIR ?? resolve(process.cwd(), 'output'),
    },

    db: {
      host: env.DB_HOST ?? '127.0.0.1',
      port: parsePositiveInt(env.DB_PORT, 3306, 'DB_PORT'),
      user: env.DB_USER ?? 'root',
      password: env.DB_PASSWORD ?? 'root_dev',
      database: env.DB_NAME ?? 'discharge',
    },

    corsOrigins: (env.CORS_ORIGINS ?? 'http://localhost:5173').split(',').map((s) => s.trim()),
  };
}
