import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig } from '../../config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 8000,
      nodeEnv: 'development',
      logLevel: 'info',
      bedrock: { enabled: false, region: 'us-east-1' },
      checks: { timeoutMs: 30000, maxConcurrency: 5 },
      approvalWindow: '6h',
      storage: { driver: 'file', outputDir: resolve(process.cwd(), 'output') },
      db: { host: '127.0.0.1', port: 3306, database: 'discharge' },
      corsOrigins: ['http://localhost:5173'],
    });
    expect(config.checks.referenceDataDir).toMatch(/data$/);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      LLM_ENABLED: 'YES',
      BEDROCK_MODEL_ID: 'test-model',
      CHECK_TIMEOUT_MS: '5000',
      CHECK_CONCURRENCY: '2',
      APPROVAL_WINDOW: '2d',
      STORAGE_DRIVER: 'mysql',
      OUTPUT_DIR: '/tmp/discharge-out',
      DB_PASSWORD: 'test-secret',
      CORS_ORIGINS: 'http://a.test, http://b.test',
    });

    expect(config.port).toBe(9100);
    expect(config.bedrock).toEqual({ enabled: true, region: 'us-east-1', modelId: 'test-model' });
    expect(config.checks.timeoutMs).toBe(5000);
    expect(config.checks.maxConcurrency).toBe(2);
    expect(config.approvalWindow).toBe('2d');
    expect(config.storage).toEqual({ driver: 'mysql', outputDir: '/tmp/discharge-out' });
    expect(config.db.password).toBe('test-secret');
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('treats anything but 1, true or yes as LLM disabled', () => {
    expect(loadConfig({ LLM_ENABLED: 'on' }).bedrock.enabled).toBe(false);
    expect(loadConfig({ LLM_ENABLED: '1' }).bedrock.enabled).toBe(true);
  });

  it('rejects malformed numbers', () => {
    expect(() => loadConfig({ CHECK_TIMEOUT_MS: '0' })).toThrow('CHECK_TIMEOUT_MS must be a positive integer, got "0"');
    expect(() => loadConfig({ CHECK_CONCURRENCY: 'many' })).toThrow(
      'CHECK_CONCURRENCY must be a positive integer, got "many"',
    );
  });

  it('rejects an unknown storage driver', () => {
    expect(() => loadConfig({ STORAGE_DRIVER: 'redis' })).toThrow('STORAGE_DRIVER must be "file" or "mysql", got "redis"');
  });

  it('rejects a malformed approval window', () => {
    expect(() => loadConfig({ APPROVAL_WINDOW: '90m' })).toThrow('Invalid duration format "90m"');
  });
});
