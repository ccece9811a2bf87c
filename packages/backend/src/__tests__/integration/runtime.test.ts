/**
 * Wiring test: the runtime built from configuration runs a patient end to
 * end and writes its records to the file store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRuntime } from '../../bootstrap.js';
import { loadConfig } from '../../config.js';
import { silentLogger } from '../../logger.js';

let outputDir: string;

beforeEach(async () => {
  outputDir = await mkdtemp(join(tmpdir(), 'discharge-runtime-'));
});

afterEach(async () => {
  await rm(outputDir, { recursive: true, force: true });
});

describe('createRuntime', () => {
  it('uses the file store and template narrative by default', async () => {
    const runtime = createRuntime(loadConfig({ OUTPUT_DIR: outputDir }), silentLogger());

    try {
      const { decision } = await runtime.orchestrator.runDischargeVerification('P00231');

      expect(runtime.store.driver).toBe('file');
      expect(decision.outcome).toBe('APPROVE');
      const saved = JSON.parse(await readFile(join(outputDir, 'state', 'P00231.json'), 'utf8'));
      expect(saved).toMatchObject({ patientId: 'P00231', status: 'approved', version: '1.0' });
      const audit = await readFile(join(outputDir, 'audit', 'P00231.jsonl'), 'utf8');
      expect(audit.trim().split('\n')).toHaveLength(1);
    } finally {
      await runtime.close();
    }
  });
});
