/**
 * Unit tests for StateStore over the in-memory key-value store.
 */

import { describe, it, expect } from 'vitest';
import { StateStore, buildAuditEntry } from '../../engine/state-store.js';
import { PersistenceError } from '../../errors.js';
import { MemoryKeyValueStore } from '../../store/memory-store.js';
import type { KeyValueStore } from '../../store/key-value-store.js';
import { silentLogger } from '../../logger.js';
import { FailingStore, makeDecision, makeIssue, sleep } from '../helpers/fakes.js';

const NOW = new Date('2026-10-19T10:00:00.000Z');

function buildStateStore(store: KeyValueStore = new MemoryKeyValueStore(), approvalWindow = '6h') {
  return new StateStore({ store, logger: silentLogger(), approvalWindow, clock: () => NOW });
}

const holdDecision = makeDecision({
  outcome: 'HOLD',
  approved: false,
  blockedBy: ['Lab'],
  issues: [
    makeIssue({ code: 'LAB_CRITICAL_VALUE', severity: 'critical' }),
    makeIssue({ code: 'BED_CLEANUP_DELAY', severity: 'medium', sourceCheck: 'Bed Management' }),
  ],
  suggestedResolutions: [
    {
      action: 'Schedule terminal cleaning for bed turnover',
      detail: { sourceCheck: 'Bed Management', code: 'BED_CLEANUP_DELAY', severity: 'medium', data: {} },
    },
  ],
});

describe('StateStore', () => {
  it('rejects a malformed approval window at construction', () => {
    expect(() => buildStateStore(new MemoryKeyValueStore(), '6 hours')).toThrow(
      'Invalid duration format "6 hours". Expected "6h", "24h", "7d", "30d", etc.',
    );
  });

  describe('save', () => {
    it('stores an approved decision with an expiry one window later', async () => {
      const stateStore = buildStateStore();

      const { state, locator } = await stateStore.save('P1', makeDecision());

      expect(locator).toBe('state/P1');
      expect(state).toEqual({
        patientId: 'P1',
        status: 'approved',
        decision: makeDecision(),
        expiresAt: '2026-10-19T16:00:00.000Z',
        createdAt: '2026-10-19T10:00:00.000Z',
        lastUpdatedAt: '2026-10-19T10:00:00.000Z',
        version: '1.0',
      });
      expect(await stateStore.load('P1')).toEqual(state);
    });

    it('stores a held decision without an expiry', async () => {
      const stateStore = buildStateStore();

      const { state } = await stateStore.save('P1', holdDecision);

      expect(state.status).toBe('hold');
      expect(state).not.toHaveProperty('expiresAt');
    });

    it('maps a pending decision to pending_auto_resolution', async () => {
      const stateStore = buildStateStore();

      const { state } = await stateStore.save('P1', makeDecision({ outcome: 'PENDING_AUTO_RESOLUTION', approved: false }));

      expect(state.status).toBe('pending_auto_resolution');
    });

    it('keeps only the latest decision', async () => {
      const stateStore = buildStateStore();

      await stateStore.save('P1', makeDecision());
      await stateStore.save('P1', holdDecision);

      expect((await stateStore.load('P1'))?.status).toBe('hold');
    });

    it('wraps write failures in PersistenceError', async () => {
      const stateStore = buildStateStore(new FailingStore('put'));

      const err = await stateStore.save('P1', makeDecision()).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(PersistenceError);
      expect(err).toMatchObject({
        code: 'persistence.failed',
        message: 'Failed to save state for P1',
      });
      expect(err).toHaveProperty('cause.message', 'disk full writing state/P1');
    });
  });

  describe('isExpired', () => {
    it('is false right after an approval and true once the window has passed', async () => {
      const stateStore = buildStateStore();
      await stateStore.save('P1', makeDecision());

      expect(await stateStore.isExpired('P1')).toBe(false);
      expect(await stateStore.isExpired('P1', new Date('2026-10-19T16:00:00.000Z'))).toBe(false);
      expect(await stateStore.isExpired('P1', new Date('2026-10-19T16:00:00.001Z'))).toBe(true);
    });

    it('never expires a decision without an expiry', async () => {
      const stateStore = buildStateStore();
      await stateStore.save('P1', holdDecision);

      expect(await stateStore.isExpired('P1', new Date('2030-01-01T00:00:00.000Z'))).toBe(false);
    });

    it('is false for an unknown patient', async () => {
      expect(await buildStateStore().isExpired('P404')).toBe(false);
    });
  });

  describe('load', () => {
    it('returns null when nothing is stored', async () => {
      expect(await buildStateStore().load('P1')).toBeNull();
    });

    it('returns null for a record that fails validation', async () => {
      const store = new MemoryKeyValueStore();
      await store.put('state', 'P1', { patientId: 'P1', status: 'discharged' });

      expect(await buildStateStore(store).load('P1')).toBeNull();
    });

    it('wraps read failures in PersistenceError', async () => {
      const store: KeyValueStore = {
        driver: 'broken',
        put: () => Promise.reject(new Error('unused')),
        append: () => Promise.reject(new Error('unused')),
        get: () => Promise.reject(new Error('connection reset')),
        list: () => Promise.reject(new Error('connection reset')),
        clear: () => Promise.reject(new Error('unused')),
      };
      const stateStore = buildStateStore(store);

      await expect(stateStore.load('P1')).rejects.toThrow(new PersistenceError('load state for', 'P1'));
      await expect(stateStore.loadAudit('P1')).rejects.toThrow(new PersistenceError('load audit trail for', 'P1'));
    });
  });

  describe('audit trail', () => {
    it('appends entries in order', async () => {
      const stateStore = buildStateStore();

      const locator = await stateStore.appendAudit('P1', buildAuditEntry(makeDecision()));
      await stateStore.appendAudit('P1', buildAuditEntry(holdDecision));

      expect(locator).toBe('audit/P1');
      expect((await stateStore.loadAudit('P1')).map((e) => e.outcome)).toEqual(['APPROVE', 'HOLD']);
    });

    it('skips entries that fail validation', async () => {
      const store = new MemoryKeyValueStore();
      const stateStore = buildStateStore(store);
      await stateStore.appendAudit('P1', buildAuditEntry(makeDecision()));
      await store.append('audit', 'P1', { note: 'not an audit entry' });
      await stateStore.appendAudit('P1', buildAuditEntry(holdDecision));

      expect(await stateStore.loadAudit('P1')).toHaveLength(2);
    });

    it('wraps append failures in PersistenceError', async () => {
      const stateStore = buildStateStore(new FailingStore('append'));

      const err = await stateStore.appendAudit('P1', buildAuditEntry(makeDecision())).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(PersistenceError);
      expect(err).toMatchObject({
        message: 'Failed to append audit entry for P1',
      });
      expect(err).toHaveProperty('cause.message', 'disk full appending audit/P1');
    });
  });

  describe('withPatientLock', () => {
    it('serializes work for the same patient', async () => {
      const stateStore = buildStateStore();
      const events: string[] = [];

      await Promise.all([
        stateStore.withPatientLock('P1', async () => {
          events.push('a:start');
          await sleep(10);
          events.push('a:end');
        }),
        stateStore.withPatientLock('P1', async () => {
          events.push('b:start');
          events.push('b:end');
        }),
      ]);

      expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });
  });
});

describe('buildAuditEntry', () => {
  it('records the outcome, critical issues and next steps', () => {
    expect(buildAuditEntry(holdDecision)).toEqual({
      timestamp: '2026-10-19T10:00:00.000Z',
      patientId: 'P1',
      outcome: 'HOLD',
      issueCount: 2,
      criticalIssues: [makeIssue({ code: 'LAB_CRITICAL_VALUE', severity: 'critical' })],
      recommendedNextSteps: ['Schedule terminal cleaning for bed turnover'],
    });
  });
});
