import {
  AuditEntrySchema,
  PersistedStateSchema,
  addDuration,
  isPastExpiry,
  toIsoTimestamp,
  type AuditEntry,
  type Decision,
  type DecisionOutcome,
  type DischargeStatus,
  type PersistedState,
} from '@discharge/shared';
import type { Logger } from '../logger.js';
import { PersistenceError } from '../errors.js';
import type { KeyValueStore } from '../store/key-value-store.js';
import { KeyedMutex } from '../store/keyed-mutex.js';

export const STATE_NAMESPACE = 'state';
export const AUDIT_NAMESPACE = 'audit';
export const STATE_RECORD_VERSION = '1.0';

const STATUS_BY_OUTCOME = {
  APPROVE: 'approved',
  HOLD: 'hold',
  PENDING_AUTO_RESOLUTION: 'pending_auto_resolution',
} as const satisfies Record<DecisionOutcome, DischargeStatus>;

export interface StateStoreDeps {
  store: KeyValueStore;
  logger: Logger;
  /** Duration string such as "6h" or "2d". */
  approvalWindow: string;
  clock?: () => Date;
}

export interface SavedState {
  state: PersistedState;
  locator: string;
}

/**
 * Current discharge state (one record per patient, last write wins) and the
 * append-only audit trail, both behind the key-value port.
 */
export class StateStore {
  private readonly mutex = new KeyedMutex();
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(private readonly deps: StateStoreDeps) {
    this.log = deps.logger.child({ component: 'state-store' });
    this.clock = deps.clock ?? (() => new Date());
    // Fail at construction rather than on the first approval
    addDuration(new Date(0), deps.approvalWindow);
  }

  /** Serialize writers for one patient; other patients are unaffected. */
  withPatientLock<T>(patientId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(patientId, fn);
  }

  async save(patientId: string, decision: Decision): Promise<SavedState> {
    const now = this.clock();
    const createdAt = toIsoTimestamp(now);
    const status = STATUS_BY_OUTCOME[decision.outcome];

    const state: PersistedState = {
      patientId,
      status,
      decision,
      ...(status === 'approved' ? { expiresAt: toIsoTimestamp(addDuration(now, this.deps.approvalWindow)) } : {}),
      createdAt,
      lastUpdatedAt: createdAt,
      version: STATE_RECORD_VERSION,
    };

    try {
      const locator = await this.deps.store.put(STATE_NAMESPACE, patientId, state);
      return { state, locator };
    } catch (err) {
      throw new PersistenceError('save state for', patientId, { cause: err });
    }
  }

  async appendAudit(patientId: string, entry: AuditEntry): Promise<string> {
    try {
      return await this.deps.store.append(AUDIT_NAMESPACE, patientId, entry);
    } catch (err) {
      throw new PersistenceError('append audit entry for', patientId, { cause: err });
    }
  }

  async load(patientId: string): Promise<PersistedState | null> {
    let raw: unknown;
    try {
      raw = await this.deps.store.get(STATE_NAMESPACE, patientId);
    } catch (err) {
      throw new PersistenceError('load state for', patientId, { cause: err });
    }
    if (raw === null) return null;

    const parsed = PersistedStateSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ patientId, issues: parsed.error.issues.length }, 'Stored state failed validation; ignoring');
      return null;
    }
    return parsed.data;
  }

  /** Entries in append order; entries that fail validation are skipped. */
  async loadAudit(patientId: string): Promise<AuditEntry[]> {
    let raw: unknown[];
    try {
      raw = await this.deps.store.list(AUDIT_NAMESPACE, patientId);
    } catch (err) {
      throw new PersistenceError('load audit trail for', patientId, { cause: err });
    }

    const entries: AuditEntry[] = [];
    raw.forEach((item, index) => {
      const parsed = AuditEntrySchema.safeParse(item);
      if (parsed.success) entries.push(parsed.data);
      else this.log.warn({ patientId, index }, 'Audit entry failed validation; skipping');
    });
    return entries;
  }

  async isExpired(patientId: string, now: Date = this.clock()): Promise<boolean> {
    const state = await this.load(patientId);
    return isPastExpiry(state?.expiresAt, now);
  }
}

export function buildAuditEntry(decision: Decision): AuditEntry {
  return {
    timestamp: decision.timestamp,
    patientId: decision.patientId,
    outcome: decision.outcome,
    issueCount: decision.issues.length,
    criticalIssues: decision.issues.filter((i) => i.severity === 'critical'),
    recommendedNextSteps: decision.suggestedResolutions.map((r) => r.action),
  };
}
