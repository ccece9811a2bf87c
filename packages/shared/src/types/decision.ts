import type { CheckName, Issue, Severity } from './check.js';

export type DecisionOutcome = 'APPROVE' | 'HOLD' | 'PENDING_AUTO_RESOLUTION';

export type DischargeStatus = 'approved' | 'hold' | 'pending_auto_resolution';

export interface SuggestedResolution {
  readonly action: string;
  readonly detail: {
    readonly sourceCheck: CheckName;
    readonly code: string;
    readonly severity: Severity;
    readonly data: Readonly<Record<string, unknown>>;
  };
}

export interface DischargeSummary {
  /** Patient/family facing. */
  readonly plainText: string;
  /** For the medical record. */
  readonly clinicalText: string;
}

export interface Decision {
  readonly patientId: string;
  readonly outcome: DecisionOutcome;
  readonly approved: boolean;
  readonly clearedBy: readonly CheckName[];
  readonly blockedBy: readonly CheckName[];
  readonly issues: readonly Issue[];
  readonly suggestedResolutions: readonly SuggestedResolution[];
  readonly summary: DischargeSummary;
  readonly timestamp: string;
}

export interface PersistedState {
  readonly patientId: string;
  readonly status: DischargeStatus;
  readonly decision: Decision;
  /** Only present for approved decisions; absence means no automatic lapse. */
  readonly expiresAt?: string;
  readonly createdAt: string;
  readonly lastUpdatedAt: string;
  readonly version: string;
}

export interface AuditEntry {
  readonly timestamp: string;
  readonly patientId: string;
  readonly outcome: DecisionOutcome;
  readonly issueCount: number;
  readonly criticalIssues: readonly Issue[];
  readonly recommendedNextSteps: readonly string[];
}
