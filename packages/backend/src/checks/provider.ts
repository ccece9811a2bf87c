import type { CheckName, CheckResult, Issue } from '@discharge/shared';

/** Reference data for one check, keyed by file name (e.g. `lab_results.json`). */
export type ReferenceData = Readonly<Record<string, unknown>>;

export interface ReferenceDataSource {
  load(patientId: string, files: readonly string[]): Promise<ReferenceData>;
}

/**
 * One domain check. `verify` may fail in any way (throw, reject, hang,
 * return garbage); `fallback` is the deterministic answer the runner
 * substitutes when it does.
 */
export interface CheckProvider {
  readonly name: CheckName;
  /** Issue-code prefix, e.g. `LAB_`. */
  readonly issuePrefix: string;
  readonly referenceFiles: readonly string[];
  verify(patientId: string, reference: ReferenceData): Promise<CheckResult>;
  fallback(patientId: string, reference: ReferenceData): CheckResult | Promise<CheckResult>;
}

export type IssueDraft = Omit<Issue, 'sourceCheck' | 'evidence' | 'data'> & {
  evidence?: readonly string[];
  data?: Readonly<Record<string, unknown>>;
};

export function buildIssue(sourceCheck: CheckName, draft: IssueDraft): Issue {
  return {
    code: draft.code,
    title: draft.title,
    severity: draft.severity,
    message: draft.message,
    suggestedAction: draft.suggestedAction,
    evidence: draft.evidence ?? [],
    data: draft.data ?? {},
    sourceCheck,
  };
}

/** `elapsedMs` is left at 0; the runner stamps the measured value. */
export function buildResult(
  checkName: CheckName,
  verdict: {
    cleared: boolean;
    confidence: number;
    issues: readonly Issue[];
    rawDetail?: Readonly<Record<string, unknown>>;
  },
): CheckResult {
  return {
    checkName,
    cleared: verdict.cleared,
    confidence: verdict.confidence,
    issues: verdict.issues,
    elapsedMs: 0,
    rawDetail: verdict.rawDetail ?? {},
  };
}

/** True when any issue would block discharge on its own. */
export function hasBlockingIssue(issues: readonly Issue[]): boolean {
  return issues.some((i) => i.severity === 'high' || i.severity === 'critical');
}

// ---------------------------------------------------------------------------
// Narrowing helpers for untyped reference JSON
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function asNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return fallback;
}

/** Reference file present and non-empty. */
export function hasData(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && Object.keys(value).length > 0;
}
