export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type CheckName = 'Insurance' | 'Pharmacy' | 'Transport' | 'Bed Management' | 'Lab';

/**
 * A structured finding raised by a check. Evidence entries are opaque
 * locators ("file#json.path") that are forwarded untouched.
 */
export interface Issue {
  readonly code: string;
  readonly title: string;
  readonly severity: Severity;
  readonly message: string;
  readonly suggestedAction: string;
  readonly evidence: readonly string[];
  readonly data: Readonly<Record<string, unknown>>;
  readonly sourceCheck: CheckName;
}

export interface CheckResult {
  readonly checkName: CheckName;
  /** The check has no objection to discharge. */
  readonly cleared: boolean;
  readonly confidence: number;
  readonly issues: readonly Issue[];
  readonly elapsedMs: number;
  readonly rawDetail: Readonly<Record<string, unknown>>;
}
