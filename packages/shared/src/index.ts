// Types
export type { Severity, CheckName, Issue, CheckResult } from './types/check.js';

export type {
  DecisionOutcome,
  DischargeStatus,
  SuggestedResolution,
  DischargeSummary,
  Decision,
  PersistedState,
  AuditEntry,
} from './types/decision.js';

export type {
  Priority,
  Department,
  EscalationAlert,
  DepartmentBatch,
  PatientNotification,
  PatientNotificationBatch,
  EscalationSummary,
  EscalationBundle,
  EscalationCounts,
} from './types/escalation.js';

// Schemas
export { SeveritySchema, CheckNameSchema, IssueSchema, CheckResultSchema } from './schemas/check.schema.js';
export {
  DecisionOutcomeSchema,
  SuggestedResolutionSchema,
  DischargeSummarySchema,
  DecisionSchema,
  PersistedStateSchema,
  AuditEntrySchema,
} from './schemas/decision.schema.js';

// Constants
export {
  CHECK_NAMES,
  DEPARTMENT_PREFIXES,
  FALLBACK_DEPARTMENT,
  SEVERITY_TO_PRIORITY,
  PRIORITY_ORDER,
  DEPARTMENT_COUNT_KEYS,
} from './constants/departments.js';

// Utils
export { parseDuration, addDuration, isPastExpiry, toIsoTimestamp } from './utils/date.js';
export type { Duration } from './utils/date.js';
export { formatEvidencePath } from './utils/evidence.js';
