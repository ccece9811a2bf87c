import type { CheckName, Severity } from '../types/check.js';
import type { Department, EscalationCounts, Priority } from '../types/escalation.js';

/** Checks in declaration order; aggregation and reports follow this order. */
export const CHECK_NAMES: readonly CheckName[] = [
  'Insurance',
  'Pharmacy',
  'Transport',
  'Bed Management',
  'Lab',
];

/** Issue-code prefixes, evaluated in this order; first match wins. */
export const DEPARTMENT_PREFIXES: ReadonlyArray<readonly [prefix: string, department: Department]> = [
  ['LAB_', 'Lab Portal'],
  ['PHARM_', 'Pharmacy Portal'],
  ['BED_', 'Billing Portal'],
  ['BILLING_', 'Billing Portal'],
  ['TRANSPORT_', 'Transport Services'],
  ['INS_', 'Insurance Desk'],
];

export const FALLBACK_DEPARTMENT: Department = 'General Operations';

export const SEVERITY_TO_PRIORITY = {
  critical: 'urgent',
  high: 'high',
  medium: 'normal',
  low: 'low',
} as const satisfies Record<Severity, Priority>;

/** Most to least pressing. */
export const PRIORITY_ORDER: readonly Priority[] = ['urgent', 'high', 'normal', 'low'];

export const DEPARTMENT_COUNT_KEYS = {
  'Lab Portal': 'lab',
  'Pharmacy Portal': 'pharmacy',
  'Billing Portal': 'billing',
  'Transport Services': 'transport',
  'Insurance Desk': 'insurance',
  'General Operations': 'general',
} as const satisfies Record<Department, keyof EscalationCounts>;
