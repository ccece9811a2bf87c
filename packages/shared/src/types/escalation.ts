import type { DecisionOutcome } from './decision.js';

export type Priority = 'urgent' | 'high' | 'normal' | 'low';

export type Department =
  | 'Lab Portal'
  | 'Pharmacy Portal'
  | 'Billing Portal'
  | 'Transport Services'
  | 'Insurance Desk'
  | 'General Operations';

export interface EscalationAlert {
  readonly alertId: string;
  readonly patientId: string;
  readonly department: Department;
  readonly priority: Priority;
  readonly issueCode: string;
  readonly title: string;
  readonly message: string;
  readonly suggestedAction: string;
  readonly evidence: readonly string[];
  readonly data: Readonly<Record<string, unknown>>;
  readonly createdAt: string;
  readonly status: 'pending';
}

export interface DepartmentBatch {
  readonly department: Department;
  readonly patientId: string;
  readonly alerts: readonly EscalationAlert[];
  readonly totalAlerts: number;
  readonly highestPriority: Priority;
  readonly generatedAt: string;
}

export interface PatientNotification {
  readonly priority: Priority;
  readonly title: string;
  readonly message: string;
  readonly actionRequired: string;
  readonly department: Department;
}

export interface PatientNotificationBatch {
  readonly patientId: string;
  readonly notifications: readonly PatientNotification[];
  readonly totalNotifications: number;
  readonly generatedAt: string;
}

export interface EscalationSummary {
  readonly patientId: string;
  readonly outcome: DecisionOutcome;
  readonly totalAlerts: number;
  readonly alertsByPriority: Readonly<Record<Priority, number>>;
  readonly departmentsInvolved: readonly Department[];
  readonly departmentCounts: Readonly<Partial<Record<Department, number>>>;
  readonly generatedAt: string;
}

export interface EscalationBundle {
  readonly patientId: string;
  readonly outcome: DecisionOutcome;
  readonly departments: readonly DepartmentBatch[];
  readonly notifications: PatientNotificationBatch | null;
  readonly summary: EscalationSummary | null;
}

/** Per-department counts as reported by the HTTP API. */
export interface EscalationCounts {
  lab: number;
  pharmacy: number;
  billing: number;
  transport: number;
  insurance: number;
  general: number;
}
