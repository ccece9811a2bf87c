import {
  DEPARTMENT_COUNT_KEYS,
  DEPARTMENT_PREFIXES,
  FALLBACK_DEPARTMENT,
  PRIORITY_ORDER,
  SEVERITY_TO_PRIORITY,
  toIsoTimestamp,
  type Department,
  type DecisionOutcome,
  type DepartmentBatch,
  type EscalationAlert,
  type EscalationBundle,
  type EscalationCounts,
  type EscalationSummary,
  type Issue,
  type PatientNotification,
  type PatientNotificationBatch,
  type Priority,
} from '@discharge/shared';
import type { KeyValueStore } from '../store/key-value-store.js';

export const ESCALATION_NAMESPACE = 'escalations';
export const NOTIFICATIONS_KEY = 'patient_notifications';
export const SUMMARY_KEY = 'escalation_summary';

export function departmentFor(issueCode: string): Department {
  for (const [prefix, department] of DEPARTMENT_PREFIXES) {
    if (issueCode.startsWith(prefix)) return department;
  }
  return FALLBACK_DEPARTMENT;
}

/** "Lab Portal" -> "LAB", "Transport Services" -> "TRA". */
export function departmentAbbrev(department: Department): string {
  return department.replace(/ /g, '').replace('Portal', '').toUpperCase().slice(0, 3);
}

/** "Lab Portal" -> "lab_portal". */
export function departmentSlug(department: Department): string {
  return department.toLowerCase().replace(/ /g, '_');
}

export function highestPriority(priorities: readonly Priority[]): Priority {
  let best = PRIORITY_ORDER.length - 1;
  for (const p of priorities) {
    best = Math.min(best, PRIORITY_ORDER.indexOf(p));
  }
  return PRIORITY_ORDER[best] ?? 'low';
}

function patientMessage(alert: EscalationAlert): string {
  switch (alert.department) {
    case 'Lab Portal':
      return `Your ${alert.title.toLowerCase()} needs attention. Please contact the lab.`;
    case 'Billing Portal':
      return `There is a billing matter that needs your attention: ${alert.message}`;
    case 'Pharmacy Portal':
      return `Your medication ${alert.title.toLowerCase()} requires action.`;
    case 'Insurance Desk':
      return `Please contact the insurance desk regarding: ${alert.title}`;
    default:
      return alert.message;
  }
}

export interface EscalationRouterDeps {
  store: KeyValueStore;
  clock?: () => Date;
}

/**
 * Turns decision issues into department alert batches, patient
 * notifications and a summary. `route` only builds the bundle; `persist`
 * writes it.
 */
export class EscalationRouter {
  private readonly clock: () => Date;

  constructor(private readonly deps: EscalationRouterDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  route(patientId: string, issues: readonly Issue[], outcome: DecisionOutcome): EscalationBundle {
    if (issues.length === 0) {
      return { patientId, outcome, departments: [], notifications: null, summary: null };
    }

    const generatedAt = toIsoTimestamp(this.clock());
    // One counter per run, shared by every department
    let seq = 0;

    const byDepartment = new Map<Department, EscalationAlert[]>();
    const urgent: EscalationAlert[] = [];

    for (const issue of issues) {
      seq++;
      const department = departmentFor(issue.code);
      const priority = SEVERITY_TO_PRIORITY[issue.severity];
      const alert: EscalationAlert = {
        alertId: `ALERT-${patientId}-${departmentAbbrev(department)}-${String(seq).padStart(3, '0')}`,
        patientId,
        department,
        priority,
        issueCode: issue.code,
        title: issue.title,
        message: issue.message,
        suggestedAction: issue.suggestedAction,
        evidence: issue.evidence,
        data: issue.data,
        createdAt: generatedAt,
        status: 'pending',
      };

      const batch = byDepartment.get(department);
      if (batch) batch.push(alert);
      else byDepartment.set(department, [alert]);

      if (priority === 'urgent' || priority === 'high') urgent.push(alert);
    }

    const departments: DepartmentBatch[] = [...byDepartment].map(([department, alerts]) => ({
      department,
      patientId,
      alerts,
      totalAlerts: alerts.length,
      highestPriority: highestPriority(alerts.map((a) => a.priority)),
      generatedAt,
    }));

    const notifications: PatientNotificationBatch | null =
      urgent.length === 0
        ? null
        : {
            patientId,
            notifications: urgent.map(
              (alert): PatientNotification => ({
                priority: alert.priority,
                title: alert.title,
                message: patientMessage(alert),
                actionRequired: alert.suggestedAction,
                department: alert.department,
              }),
            ),
            totalNotifications: urgent.length,
            generatedAt,
          };

    const alertsByPriority: Record<Priority, number> = { urgent: 0, high: 0, normal: 0, low: 0 };
    const departmentCounts: Partial<Record<Department, number>> = {};
    for (const batch of departments) {
      departmentCounts[batch.department] = batch.totalAlerts;
      for (const alert of batch.alerts) alertsByPriority[alert.priority]++;
    }

    const summary: EscalationSummary = {
      patientId,
      outcome,
      totalAlerts: issues.length,
      alertsByPriority,
      departmentsInvolved: departments.map((d) => d.department),
      departmentCounts,
      generatedAt,
    };

    return { patientId, outcome, departments, notifications, summary };
  }

  /**
   * Replace whatever an earlier run left under `escalations/<patientId>`
   * with this bundle and return the locators written. An empty bundle
   * writes nothing.
   */
  async persist(bundle: EscalationBundle): Promise<string[]> {
    const namespace = `${ESCALATION_NAMESPACE}/${bundle.patientId}`;
    await this.deps.store.clear(namespace);
    if (bundle.summary === null) return [];

    const written: string[] = [];
    for (const batch of bundle.departments) {
      written.push(await this.deps.store.put(namespace, departmentSlug(batch.department), batch));
    }
    if (bundle.notifications) {
      written.push(await this.deps.store.put(namespace, NOTIFICATIONS_KEY, bundle.notifications));
    }
    written.push(await this.deps.store.put(namespace, SUMMARY_KEY, bundle.summary));
    return written;
  }
}

/** Alert counts per department as reported by the HTTP API. */
export function countByDepartment(issues: readonly Issue[]): EscalationCounts {
  const counts: EscalationCounts = { lab: 0, pharmacy: 0, billing: 0, transport: 0, insurance: 0, general: 0 };
  for (const issue of issues) {
    counts[DEPARTMENT_COUNT_KEYS[departmentFor(issue.code)]]++;
  }
  return counts;
}
