import type { CheckName, CheckResult, Decision, Issue, Severity } from '@discharge/shared';

export const DEFAULT_PATIENT_ID = 'P00231';

// ─── ANSI colors ──────────────────────────────────────────────────────────────

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

export interface Palette {
  green: string;
  red: string;
  yellow: string;
  cyan: string;
  dim: string;
  bold: string;
  reset: string;
}

export const COLORS: Palette = {
  green: GREEN,
  red: RED,
  yellow: YELLOW,
  cyan: CYAN,
  dim: DIM,
  bold: BOLD,
  reset: RESET,
};

export const PLAIN: Palette = { green: '', red: '', yellow: '', cyan: '', dim: '', bold: '', reset: '' };

// ─── Argument parsing ─────────────────────────────────────────────────────────

export type CliCommand = { kind: 'run'; patientId: string } | { kind: 'help' } | { kind: 'error'; message: string };

export const USAGE = `Usage: discharge run [patientId]

Runs every discharge check for a patient (default ${DEFAULT_PATIENT_ID}), prints the
decision and escalation report, and writes final_decision_<patientId>.json.
Exits 0 when discharge is approved, 1 otherwise.`;

/** `argv` without the node and script entries. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, patientId, ...rest] = argv;
  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    return { kind: 'help' };
  }
  if (command !== 'run') {
    return { kind: 'error', message: `Unknown command "${command}"` };
  }
  if (rest.length > 0) {
    return { kind: 'error', message: `Unexpected arguments: ${rest.join(' ')}` };
  }
  return { kind: 'run', patientId: patientId ?? DEFAULT_PATIENT_ID };
}

// ─── Report ───────────────────────────────────────────────────────────────────

const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low'];

function heading(msg: string, c: Palette): string[] {
  const rule = `${c.bold}${c.cyan}${'='.repeat(60)}${c.reset}`;
  return ['', rule, `${c.bold}${c.cyan}  ${msg}${c.reset}`, rule];
}

function severityColor(severity: Severity, c: Palette): string {
  if (severity === 'critical' || severity === 'high') return c.red;
  if (severity === 'medium') return c.yellow;
  return c.dim;
}

function outcomeColor(decision: Decision, c: Palette): string {
  if (decision.outcome === 'APPROVE') return c.green;
  if (decision.outcome === 'HOLD') return c.red;
  return c.yellow;
}

function issueLines(issues: readonly Issue[], c: Palette): string[] {
  if (issues.length === 0) return ['  No issues found.'];
  const lines: string[] = [];
  for (const severity of SEVERITY_ORDER) {
    const group = issues.filter((i) => i.severity === severity);
    if (group.length === 0) continue;
    lines.push(`  ${severityColor(severity, c)}${severity.toUpperCase()} (${group.length})${c.reset}`);
    for (const issue of group) {
      lines.push(`    [${issue.sourceCheck}] ${issue.code}: ${issue.title}`);
      lines.push(`      ${issue.message}`);
      lines.push(`      ${c.dim}-> ${issue.suggestedAction}${c.reset}`);
    }
  }
  return lines;
}

export function formatReport(
  decision: Decision,
  checkResults: ReadonlyMap<CheckName, CheckResult>,
  artifacts: readonly string[],
  c: Palette = COLORS,
): string {
  const lines: string[] = [];

  lines.push(...heading(`Discharge Verification: ${decision.patientId}`, c));
  for (const result of checkResults.values()) {
    const mark = result.cleared ? `${c.green}CLEARED${c.reset}` : `${c.red}NOT CLEARED${c.reset}`;
    lines.push(
      `  ${result.checkName.padEnd(16)} ${mark}  ${c.dim}confidence ${result.confidence.toFixed(2)}, ${Math.round(result.elapsedMs)}ms${c.reset}`,
    );
  }

  lines.push(...heading('Decision', c));
  lines.push(`  Outcome:    ${c.bold}${outcomeColor(decision, c)}${decision.outcome}${c.reset}`);
  lines.push(`  Approved:   ${decision.approved ? 'yes' : 'no'}`);
  lines.push(`  Cleared by: ${decision.clearedBy.join(', ') || 'none'}`);
  lines.push(`  Blocked by: ${decision.blockedBy.join(', ') || 'none'}`);
  lines.push(`  Timestamp:  ${decision.timestamp}`);

  lines.push(...heading('Issues', c));
  lines.push(...issueLines(decision.issues, c));

  lines.push(...heading('Summary', c));
  lines.push(`  Patient:  ${decision.summary.plainText}`);
  lines.push(`  Clinical: ${decision.summary.clinicalText}`);

  if (decision.suggestedResolutions.length > 0) {
    lines.push(...heading('Suggested Resolutions', c));
    decision.suggestedResolutions.forEach((r, i) => {
      lines.push(`  ${i + 1}. ${r.action} ${c.dim}(${r.detail.sourceCheck} ${r.detail.code})${c.reset}`);
    });
  }

  lines.push(...heading('Artifacts', c));
  for (const artifact of artifacts) lines.push(`  ${artifact}`);

  return lines.join('\n');
}
