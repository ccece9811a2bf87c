import { describe, it, expect } from 'vitest';
import type { CheckName, CheckResult } from '@discharge/shared';
import { COLORS, PLAIN, formatReport, parseCliArgs } from '../../cli/report.js';
import { makeDecision, makeIssue, makeResult } from '../helpers/fakes.js';

describe('parseCliArgs', () => {
  it('shows help without a command', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['help'])).toEqual({ kind: 'help' });
  });

  it('runs the default patient when none is given', () => {
    expect(parseCliArgs(['run'])).toEqual({ kind: 'run', patientId: 'P00231' });
    expect(parseCliArgs(['run', 'P00452'])).toEqual({ kind: 'run', patientId: 'P00452' });
  });

  it('rejects unknown commands and extra arguments', () => {
    expect(parseCliArgs(['verify'])).toEqual({ kind: 'error', message: 'Unknown command "verify"' });
    expect(parseCliArgs(['run', 'P1', 'P2', '--fast'])).toEqual({
      kind: 'error',
      message: 'Unexpected arguments: P2 --fast',
    });
  });
});

describe('formatReport', () => {
  const payment = makeIssue({
    code: 'PHARM_PAYMENT_PENDING',
    severity: 'medium',
    title: 'Discharge Medication Payment Required',
    message: 'Patient needs to pay 450 for discharge medications',
    suggestedAction: 'Collect 450 from patient/family before discharge',
    sourceCheck: 'Pharmacy',
    data: { amount: 450 },
  });

  const pending = makeDecision({
    outcome: 'PENDING_AUTO_RESOLUTION',
    approved: false,
    clearedBy: ['Insurance'],
    issues: [payment],
    suggestedResolutions: [
      {
        action: 'Collect 450 from patient/family before discharge',
        detail: { sourceCheck: 'Pharmacy', code: 'PHARM_PAYMENT_PENDING', severity: 'medium', data: { amount: 450 } },
      },
    ],
    summary: { plainText: 'Pending.', clinicalText: 'Pending auto-resolution.' },
  });

  const results = new Map<CheckName, CheckResult>([
    ['Insurance', makeResult('Insurance', { elapsedMs: 12.4 })],
    ['Pharmacy', makeResult('Pharmacy', { cleared: false, confidence: 0.75, issues: [payment], elapsedMs: 30.6 })],
  ]);

  it('prints checks, decision, issues, summary, resolutions and artifacts', () => {
    const lines = formatReport(pending, results, ['state/P1', 'audit/P1'], PLAIN).split('\n');

    expect(lines).toContain('  Discharge Verification: P1');
    expect(lines).toContain(`  ${'Insurance'.padEnd(16)} CLEARED  confidence 0.90, 12ms`);
    expect(lines).toContain(`  ${'Pharmacy'.padEnd(16)} NOT CLEARED  confidence 0.75, 31ms`);
    expect(lines).toContain('  Outcome:    PENDING_AUTO_RESOLUTION');
    expect(lines).toContain('  Approved:   no');
    expect(lines).toContain('  Cleared by: Insurance');
    expect(lines).toContain('  Blocked by: none');
    expect(lines).toContain('  MEDIUM (1)');
    expect(lines).toContain('    [Pharmacy] PHARM_PAYMENT_PENDING: Discharge Medication Payment Required');
    expect(lines).toContain('      -> Collect 450 from patient/family before discharge');
    expect(lines).toContain('  Patient:  Pending.');
    expect(lines).toContain('  Clinical: Pending auto-resolution.');
    expect(lines).toContain('  1. Collect 450 from patient/family before discharge (Pharmacy PHARM_PAYMENT_PENDING)');
    expect(lines.slice(-2)).toEqual(['  state/P1', '  audit/P1']);
  });

  it('omits resolutions and reports no issues for a clean approval', () => {
    const lines = formatReport(makeDecision(), new Map(), [], PLAIN).split('\n');

    expect(lines).toContain('  No issues found.');
    expect(lines).not.toContain('  Suggested Resolutions');
  });

  it('colors the outcome', () => {
    const report = formatReport(makeDecision(), new Map(), [], COLORS);

    expect(report).toContain('  Outcome:    \x1b[1m\x1b[32mAPPROVE\x1b[0m');
  });
});
