/**
 * Unit tests for result aggregation and the decision rules.
 */

import { describe, it, expect } from 'vitest';
import type { CheckName, CheckResult } from '@discharge/shared';
import { aggregate } from '../../engine/result-aggregator.js';
import { decideOutcome, resolveSuggestions } from '../../engine/decision-engine.js';
import { makeIssue, makeResult } from '../helpers/fakes.js';

function resultsOf(...results: CheckResult[]): Map<CheckName, CheckResult> {
  return new Map(results.map((r) => [r.checkName, r]));
}

describe('aggregate', () => {
  it('flattens issues in check order and derives clearedBy and blockedBy', () => {
    const results = resultsOf(
      makeResult('Insurance', {
        issues: [makeIssue({ code: 'INS_PARTIAL_COVERAGE', severity: 'low', sourceCheck: 'Insurance' })],
      }),
      makeResult('Pharmacy', {
        cleared: false,
        issues: [makeIssue({ code: 'PHARM_ORDER_PENDING', severity: 'high', sourceCheck: 'Pharmacy' })],
      }),
      makeResult('Lab'),
    );

    const aggregated = aggregate(results);

    expect(aggregated.issues.map((i) => i.code)).toEqual(['INS_PARTIAL_COVERAGE', 'PHARM_ORDER_PENDING']);
    expect(aggregated.clearedBy).toEqual(['Insurance', 'Lab']);
    expect(aggregated.blockedBy).toEqual(['Pharmacy']);
    expect(aggregated.clearedFlags).toEqual([true, false, true]);
  });

  it('lists a cleared check that raised a high issue in both clearedBy and blockedBy', () => {
    const results = resultsOf(
      makeResult('Transport', {
        cleared: true,
        issues: [makeIssue({ code: 'TRANSPORT_UNAVAILABLE', severity: 'high', sourceCheck: 'Transport' })],
      }),
    );

    const aggregated = aggregate(results);

    expect(aggregated.clearedBy).toEqual(['Transport']);
    expect(aggregated.blockedBy).toEqual(['Transport']);
  });

  it('attributes issues to the check that reported them', () => {
    const results = resultsOf(
      makeResult('Pharmacy', { issues: [makeIssue({ code: 'PHARM_PAYMENT_PENDING', severity: 'medium', sourceCheck: 'Lab' })] }),
    );

    expect(aggregate(results).issues[0]?.sourceCheck).toBe('Pharmacy');
  });

  it('returns empty lists for no results', () => {
    expect(aggregate(new Map())).toEqual({ issues: [], clearedBy: [], blockedBy: [], clearedFlags: [] });
  });
});

describe('decideOutcome', () => {
  it('holds on any critical issue even when every check cleared', () => {
    const issues = [makeIssue({ code: 'LAB_CRITICAL_VALUE', severity: 'critical' })];

    expect(decideOutcome(issues, [true, true])).toEqual({ outcome: 'HOLD', approved: false });
  });

  it('holds on any high issue', () => {
    const issues = [
      makeIssue({ code: 'PHARM_PAYMENT_PENDING', severity: 'medium' }),
      makeIssue({ code: 'BED_DEPOSIT_SHORTFALL', severity: 'high' }),
    ];

    expect(decideOutcome(issues, [true, true, true])).toEqual({ outcome: 'HOLD', approved: false });
  });

  it('approves when every check cleared and only minor issues remain', () => {
    const issues = [makeIssue({ code: 'BED_REFUND_DUE', severity: 'low' })];

    expect(decideOutcome(issues, [true, true, true, true, true])).toEqual({ outcome: 'APPROVE', approved: true });
  });

  it('is pending when a check did not clear and no issue blocks', () => {
    const issues = [makeIssue({ code: 'PHARM_PAYMENT_PENDING', severity: 'medium' })];

    expect(decideOutcome(issues, [true, false])).toEqual({ outcome: 'PENDING_AUTO_RESOLUTION', approved: false });
  });

  it('is pending when there are no check results at all', () => {
    expect(decideOutcome([], [])).toEqual({ outcome: 'PENDING_AUTO_RESOLUTION', approved: false });
  });
});

describe('resolveSuggestions', () => {
  const issues = [
    makeIssue({ code: 'LAB_PENDING', severity: 'high', sourceCheck: 'Lab' }),
    makeIssue({ code: 'PHARM_PAYMENT_PENDING', severity: 'medium', sourceCheck: 'Pharmacy', data: { amount: 450 } }),
    makeIssue({ code: 'BED_REFUND_DUE', severity: 'low', sourceCheck: 'Bed Management' }),
  ];

  it('returns one resolution per medium or low issue, in issue order', () => {
    expect(resolveSuggestions(issues, 'HOLD')).toEqual([
      {
        action: 'Resolve PHARM_PAYMENT_PENDING',
        detail: { sourceCheck: 'Pharmacy', code: 'PHARM_PAYMENT_PENDING', severity: 'medium', data: { amount: 450 } },
      },
      {
        action: 'Resolve BED_REFUND_DUE',
        detail: { sourceCheck: 'Bed Management', code: 'BED_REFUND_DUE', severity: 'low', data: {} },
      },
    ]);
  });

  it('returns nothing for an approved decision', () => {
    expect(resolveSuggestions(issues, 'APPROVE')).toEqual([]);
  });
});
