/**
 * Unit tests for discharge summaries: the fixed templates and the
 * model-written narrative.
 */

import { describe, it, expect } from 'vitest';
import type { CheckName, CheckResult } from '@discharge/shared';
import { fallbackSummary, type DecisionDraft } from '../../narrative/narrative.js';
import { BedrockNarrativeGenerator, buildSummaryPrompt } from '../../narrative/bedrock-narrative.js';
import { NarrativeError } from '../../errors.js';
import { FakeConverseClient } from '../helpers/fake-converse-client.js';
import { makeIssue, makeResult } from '../helpers/fakes.js';

const results = new Map<CheckName, CheckResult>([
  ['Insurance', makeResult('Insurance')],
  ['Lab', makeResult('Lab')],
]);

function draft(overrides: Partial<DecisionDraft> = {}): DecisionDraft {
  return {
    patientId: 'P1',
    outcome: 'APPROVE',
    approved: true,
    clearedBy: ['Insurance', 'Lab'],
    blockedBy: [],
    issues: [],
    suggestedResolutions: [],
    ...overrides,
  };
}

describe('fallbackSummary', () => {
  it('names every check for an approval', () => {
    expect(fallbackSummary(results, draft())).toEqual({
      plainText:
        'Patient discharge has been approved. All verification checks passed successfully. Please proceed with discharge procedures.',
      clinicalText: 'Discharge approved. All checks (Insurance, Lab) cleared. No blocking issues identified.',
    });
  });

  it('lists the first three issues for a hold', () => {
    const issues = [
      makeIssue({ code: 'LAB_PENDING', severity: 'high', title: 'Missing Test: Chest X-Ray', sourceCheck: 'Lab' }),
      makeIssue({ code: 'BED_DEPOSIT_SHORTFALL', severity: 'high', title: 'Payment Required', sourceCheck: 'Bed Management' }),
      makeIssue({ code: 'PHARM_ORDER_PENDING', severity: 'high', title: 'Pending Order', sourceCheck: 'Pharmacy' }),
      makeIssue({ code: 'INS_PREAUTH_MISSING', severity: 'high', title: 'Pre-Authorization Missing', sourceCheck: 'Insurance' }),
    ];

    const summary = fallbackSummary(results, draft({ outcome: 'HOLD', approved: false, issues }));

    expect(summary.plainText).toBe(
      'Discharge is on hold due to pending issues: Lab: Missing Test: Chest X-Ray, Bed Management: Payment Required, Pharmacy: Pending Order. Please contact hospital staff for details.',
    );
    expect(summary.clinicalText).toBe(
      'Discharge HOLD. Critical/high severity issues identified: Lab: Missing Test: Chest X-Ray, Bed Management: Payment Required, Pharmacy: Pending Order. Resolution required before discharge.',
    );
  });

  it('counts the open items for a pending decision', () => {
    const issues = [
      makeIssue({ code: 'PHARM_PAYMENT_PENDING', severity: 'medium' }),
      makeIssue({ code: 'BED_REFUND_DUE', severity: 'low' }),
    ];

    expect(fallbackSummary(results, draft({ outcome: 'PENDING_AUTO_RESOLUTION', approved: false, issues }))).toEqual({
      plainText: 'Discharge is pending minor issue resolution. Hospital staff is working to resolve these items.',
      clinicalText: 'Discharge pending auto-resolution. 2 medium/low severity issues identified. Staff action required.',
    });
  });
});

describe('BedrockNarrativeGenerator', () => {
  it('maps the model reply onto the summary', async () => {
    const client = new FakeConverseClient([
      JSON.stringify({ plain_text: 'You are ready to go home.', for_medical_record: 'All checks cleared.' }),
    ]);

    const summary = await new BedrockNarrativeGenerator(client).generateSummary('P1', results, draft());

    expect(summary).toEqual({ plainText: 'You are ready to go home.', clinicalText: 'All checks cleared.' });
  });

  it('accepts a reply already in summary shape', async () => {
    const client = new FakeConverseClient([JSON.stringify({ plainText: 'Ready.', clinicalText: 'Cleared.' })]);

    const summary = await new BedrockNarrativeGenerator(client).generateSummary('P1', results, draft());

    expect(summary).toEqual({ plainText: 'Ready.', clinicalText: 'Cleared.' });
  });

  it('wraps a failed model call in NarrativeError', async () => {
    const client = new FakeConverseClient([new Error('throttled')]);

    const err = await new BedrockNarrativeGenerator(client).generateSummary('P1', results, draft()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NarrativeError);
    expect(err).toMatchObject({ code: 'narrative.failed', message: 'Summary model call failed: Error: throttled' });
  });

  it('rejects non-JSON and incomplete replies', async () => {
    const generator = new BedrockNarrativeGenerator(
      new FakeConverseClient(['Here is your summary.', JSON.stringify({ plain_text: 'only one half' })]),
    );

    await expect(generator.generateSummary('P1', results, draft())).rejects.toThrow(
      'Summary model returned non-JSON output',
    );
    await expect(generator.generateSummary('P1', results, draft())).rejects.toThrow(
      'Summary model output is missing plain_text or for_medical_record',
    );
  });

  it('builds a prompt with the decision and issue codes', () => {
    const issues = [makeIssue({ code: 'LAB_CRITICAL_VALUE', severity: 'critical', sourceCheck: 'Lab' })];
    const withIssue = new Map<CheckName, CheckResult>([['Lab', makeResult('Lab', { cleared: false, issues })]]);

    const prompt = buildSummaryPrompt('P1', withIssue, draft({ outcome: 'HOLD', approved: false, issues }));

    expect(prompt).toContain('PATIENT ID: P1');
    expect(prompt).toContain('FINAL DECISION: HOLD');
    expect(prompt).toContain('"LAB_CRITICAL_VALUE"');
  });
});
