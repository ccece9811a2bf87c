import type {
  CheckName,
  CheckResult,
  DecisionOutcome,
  DischargeSummary,
  Issue,
  SuggestedResolution,
} from '@discharge/shared';

/** Everything the decision knows before its summary is written. */
export interface DecisionDraft {
  readonly patientId: string;
  readonly outcome: DecisionOutcome;
  readonly approved: boolean;
  readonly clearedBy: readonly CheckName[];
  readonly blockedBy: readonly CheckName[];
  readonly issues: readonly Issue[];
  readonly suggestedResolutions: readonly SuggestedResolution[];
}

export interface NarrativeGenerator {
  generateSummary(
    patientId: string,
    checkResults: ReadonlyMap<CheckName, CheckResult>,
    draft: DecisionDraft,
  ): Promise<DischargeSummary>;
}

/** Fixed template text used whenever narrative generation is unavailable. */
export function fallbackSummary(
  checkResults: ReadonlyMap<CheckName, CheckResult>,
  draft: DecisionDraft,
): DischargeSummary {
  if (draft.outcome === 'APPROVE') {
    const names = [...checkResults.keys()].join(', ');
    return {
      plainText:
        'Patient discharge has been approved. All verification checks passed successfully. Please proceed with discharge procedures.',
      clinicalText: `Discharge approved. All checks (${names}) cleared. No blocking issues identified.`,
    };
  }

  if (draft.outcome === 'HOLD') {
    const issueSummary = draft.issues
      .slice(0, 3)
      .map((i) => `${i.sourceCheck}: ${i.title}`)
      .join(', ');
    return {
      plainText: `Discharge is on hold due to pending issues: ${issueSummary}. Please contact hospital staff for details.`,
      clinicalText: `Discharge HOLD. Critical/high severity issues identified: ${issueSummary}. Resolution required before discharge.`,
    };
  }

  return {
    plainText: 'Discharge is pending minor issue resolution. Hospital staff is working to resolve these items.',
    clinicalText: `Discharge pending auto-resolution. ${draft.issues.length} medium/low severity issues identified. Staff action required.`,
  };
}

/** Always answers with the template; used when no model is configured. */
export class TemplateNarrativeGenerator implements NarrativeGenerator {
  async generateSummary(
    _patientId: string,
    checkResults: ReadonlyMap<CheckName, CheckResult>,
    draft: DecisionDraft,
  ): Promise<DischargeSummary> {
    return fallbackSummary(checkResults, draft);
  }
}
