import type { DecisionOutcome, Issue, SuggestedResolution } from '@discharge/shared';

export interface OutcomeVerdict {
  readonly outcome: DecisionOutcome;
  readonly approved: boolean;
}

/**
 * Ordered rules, first match wins:
 *   1. any critical issue      -> HOLD
 *   2. any high issue          -> HOLD
 *   3. every check cleared     -> APPROVE
 *   4. otherwise               -> PENDING_AUTO_RESOLUTION
 *
 * Severity dominates the cleared flags. With no check results at all,
 * nothing vouched for the patient and rule 3 does not apply.
 */
export function decideOutcome(issues: readonly Issue[], clearedFlags: readonly boolean[]): OutcomeVerdict {
  if (issues.some((i) => i.severity === 'critical')) {
    return { outcome: 'HOLD', approved: false };
  }
  if (issues.some((i) => i.severity === 'high')) {
    return { outcome: 'HOLD', approved: false };
  }
  if (clearedFlags.length > 0 && clearedFlags.every(Boolean)) {
    return { outcome: 'APPROVE', approved: true };
  }
  return { outcome: 'PENDING_AUTO_RESOLUTION', approved: false };
}

/** One resolution per medium/low issue, in issue order; none for APPROVE. */
export function resolveSuggestions(issues: readonly Issue[], outcome: DecisionOutcome): SuggestedResolution[] {
  if (outcome === 'APPROVE') return [];
  return issues
    .filter((i) => i.severity === 'medium' || i.severity === 'low')
    .map((i) => ({
      action: i.suggestedAction,
      detail: {
        sourceCheck: i.sourceCheck,
        code: i.code,
        severity: i.severity,
        data: i.data,
      },
    }));
}
