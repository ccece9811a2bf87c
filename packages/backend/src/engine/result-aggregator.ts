import type { CheckName, CheckResult, Issue } from '@discharge/shared';

export interface AggregatedResults {
  readonly issues: readonly Issue[];
  readonly clearedBy: readonly CheckName[];
  readonly blockedBy: readonly CheckName[];
  /** Per-check cleared flags, in the same order as the input. */
  readonly clearedFlags: readonly boolean[];
}

/**
 * Flatten check results into one issue list. Order follows the map's
 * iteration order, which the runner fixes to provider declaration order.
 *
 * `clearedBy` and `blockedBy` are derived independently: a check that
 * cleared but raised a high or critical issue appears in both.
 */
export function aggregate(results: ReadonlyMap<CheckName, CheckResult>): AggregatedResults {
  const issues: Issue[] = [];
  const clearedBy: CheckName[] = [];
  const blockedBy: CheckName[] = [];
  const clearedFlags: boolean[] = [];

  for (const [checkName, result] of results) {
    for (const issue of result.issues) {
      issues.push(issue.sourceCheck === checkName ? issue : { ...issue, sourceCheck: checkName });
    }
    clearedFlags.push(result.cleared);
    if (result.cleared) clearedBy.push(checkName);
    if (result.issues.some((i) => i.severity === 'high' || i.severity === 'critical')) {
      blockedBy.push(checkName);
    }
  }

  return { issues, clearedBy, blockedBy, clearedFlags };
}
