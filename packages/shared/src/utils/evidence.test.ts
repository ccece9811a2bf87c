import { describe, it, expect } from 'vitest';
import { formatEvidencePath } from './evidence.js';

describe('formatEvidencePath', () => {
  it('appends a JSON path after #', () => {
    expect(formatEvidencePath('data/lab_results.json', 'results[LT-1].components')).toBe(
      'data/lab_results.json#results[LT-1].components',
    );
  });

  it('formats a line range when no JSON path is given', () => {
    expect(formatEvidencePath('insurance_policy.txt', undefined, [12, 18])).toBe(
      'insurance_policy.txt#line:12-18',
    );
  });

  it('returns the bare file path otherwise', () => {
    expect(formatEvidencePath('data/housekeeping_schedule.json')).toBe('data/housekeeping_schedule.json');
  });
});
