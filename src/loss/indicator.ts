/**
 * One-hot encoding of a truth vector against an ordered level set.
 */

import { DomainError } from '../errors.js';
import type { Label } from '../types.js';

/**
 * Build the N x K indicator matrix: row `i` holds a 1 in the column of
 * `truth[i]` and 0 elsewhere.
 *
 * Every row must sum to exactly 1. A label outside `levels`, or a level that
 * appears twice, breaks that and raises a DomainError.
 */
export function buildIndicatorMatrix(truth: readonly Label[], levels: readonly Label[]): number[][] {
  const seen = new Set<Label>();
  for (const level of levels) {
    if (seen.has(level)) {
      throw new DomainError(`duplicate level '${level}' in the level set`);
    }
    seen.add(level);
  }

  return truth.map((label, i) => {
    const row = levels.map((level) => (level === label ? 1 : 0));
    const rowSum = row.reduce<number>((acc, v) => acc + v, 0);
    if (rowSum !== 1) {
      throw new DomainError(
        `truth value '${label}' at row ${i} is not one of the levels: ${levels.join(', ')}`,
      );
    }
    return row;
  });
}
