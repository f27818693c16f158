/**
 * Estimator resolution: decides whether a problem is scored as binary or multiclass.
 */

import { DomainError } from './errors.js';
import type { EstimatorKind } from './types.js';

/**
 * Resolve the estimator kind from the number of levels.
 *
 * Two levels resolve to `binary`, more to `multiclass`. An explicit override
 * wins when it is compatible with the level count: `multiclass` is accepted for
 * any `K >= 2`, `binary` only for exactly two levels.
 */
export function resolveEstimator(levelCount: number, override?: EstimatorKind): EstimatorKind {
  assertClassCount(levelCount);
  if (override === 'binary' && levelCount !== 2) {
    throw new DomainError(
      `the binary estimator requires exactly two classes, got ${levelCount}. Use 'multiclass' instead.`,
    );
  }
  if (override !== undefined) return override;
  return levelCount === 2 ? 'binary' : 'multiclass';
}

export function isBinary(kind: EstimatorKind): boolean {
  return kind === 'binary';
}

/**
 * Log loss is undefined for fewer than two classes.
 */
export function assertClassCount(levelCount: number): void {
  if (!Number.isInteger(levelCount) || levelCount < 2) {
    throw new DomainError(`at least two classes required, got ${levelCount}`);
  }
}
