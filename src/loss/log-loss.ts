/**
 * The loss engine: masked cross-entropy over a full probability matrix.
 *
 * Binary problems enter here as a two-column matrix; there is no separate
 * binary formula.
 */

import { ShapeError } from '../errors.js';
import { assertClassCount } from '../estimator.js';
import type { Label, LossOptions, ProbabilityMatrix } from '../types.js';
import { buildIndicatorMatrix } from './indicator.js';

/** Machine epsilon for doubles (2^-52). */
export const DEFAULT_STABILITY_FLOOR = Number.EPSILON;

/**
 * Expand a vector of first-level probabilities into `[p, 1 - p]` rows.
 */
export function expandBinaryEstimate(estimate: readonly number[]): number[][] {
  return estimate.map(expandBinaryRow);
}

export function expandBinaryRow(p: number): number[] {
  return [p, 1 - p];
}

/**
 * Negative log-probability assigned to the true class, one entry per observation.
 *
 * The true-class probability is clamped up to `stabilityFloor` when it is at or
 * below it, so a confident wrong prediction costs `-log(stabilityFloor)` rather
 * than infinity.
 */
export function observationLosses(
  truth: readonly Label[],
  estimate: ProbabilityMatrix,
  opts: Pick<LossOptions, 'levels' | 'stabilityFloor'>,
): number[] {
  checkShape(truth, estimate, opts.levels);

  const indicator = buildIndicatorMatrix(truth, opts.levels);
  const masked = indicator.map((row, i) => {
    const probs = estimate[i] ?? [];
    return row.map((hit, j) => hit * (probs[j] ?? 0));
  });

  return masked.map((row, i) => {
    // the indicator guarantees exactly one surviving column
    const column = indicator[i]?.indexOf(1) ?? -1;
    const value = row[column] ?? 0;
    const floored = value <= opts.stabilityFloor ? opts.stabilityFloor : value;
    return -Math.log(floored);
  });
}

/**
 * Mean (or summed) log loss of a full probability matrix against the truth vector.
 */
export function computeLoss(
  truth: readonly Label[],
  estimate: ProbabilityMatrix,
  opts: LossOptions,
): number {
  const losses = observationLosses(truth, estimate, opts);
  const total = losses.reduce((acc, v) => acc + v, 0);
  return opts.sum ? total : total / truth.length;
}

function checkShape(
  truth: readonly Label[],
  estimate: ProbabilityMatrix,
  levels: readonly Label[],
): void {
  assertClassCount(levels.length);
  if (truth.length !== estimate.length) {
    throw new ShapeError(
      `truth has ${truth.length} observations but the estimate has ${estimate.length} rows`,
    );
  }
  if (truth.length === 0) {
    throw new ShapeError('cannot compute log loss of zero observations');
  }
  estimate.forEach((row, i) => {
    if (row.length !== levels.length) {
      throw new ShapeError(
        `estimate row ${i} has ${row.length} columns but there are ${levels.length} classes`,
      );
    }
  });
}
