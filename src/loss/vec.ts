/**
 * Vector front end: level inference, missing-value handling, estimator
 * resolution and the binary shorthand, in front of the loss engine.
 */

import { ShapeError } from '../errors.js';
import { resolveEstimator } from '../estimator.js';
import { type LogLossOptions, parseLogLossOptions } from '../options.js';
import type { EstimatorKind, Label, MetricResult } from '../types.js';
import { computeLoss, expandBinaryRow } from './log-loss.js';

type MaybeNumber = number | null | undefined;
export type MaybeLabel = Label | null | undefined;
export type MaybeMatrix = readonly (readonly MaybeNumber[])[];
export type MaybeVector = readonly MaybeNumber[];

export interface ScoredLoss {
  estimator: EstimatorKind;
  value: number;
  /** Observations the loss was computed from, after missing-value handling. */
  count: number;
}

/**
 * Mean log loss of class probabilities against the true labels.
 *
 * `estimate` is either an N x K matrix with columns in level order, or, for two
 * classes, a vector holding the probability of the first level.
 *
 * @example
 * ```ts
 * mnLogLossVec(['A', 'B'], [[0.9, 0.1], [0.2, 0.8]]); // 0.164...
 * mnLogLossVec(['A', 'B'], [0.9, 0.2], { sum: true }); // 0.328...
 * ```
 */
export function mnLogLossVec(
  truth: readonly MaybeLabel[],
  estimate: MaybeMatrix | MaybeVector,
  options?: LogLossOptions,
): number {
  return requireObservations(scoreLoss(truth, estimate, options)).value;
}

/**
 * Same as {@link mnLogLossVec}, returned as a metric row.
 */
export function mnLogLoss(
  truth: readonly MaybeLabel[],
  estimate: MaybeMatrix | MaybeVector,
  options?: LogLossOptions,
): MetricResult {
  const { estimator, value } = requireObservations(scoreLoss(truth, estimate, options));
  return { metric: 'mn_log_loss', estimator, estimate: value };
}

/**
 * Sorted distinct labels, ignoring missing values.
 */
export function inferLevels(truth: readonly MaybeLabel[]): Label[] {
  const levels = new Set<Label>();
  for (const label of truth) {
    if (label !== null && label !== undefined) levels.add(label);
  }
  return [...levels].sort();
}

/**
 * Log loss with the number of observations it covers.
 *
 * Unlike {@link mnLogLossVec}, an input whose rows are all dropped as missing
 * yields `NaN` with a count of 0 instead of throwing.
 */
export function scoreLoss(
  truth: readonly MaybeLabel[],
  estimate: MaybeMatrix | MaybeVector,
  options?: LogLossOptions,
): ScoredLoss {
  const opts = parseLogLossOptions(options ?? {});
  const levels = opts.levels ?? inferLevels(truth);
  const estimator = resolveEstimator(levels.length, opts.estimator);

  if (truth.length !== estimate.length) {
    throw new ShapeError(
      `truth has ${truth.length} observations but the estimate has ${estimate.length} rows`,
    );
  }

  const rows: MaybeMatrix = isMatrixInput(estimate) ? estimate : estimate.map((p) => [p]);
  const keptTruth: Label[] = [];
  const keptRows: number[][] = [];
  for (const [i, label] of truth.entries()) {
    const row = completeRow(rows[i] ?? []);
    if (label === null || label === undefined || row === null) {
      if (!opts.naRm) return { estimator, value: Number.NaN, count: truth.length };
      continue;
    }
    keptTruth.push(label);
    keptRows.push(row);
  }

  if (keptTruth.length === 0 && truth.length > 0) {
    return { estimator, value: Number.NaN, count: 0 };
  }

  // a one-column row is the first-level probability of a two-class problem
  const matrix = keptRows.map((row) => {
    const [p] = row;
    if (row.length !== 1 || p === undefined) return row;
    if (estimator !== 'binary') {
      throw new ShapeError(
        `a single probability column is only accepted for two classes; expected ${levels.length} columns`,
      );
    }
    return expandBinaryRow(p);
  });

  const value = computeLoss(keptTruth, matrix, {
    levels,
    sum: opts.sum,
    stabilityFloor: opts.stabilityFloor,
  });
  return { estimator, value, count: keptTruth.length };
}

function requireObservations(scored: ScoredLoss): ScoredLoss {
  if (scored.count === 0) {
    throw new ShapeError('cannot compute log loss of zero observations');
  }
  return scored;
}

function isMatrixInput(estimate: MaybeMatrix | MaybeVector): estimate is MaybeMatrix {
  for (const row of estimate) {
    if (Array.isArray(row)) return true;
  }
  return false;
}

function completeRow(row: readonly MaybeNumber[]): number[] | null {
  const out: number[] = [];
  for (const value of row) {
    if (value === null || value === undefined || Number.isNaN(value)) return null;
    out.push(value);
  }
  return out;
}
