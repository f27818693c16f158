/**
 * Prediction cases: one labelled observation with the model's class probabilities.
 */

import { inferLevels, type MaybeLabel, mnLogLoss } from './loss/vec.js';
import type { LogLossOptions } from './options.js';
import type { Label, MetricResult } from './types.js';

/**
 * Class probabilities as a model reports them: a row in level order, a single
 * first-level probability (two classes only), or a mapping keyed by level.
 * Levels absent from a mapping count as probability 0.
 */
export type ProbabilityOutput = readonly (number | null)[] | number | Readonly<Record<Label, number | null>>;

export interface PredictionCase {
  name: string | null;
  /** The true class. */
  expectedOutput: Label | null;
  /** The predicted class probabilities. */
  output: ProbabilityOutput | null;
}

export interface CollectedCases {
  levels: Label[];
  truth: MaybeLabel[];
  estimate: (number | null)[][];
}

/**
 * Turn cases into a truth vector and an estimate matrix over `levels`.
 *
 * Without explicit levels, the level set is the sorted union of the labels and
 * of the keys of any mapping outputs. Missing labels and outputs stay in place
 * as `null` so that missing-value handling applies to them.
 */
export function collectCases(
  cases: readonly PredictionCase[],
  levels?: readonly Label[],
): CollectedCases {
  const resolvedLevels = levels ? [...levels] : casesLevels(cases);
  return {
    levels: resolvedLevels,
    truth: cases.map((c) => c.expectedOutput),
    estimate: cases.map((c) => toRow(c.output, resolvedLevels)),
  };
}

/**
 * Log loss over a list of cases.
 */
export function scoreCases(
  cases: readonly PredictionCase[],
  options: LogLossOptions = {},
): MetricResult {
  const { levels, truth, estimate } = collectCases(cases, options.levels);
  return mnLogLoss(truth, estimate, { ...options, levels });
}

function casesLevels(cases: readonly PredictionCase[]): Label[] {
  const labels: MaybeLabel[] = [];
  for (const c of cases) {
    labels.push(c.expectedOutput);
    if (c.output !== null && typeof c.output === 'object' && !isProbabilityRow(c.output)) {
      labels.push(...Object.keys(c.output));
    }
  }
  return inferLevels(labels);
}

function toRow(output: ProbabilityOutput | null, levels: readonly Label[]): (number | null)[] {
  if (output === null) return [null];
  if (typeof output === 'number') return [output];
  if (isProbabilityRow(output)) return [...output];
  return levels.map((level) => {
    const p = output[level];
    return p === undefined ? 0 : p;
  });
}

function isProbabilityRow(
  output: Exclude<ProbabilityOutput, number>,
): output is readonly (number | null)[] {
  return Array.isArray(output);
}
