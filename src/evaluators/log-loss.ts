/**
 * Built-in report evaluator computing mean log loss over prediction cases.
 */

import { collectCases, type PredictionCase } from '../cases.js';
import { DEFAULT_STABILITY_FLOOR } from '../loss/log-loss.js';
import { type ScoredLoss, scoreLoss } from '../loss/vec.js';
import type { ScalarResult } from '../reporting/analyses.js';
import type { EstimatorKind, Label } from '../types.js';
import { ReportEvaluator, type ReportEvaluatorContext } from './report-evaluator.js';

export interface LogLossEvaluatorOptions {
  levels?: readonly Label[] | null;
  sum?: boolean;
  estimator?: EstimatorKind | null;
  stabilityFloor?: number;
  title?: string;
}

/**
 * Computes the log loss of the predicted class probabilities.
 *
 * Each case's `expectedOutput` is the true label and its `output` the predicted
 * probabilities. Cases missing either, or holding a missing probability, are
 * skipped.
 */
export class LogLossEvaluator extends ReportEvaluator {
  readonly levels: readonly Label[] | null;
  readonly sum: boolean;
  readonly estimator: EstimatorKind | null;
  readonly stabilityFloor: number;
  readonly title: string;

  constructor(opts?: LogLossEvaluatorOptions) {
    super();
    this.levels = opts?.levels ?? null;
    this.sum = opts?.sum ?? false;
    this.estimator = opts?.estimator ?? null;
    this.stabilityFloor = opts?.stabilityFloor ?? DEFAULT_STABILITY_FLOOR;
    this.title = opts?.title ?? (this.sum ? 'Total Log Loss' : 'Mean Log Loss');
  }

  protected getFields() {
    return {
      levels: this.levels,
      sum: this.sum,
      estimator: this.estimator,
      stabilityFloor: this.stabilityFloor,
      title: this.title,
    };
  }
  protected getDefaults() {
    return {
      levels: null,
      sum: false,
      estimator: null,
      stabilityFloor: DEFAULT_STABILITY_FLOOR,
      title: this.sum ? 'Total Log Loss' : 'Mean Log Loss',
    };
  }

  evaluate(ctx: ReportEvaluatorContext): ScalarResult {
    const usable = ctx.cases.filter((c) => c.expectedOutput !== null && c.output !== null);
    const scored = usable.length > 0 ? this.score(usable) : null;

    if (scored === null || scored.count === 0) {
      return {
        type: 'scalar',
        title: this.title,
        description: `${ctx.name}: no cases with both a label and probabilities`,
        value: Number.NaN,
      };
    }

    return {
      type: 'scalar',
      title: this.title,
      description: `${ctx.name}: ${scored.estimator}, ${scored.count} cases`,
      value: scored.value,
    };
  }

  private score(cases: readonly PredictionCase[]): ScoredLoss {
    const { levels, truth, estimate } = collectCases(cases, this.levels ?? undefined);
    return scoreLoss(truth, estimate, {
      levels,
      sum: this.sum,
      estimator: this.estimator ?? undefined,
      stabilityFloor: this.stabilityFloor,
    });
  }
}
