/**
 * ReportEvaluator: base class for evaluators that see every case at once.
 *
 * Log loss is an experiment-wide quantity, so it is computed over the whole
 * list of prediction cases rather than per case.
 */

import type { PredictionCase } from '../cases.js';
import type { ReportAnalysis } from '../reporting/analyses.js';
import { BaseEvaluator } from './base.js';

export interface ReportEvaluatorContext {
  /** The experiment name. */
  name: string;
  /** Every prediction case of the experiment. */
  cases: readonly PredictionCase[];
  /** Experiment-level metadata. */
  experimentMetadata: Record<string, unknown> | null;
}

export abstract class ReportEvaluator extends BaseEvaluator {
  /**
   * Evaluate the full set of cases and return experiment-wide analysis/analyses.
   */
  abstract evaluate(ctx: ReportEvaluatorContext): ReportAnalysis | ReportAnalysis[];
}
