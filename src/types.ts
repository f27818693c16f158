/**
 * Core type definitions for logloss-evals.
 */

/** A categorical class label. */
export type Label = string;

/** One predicted probability distribution per observation, columns in level order. */
export type ProbabilityMatrix = readonly (readonly number[])[];

/** Whether the problem is scored as two-class or as K-class. */
export type EstimatorKind = 'binary' | 'multiclass';

/**
 * Options for the loss engine.
 */
export interface LossOptions {
  /** Ordered level set. Column `j` of the estimate belongs to `levels[j]`. */
  levels: readonly Label[];
  /** Return the summed loss instead of the mean. */
  sum: boolean;
  /** Probabilities at or below this value are raised to it before the log. */
  stabilityFloor: number;
}

/**
 * A single metric row, the shape a table summarizer consumes.
 */
export interface MetricResult {
  metric: 'mn_log_loss';
  estimator: EstimatorKind;
  estimate: number;
}

/**
 * The specification of an evaluator (serializable format).
 */
export interface EvaluatorSpec {
  name: string;
  arguments: null | [unknown] | Record<string, unknown>;
}
