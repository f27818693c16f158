/**
 * logloss-evals: mean log loss (cross-entropy) for classification models.
 *
 * @example
 * ```ts
 * import { mnLogLoss, LogLossEvaluator } from 'logloss-evals';
 *
 * mnLogLoss(['A', 'B'], [[0.9, 0.1], [0.2, 0.8]]);
 * // { metric: 'mn_log_loss', estimator: 'binary', estimate: 0.164... }
 *
 * const evaluator = new LogLossEvaluator({ sum: true });
 * evaluator.evaluate({
 *   name: 'fold01',
 *   cases: [{ name: 'a', expectedOutput: 'A', output: { A: 0.9, B: 0.1 } }],
 *   experimentMetadata: null,
 * });
 * ```
 */

// Core
export type { CollectedCases, PredictionCase, ProbabilityOutput } from './cases.js';
export { collectCases, scoreCases } from './cases.js';
export { DomainError, LogLossOptionsError, ShapeError } from './errors.js';
export { assertClassCount, isBinary, resolveEstimator } from './estimator.js';
export { buildIndicatorMatrix } from './loss/indicator.js';
export {
  computeLoss,
  DEFAULT_STABILITY_FLOOR,
  expandBinaryEstimate,
  expandBinaryRow,
  observationLosses,
} from './loss/log-loss.js';
export type { MaybeLabel, MaybeMatrix, MaybeVector, ScoredLoss } from './loss/vec.js';
export { inferLevels, mnLogLoss, mnLogLossVec, scoreLoss } from './loss/vec.js';
export type { LogLossOptions, ResolvedLogLossOptions } from './options.js';
export { DEFAULT_LOSS_OPTIONS, logLossOptionsSchema, parseLogLossOptions } from './options.js';
export type {
  EstimatorKind,
  EvaluatorSpec,
  Label,
  LossOptions,
  MetricResult,
  ProbabilityMatrix,
} from './types.js';
// Evaluators
export type { LogLossEvaluatorOptions, ReportEvaluatorContext } from './evaluators/index.js';
export { BaseEvaluator, LogLossEvaluator, ReportEvaluator } from './evaluators/index.js';
// Reporting
export type {
  MetricTableRow,
  RendererOptions,
  ReportAnalysis,
  ScalarResult,
  TableResult,
} from './reporting/index.js';
export {
  defaultRenderNumber,
  metricTable,
  printMetricTable,
  renderFixed,
  renderMetricTable,
} from './reporting/index.js';
// Serialization
export type { LoadOptions, PredictionSet } from './serialization/index.js';
export {
  evaluatePredictionSet,
  loadPredictionSetFromFile,
  loadPredictionSetFromObject,
  loadPredictionSetFromText,
  predictionSetSchema,
  savePredictionSetToFile,
} from './serialization/index.js';
