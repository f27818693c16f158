export { BaseEvaluator } from './base.js';
export type { LogLossEvaluatorOptions } from './log-loss.js';
export { LogLossEvaluator } from './log-loss.js';
export type { ReportEvaluatorContext } from './report-evaluator.js';
export { ReportEvaluator } from './report-evaluator.js';
