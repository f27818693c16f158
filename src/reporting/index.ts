export type { ReportAnalysis, ScalarResult, TableResult } from './analyses.js';
export { defaultRenderNumber, renderFixed } from './render-numbers.js';
export type { MetricTableRow, RendererOptions } from './renderer.js';
export { metricTable, printMetricTable, renderMetricTable } from './renderer.js';
