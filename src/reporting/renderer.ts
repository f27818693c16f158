/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { MetricResult } from '../types.js';
import type { TableResult } from './analyses.js';
import { defaultRenderNumber, renderFixed } from './render-numbers.js';

/** A metric row, optionally tagged with the name of what it was computed on. */
export interface MetricTableRow extends MetricResult {
  name?: string | null;
}

export interface RendererOptions {
  title?: string;
  /** Fixed number of decimals for the estimate. Defaults to significant-figure formatting. */
  digits?: number;
}

const COLUMNS = ['.metric', '.estimator', '.estimate'] as const;

/**
 * Metric rows as a table analysis.
 */
export function metricTable(rows: readonly MetricTableRow[], title = 'Metrics'): TableResult {
  const named = rows.some((r) => r.name !== undefined && r.name !== null);
  return {
    type: 'table',
    title,
    columns: named ? ['name', ...COLUMNS] : [...COLUMNS],
    rows: rows.map((r) => {
      const cells = [r.metric, r.estimator, r.estimate];
      return named ? [r.name ?? null, ...cells] : cells;
    }),
  };
}

/**
 * Render metric rows as a formatted table string.
 */
export function renderMetricTable(rows: readonly MetricTableRow[], opts?: RendererOptions): string {
  const table = metricTable(rows, opts?.title);
  const cli = new Table({
    head: table.columns.map((c) => chalk.bold(c)),
    style: { head: [], border: [] },
  });

  for (const row of table.rows) {
    cli.push(
      row.map((cell) => {
        if (typeof cell === 'number') {
          return opts?.digits === undefined ? defaultRenderNumber(cell) : renderFixed(cell, opts.digits);
        }
        return cell === null ? '-' : String(cell);
      }),
    );
  }

  return `${table.title}\n${cli.toString()}`;
}

/** Print metric rows to the console. */
export function printMetricTable(rows: readonly MetricTableRow[], opts?: RendererOptions): void {
  console.log(renderMetricTable(rows, opts));
}
