/**
 * Report-level analysis types: scalar, table.
 */

export interface ScalarResult {
  type: 'scalar';
  title: string;
  description?: string | null;
  value: number;
}

export interface TableResult {
  type: 'table';
  title: string;
  description?: string | null;
  /** Column headers. */
  columns: string[];
  /** Row data, one array per row. */
  rows: (string | number | boolean | null)[][];
}

/** Discriminated union of all report-level analysis types. */
export type ReportAnalysis = ScalarResult | TableResult;
