/**
 * YAML/JSON loading and saving for prediction sets.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import YAML from 'yaml';
import { type PredictionCase, scoreCases } from '../cases.js';
import { LogLossOptionsError } from '../errors.js';
import { formatIssues, type LogLossOptions } from '../options.js';
import type { Label, MetricResult } from '../types.js';
import { predictionSetSchema } from './schema.js';

/**
 * A named list of prediction cases with the options to score them under.
 */
export interface PredictionSet {
  name: string | null;
  levels: Label[] | null;
  options: Omit<LogLossOptions, 'levels'>;
  cases: PredictionCase[];
}

export interface LoadOptions {
  /** File format. If not specified, inferred from file extension. */
  fmt?: 'yaml' | 'json';
}

/**
 * Load a PredictionSet from a file. The name defaults to the file stem.
 */
export function loadPredictionSetFromFile(path: string, opts?: LoadOptions): PredictionSet {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadPredictionSetFromText(content, { fmt, defaultName: stemOf(path) });
}

/**
 * Load a PredictionSet from a string.
 */
export function loadPredictionSetFromText(
  content: string,
  opts?: LoadOptions & { defaultName?: string },
): PredictionSet {
  const fmt = opts?.fmt ?? 'yaml';
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  return loadPredictionSetFromObject(raw, opts);
}

/**
 * Load a PredictionSet from a plain object (after parsing YAML/JSON).
 */
export function loadPredictionSetFromObject(
  data: unknown,
  opts?: { defaultName?: string },
): PredictionSet {
  const result = predictionSetSchema.safeParse(data);
  if (!result.success) {
    throw new LogLossOptionsError('invalid prediction set', formatIssues(result.error));
  }
  const parsed = result.data;

  const options: Omit<LogLossOptions, 'levels'> = {};
  if (parsed.options.sum !== undefined) options.sum = parsed.options.sum;
  if (parsed.options.na_rm !== undefined) options.naRm = parsed.options.na_rm;
  if (parsed.options.estimator !== undefined) options.estimator = parsed.options.estimator;
  if (parsed.options.stability_floor !== undefined) {
    options.stabilityFloor = parsed.options.stability_floor;
  }

  return {
    name: parsed.name ?? opts?.defaultName ?? null,
    levels: parsed.levels ?? null,
    options,
    cases: parsed.rows.map((row, i) => ({
      name: row.name ?? `row_${i + 1}`,
      expectedOutput: row.truth,
      output: row.probabilities,
    })),
  };
}

/**
 * Save a PredictionSet to a file.
 */
export function savePredictionSetToFile(
  set: PredictionSet,
  path: string,
  opts?: LoadOptions,
): void {
  const fmt = opts?.fmt ?? inferFormat(path);
  const data = serializePredictionSet(set);

  if (fmt === 'yaml') {
    writeFileSync(path, YAML.stringify(data, { sortMapEntries: false }), 'utf-8');
  } else {
    writeFileSync(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  }
}

/**
 * Score a PredictionSet with its own options.
 */
export function evaluatePredictionSet(set: PredictionSet): MetricResult {
  return scoreCases(set.cases, { ...set.options, levels: set.levels ?? undefined });
}

function serializePredictionSet(set: PredictionSet): Record<string, unknown> {
  const data: Record<string, unknown> = {};
  if (set.name) data.name = set.name;
  if (set.levels) data.levels = set.levels;

  const options: Record<string, unknown> = {};
  if (set.options.sum !== undefined) options.sum = set.options.sum;
  if (set.options.naRm !== undefined) options.na_rm = set.options.naRm;
  if (set.options.estimator !== undefined) options.estimator = set.options.estimator;
  if (set.options.stabilityFloor !== undefined) options.stability_floor = set.options.stabilityFloor;
  if (Object.keys(options).length > 0) data.options = options;

  data.rows = set.cases.map((c) => {
    const row: Record<string, unknown> = {};
    if (c.name) row.name = c.name;
    row.truth = c.expectedOutput;
    row.probabilities = c.output;
    return row;
  });
  return data;
}

// -- Utilities --

function inferFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function stemOf(path: string): string {
  const base = basename(path);
  return base.slice(0, base.length - extname(base).length);
}
