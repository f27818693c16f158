import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { LogLossOptionsError, ShapeError } from '../src/errors.js';
import {
  evaluatePredictionSet,
  loadPredictionSetFromFile,
  loadPredictionSetFromObject,
  loadPredictionSetFromText,
  savePredictionSetToFile,
} from '../src/serialization/loader.js';
import { predictionSetSchema, probabilitiesSchema } from '../src/serialization/schema.js';

const FIXTURES = join(dirname(fileURLToPath(import.meta.url)), 'fixtures');

describe('Zod schemas', () => {
  describe('probabilitiesSchema', () => {
    it('accepts a number, a list and a mapping', () => {
      expect(probabilitiesSchema.parse(0.4)).toBe(0.4);
      expect(probabilitiesSchema.parse([0.4, null])).toEqual([0.4, null]);
      expect(probabilitiesSchema.parse({ A: 0.4 })).toEqual({ A: 0.4 });
    });

    it('rejects strings', () => {
      expect(() => probabilitiesSchema.parse('0.4')).toThrow();
    });
  });

  describe('predictionSetSchema', () => {
    it('defaults options to empty', () => {
      const result = predictionSetSchema.parse({ rows: [] });
      expect(result.options).toEqual({});
    });

    it('rejects unknown keys in strict mode', () => {
      expect(() => predictionSetSchema.parse({ rows: [], weights: [] })).toThrow();
    });
  });
});

describe('loadPredictionSetFromText', () => {
  it('loads a YAML prediction set', () => {
    const yaml = `
name: smoke
levels: [A, B]
options:
  sum: true
  na_rm: false
  stability_floor: 1e-6
rows:
  - name: first
    truth: A
    probabilities: 0.9
  - truth: B
    probabilities: [0.2, 0.8]
`;
    const set = loadPredictionSetFromText(yaml, { fmt: 'yaml' });
    expect(set.name).toBe('smoke');
    expect(set.levels).toEqual(['A', 'B']);
    expect(set.options).toEqual({ sum: true, naRm: false, stabilityFloor: 1e-6 });
    expect(set.cases).toEqual([
      { name: 'first', expectedOutput: 'A', output: 0.9 },
      { name: 'row_2', expectedOutput: 'B', output: [0.2, 0.8] },
    ]);
  });

  it('loads a JSON prediction set', () => {
    const json = JSON.stringify({
      rows: [{ truth: 'A', probabilities: { A: 0.9, B: 0.1 } }],
      options: { estimator: 'multiclass' },
    });
    const set = loadPredictionSetFromText(json, { fmt: 'json', defaultName: 'fallback' });
    expect(set.name).toBe('fallback');
    expect(set.levels).toBeNull();
    expect(set.options).toEqual({ estimator: 'multiclass' });
  });

  it('reports schema violations', () => {
    expect(() =>
      loadPredictionSetFromText('rows:\n  - truth: A\n    probabilities: high\n'),
    ).toThrow(LogLossOptionsError);
  });
});

describe('loadPredictionSetFromObject', () => {
  it('rejects an invalid stability floor', () => {
    try {
      loadPredictionSetFromObject({ rows: [], options: { stability_floor: -1 } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LogLossOptionsError);
      const issues = e instanceof LogLossOptionsError ? e.issues : [];
      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^options\.stability_floor: /);
    }
  });
});

describe('loadPredictionSetFromFile', () => {
  it('names the set after the file and scores it', () => {
    const set = loadPredictionSetFromFile(join(FIXTURES, 'fold01.yaml'));
    expect(set.name).toBe('fold01');
    expect(set.cases).toHaveLength(4);

    const result = evaluatePredictionSet(set);
    expect(result.estimator).toBe('multiclass');
    expect(result.estimate).toBeCloseTo(-(Math.log(0.7) + Math.log(0.5) + Math.log(0.4)) / 3, 12);
  });

  it('throws for an unknown extension', () => {
    expect(() => loadPredictionSetFromFile('predictions.txt')).toThrow(
      "Could not infer format for filename 'predictions.txt'. Use the fmt option to specify the format.",
    );
  });
});

describe('evaluatePredictionSet', () => {
  it('applies the set options', () => {
    const set = loadPredictionSetFromObject({
      levels: ['A', 'B'],
      options: { sum: true },
      rows: [
        { truth: 'A', probabilities: 0.9 },
        { truth: 'B', probabilities: 0.2 },
      ],
    });
    const result = evaluatePredictionSet(set);
    expect(result.estimator).toBe('binary');
    expect(result.estimate).toBeCloseTo(-Math.log(0.9) - Math.log(0.8), 12);
  });

  it('scores a set mixing number rows with list and mapping rows', () => {
    const set = loadPredictionSetFromText(`
levels: [A, B]
rows:
  - truth: A
    probabilities: 0.9
  - truth: B
    probabilities: [0.2, 0.8]
  - truth: B
    probabilities: { A: 0.2, B: 0.8 }
`);
    const result = evaluatePredictionSet(set);
    expect(result.estimator).toBe('binary');
    expect(result.estimate).toBeCloseTo(-(Math.log(0.9) + 2 * Math.log(0.8)) / 3, 12);
  });

  it('rejects number rows in a multiclass set', () => {
    const set = loadPredictionSetFromObject({
      levels: ['A', 'B', 'C'],
      rows: [
        { truth: 'A', probabilities: 0.9 },
        { truth: 'B', probabilities: [0.1, 0.8, 0.1] },
      ],
    });
    expect(() => evaluatePredictionSet(set)).toThrow(ShapeError);
  });

  it('returns NaN for missing rows when na_rm is off', () => {
    const set = loadPredictionSetFromObject({
      options: { na_rm: false },
      rows: [
        { truth: 'A', probabilities: [0.9, 0.1] },
        { truth: 'B', probabilities: null },
      ],
    });
    expect(evaluatePredictionSet(set).estimate).toBeNaN();
  });
});

describe('savePredictionSetToFile', () => {
  it('round-trips through JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'logloss-'));
    try {
      const path = join(dir, 'set.json');
      const set = loadPredictionSetFromObject({
        name: 'saved',
        levels: ['A', 'B'],
        options: { sum: true, na_rm: true },
        rows: [{ name: 'r1', truth: 'A', probabilities: [0.9, 0.1] }],
      });
      savePredictionSetToFile(set, path);

      expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({
        name: 'saved',
        levels: ['A', 'B'],
        options: { sum: true, na_rm: true },
        rows: [{ name: 'r1', truth: 'A', probabilities: [0.9, 0.1] }],
      });
      expect(loadPredictionSetFromFile(path)).toEqual(set);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('writes YAML', () => {
    const dir = mkdtempSync(join(tmpdir(), 'logloss-'));
    try {
      const path = join(dir, 'set.yaml');
      savePredictionSetToFile(
        {
          name: null,
          levels: null,
          options: {},
          cases: [{ name: null, expectedOutput: 'A', output: 0.5 }],
        },
        path,
      );
      expect(readFileSync(path, 'utf-8')).toBe('rows:\n  - truth: A\n    probabilities: 0.5\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
