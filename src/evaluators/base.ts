/**
 * Shared serialization base for evaluators.
 */

import { isDeepStrictEqual } from 'node:util';
import type { EvaluatorSpec } from '../types.js';

/**
 * Base class providing spec-building and repr logic.
 *
 * Subclasses list their constructor fields in `getFields()` and the defaults in
 * `getDefaults()`; fields left at their default are not serialized.
 */
export abstract class BaseEvaluator {
  /**
   * Name used during serialization. Defaults to the constructor name.
   */
  getSerializationName(): string {
    return this.constructor.name;
  }

  protected getFields(): Record<string, unknown> {
    return {};
  }

  protected getDefaults(): Record<string, unknown> {
    return {};
  }

  /**
   * The fields that differ from their defaults.
   */
  buildSerializationArguments(): Record<string, unknown> {
    const defaults = this.getDefaults();
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(this.getFields())) {
      if (key in defaults && isDeepStrictEqual(value, defaults[key])) continue;
      result[key] = value;
    }
    return result;
  }

  /**
   * Convert this evaluator to an EvaluatorSpec.
   *
   * A lone non-default argument that is also the first field uses the compact
   * positional form.
   */
  asSpec(): EvaluatorSpec {
    const name = this.getSerializationName();
    const args = this.buildSerializationArguments();
    const keys = Object.keys(args);

    if (keys.length === 0) return { name, arguments: null };

    const [firstField] = Object.keys(this.getFields());
    const [onlyKey] = keys;
    if (keys.length === 1 && onlyKey !== undefined && onlyKey === firstField) {
      return { name, arguments: [args[onlyKey]] };
    }
    return { name, arguments: args };
  }

  toString(): string {
    const argStr = Object.entries(this.buildSerializationArguments())
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(', ');
    return `${this.getSerializationName()}(${argStr})`;
  }
}
