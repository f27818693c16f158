/**
 * Zod schemas for the prediction-set file format.
 */

import { z } from 'zod';
import { estimatorKindSchema } from '../options.js';

/**
 * Probabilities of one row:
 * - a number: first-level probability (two classes)
 * - a list: one probability per level, in level order
 * - a mapping: level -> probability, absent levels count as 0
 */
export const probabilitiesSchema = z.union([
  z.number(),
  z.array(z.number().nullable()),
  z.record(z.string(), z.number().nullable()),
]);

export const predictionRowSchema = z
  .object({
    name: z.string().optional().nullable(),
    truth: z.string().nullable(),
    probabilities: probabilitiesSchema.nullable(),
  })
  .strict();

export const fileOptionsSchema = z
  .object({
    sum: z.boolean().optional(),
    na_rm: z.boolean().optional(),
    estimator: estimatorKindSchema.optional(),
    stability_floor: z.number().gt(0).lt(1).optional(),
  })
  .strict();

export const predictionSetSchema = z
  .object({
    $schema: z.string().optional(),
    name: z.string().optional().nullable(),
    levels: z.array(z.string()).optional().nullable(),
    options: fileOptionsSchema.optional().default({}),
    rows: z.array(predictionRowSchema),
  })
  .strict();
