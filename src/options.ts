/**
 * Options accepted by the log loss front end, validated with zod.
 */

import { z } from 'zod';
import { LogLossOptionsError } from './errors.js';
import { DEFAULT_STABILITY_FLOOR } from './loss/log-loss.js';

export const estimatorKindSchema = z.enum(['binary', 'multiclass']);

export const logLossOptionsSchema = z
  .object({
    /** Ordered level set. Defaults to the sorted distinct truth values. */
    levels: z.array(z.string()).readonly().optional(),
    /** Return the summed loss instead of the mean. */
    sum: z.boolean().default(false),
    /** Drop observations with a missing label or probability before computing. */
    naRm: z.boolean().default(true),
    /** Force the estimator kind instead of inferring it from the level count. */
    estimator: estimatorKindSchema.optional(),
    stabilityFloor: z.number().gt(0).lt(1).default(DEFAULT_STABILITY_FLOOR),
  })
  .strict();

export type LogLossOptions = z.input<typeof logLossOptionsSchema>;
export type ResolvedLogLossOptions = z.output<typeof logLossOptionsSchema>;

export const DEFAULT_LOSS_OPTIONS: ResolvedLogLossOptions = logLossOptionsSchema.parse({});

/**
 * Validate options and fill in defaults.
 */
export function parseLogLossOptions(options: unknown = {}): ResolvedLogLossOptions {
  const result = logLossOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new LogLossOptionsError('invalid log loss options', formatIssues(result.error));
  }
  return result.data;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}
