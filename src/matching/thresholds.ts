/**
 * Threshold resolution for a reconciliation run.
 */

import { z } from 'zod';
import { DEFAULT_FUZZY_CUTOFF, DEFAULT_TOKEN_CUTOFF } from './constants';
import { InvalidConfigurationError } from './errors';
import type { Thresholds } from './types';

const cutoffSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be a finite number')
  .min(0, 'must be between 0 and 1')
  .max(1, 'must be between 0 and 1');

const thresholdsSchema = z.object({
  fuzzyCutoff: cutoffSchema.optional(),
  tokenCutoff: cutoffSchema.optional(),
});

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = Object.freeze({
  fuzzyCutoff: DEFAULT_FUZZY_CUTOFF,
  tokenCutoff: DEFAULT_TOKEN_CUTOFF,
});

/**
 * Merges overrides onto the defaults.
 *
 * @throws InvalidConfigurationError when an override is not a number in [0, 1]
 *
 * @example
 * resolveThresholds({ fuzzyCutoff: 0.8 }) // { fuzzyCutoff: 0.8, tokenCutoff: 0.5 }
 */
export function resolveThresholds(
  overrides: Partial<Thresholds> = {},
  defaults: Thresholds = DEFAULT_THRESHOLDS
): Thresholds {
  const parsed = thresholdsSchema.safeParse(overrides);

  if (!parsed.success) {
    const details = parsed.error.errors
      .map((issue) => `${issue.path.join('.') || 'thresholds'} ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(`Invalid thresholds: ${details}`);
  }

  return {
    fuzzyCutoff: parsed.data.fuzzyCutoff ?? defaults.fuzzyCutoff,
    tokenCutoff: parsed.data.tokenCutoff ?? defaults.tokenCutoff,
  };
}

export default resolveThresholds;
