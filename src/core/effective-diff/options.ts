import { ConfigException } from '@/core/exceptions';

export interface EffectiveDiffOptions {
  /** Shortest block reported as a move. */
  minBlockSize: number;
  /** Trimmed length below which a line counts as trivial (blank lines, lone braces). */
  minSignificantLength: number;
  /** Unchanged lines padded around every hunk when building residual regions. */
  contextLines: number;
  /** File pairs re-diffed at the same time. */
  maxConcurrency: number;
}

export const DEFAULT_OPTIONS: Readonly<EffectiveDiffOptions> = {
  minBlockSize: 3,
  minSignificantLength: 2,
  contextLines: 3,
  maxConcurrency: 4,
};

export const OPTION_KEYS = [
  'minBlockSize',
  'minSignificantLength',
  'contextLines',
  'maxConcurrency',
] as const satisfies readonly (keyof EffectiveDiffOptions)[];

const MINIMUMS: Record<keyof EffectiveDiffOptions, number> = {
  minBlockSize: 1,
  minSignificantLength: 0,
  contextLines: 0,
  maxConcurrency: 1,
};

/**
 * Merge overrides onto the defaults. Every value must be a whole number
 * no smaller than its minimum.
 */
export const resolveOptions = (
  overrides: Partial<EffectiveDiffOptions> = {}
): EffectiveDiffOptions => {
  const resolved: EffectiveDiffOptions = { ...DEFAULT_OPTIONS };

  for (const key of OPTION_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;

    if (!Number.isInteger(value) || value < MINIMUMS[key]) {
      throw new ConfigException(
        `${key} must be an integer >= ${MINIMUMS[key]}, got ${String(value)}`
      );
    }
    resolved[key] = value;
  }

  return resolved;
};
