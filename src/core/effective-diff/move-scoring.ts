import type { LineMatchIndex } from './line-matcher';

/**
 * Average inverse frequency of the block's lines among all added lines.
 * A line added once scores 1; boilerplate such as `return null;` that is
 * added in many places scores close to 0.
 */
export const computeLineUniqueness = (
  contents: readonly string[],
  index: LineMatchIndex
): number => {
  if (contents.length === 0) return 0;

  const total = contents.reduce(
    (sum, content) => sum + 1 / Math.max(1, index.addedFrequency(content)),
    0
  );
  return total / contents.length;
};

/**
 * Move confidence. Strictly increasing in `matchedLineCount` for a fixed
 * uniqueness; the exact scale is a tuning choice, not a contract.
 */
export const scoreBlock = (matchedLineCount: number, uniqueness: number): number =>
  matchedLineCount * uniqueness;
