import { DiffHunk, DiffLine, DiffLineType, isChangedLine } from './types';

/**
 * Create a diff hunk from lines.
 *
 * `oldNext` and `newNext` are the line numbers the hunk's first old and new
 * lines would carry. A side without lines follows the unified diff convention
 * and starts at the line before the hunk.
 */
export const createHunk = (
  lines: readonly DiffLine[],
  oldNext: number,
  newNext: number
): DiffHunk => {
  let oldCount = 0;
  let newCount = 0;

  lines.forEach((line) => {
    if (line.type === DiffLineType.CONTEXT || line.type === DiffLineType.REMOVED) {
      oldCount++;
    }

    if (line.type === DiffLineType.CONTEXT || line.type === DiffLineType.ADDED) {
      newCount++;
    }
  });

  return {
    oldStart: oldCount > 0 ? oldNext : oldNext - 1,
    oldCount,
    newStart: newCount > 0 ? newNext : newNext - 1,
    newCount,
    lines: [...lines],
  };
};

/**
 * The line numbers a hunk's first old and new lines carry, whether or not
 * the hunk has lines on that side.
 */
export const hunkOrigin = (hunk: DiffHunk): { oldNext: number; newNext: number } => ({
  oldNext: hunk.oldCount > 0 ? hunk.oldStart : hunk.oldStart + 1,
  newNext: hunk.newCount > 0 ? hunk.newStart : hunk.newStart + 1,
});

/**
 * Split a run of lines into contiguous hunks.
 *
 * A new hunk starts after every line `keep` rejects and wherever the line
 * numbering on either side jumps. Segments that carry no added or removed
 * line are dropped.
 */
export const splitLines = (
  lines: readonly DiffLine[],
  oldNext: number,
  newNext: number,
  keep: (line: DiffLine) => boolean = () => true
): DiffHunk[] => {
  const hunks: DiffHunk[] = [];
  let segment: DiffLine[] = [];
  let segmentOld = oldNext;
  let segmentNew = newNext;
  let nextOld = oldNext;
  let nextNew = newNext;

  const flush = (): void => {
    if (segment.some(isChangedLine)) {
      hunks.push(createHunk(segment, segmentOld, segmentNew));
    }
    segment = [];
  };

  for (const line of lines) {
    const jumps =
      (line.oldLineNumber !== undefined && line.oldLineNumber !== nextOld) ||
      (line.newLineNumber !== undefined && line.newLineNumber !== nextNew);

    if (jumps) {
      flush();
      nextOld = line.oldLineNumber ?? nextOld;
      nextNew = line.newLineNumber ?? nextNew;
    }

    if (segment.length === 0) {
      segmentOld = nextOld;
      segmentNew = nextNew;
    }

    if (line.oldLineNumber !== undefined) nextOld = line.oldLineNumber + 1;
    if (line.newLineNumber !== undefined) nextNew = line.newLineNumber + 1;

    if (keep(line)) {
      segment.push(line);
    } else {
      flush();
    }
  }

  flush();
  return hunks;
};
