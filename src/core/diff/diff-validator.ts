import { MalformedDiffException } from '@/core/exceptions';
import { hunkOrigin } from './hunk-builder';
import { DiffLineType, type DiffHunk, type FileDiff, type GitDiff } from './types';

const where = (file: FileDiff, hunkIndex: number): string =>
  `${file.newPath} hunk #${hunkIndex + 1}`;

const validateHunk = (file: FileDiff, hunk: DiffHunk, hunkIndex: number): void => {
  if (hunk.lines.length === 0) {
    throw new MalformedDiffException(`${where(file, hunkIndex)} has no lines`);
  }

  let { oldNext, newNext } = hunkOrigin(hunk);
  const oldEnd = oldNext + hunk.oldCount;
  const newEnd = newNext + hunk.newCount;

  hunk.lines.forEach((line, lineIndex) => {
    const label = `${where(file, hunkIndex)} line ${lineIndex + 1}`;
    const hasOld = line.type !== DiffLineType.ADDED;
    const hasNew = line.type !== DiffLineType.REMOVED;

    if (hasOld !== (line.oldLineNumber !== undefined)) {
      throw new MalformedDiffException(`${label}: ${line.type} line has the wrong old line number`);
    }
    if (hasNew !== (line.newLineNumber !== undefined)) {
      throw new MalformedDiffException(`${label}: ${line.type} line has the wrong new line number`);
    }

    if (line.oldLineNumber !== undefined) {
      if (line.oldLineNumber !== oldNext) {
        throw new MalformedDiffException(
          `${label}: expected old line ${oldNext}, got ${line.oldLineNumber}`
        );
      }
      oldNext++;
    }

    if (line.newLineNumber !== undefined) {
      if (line.newLineNumber !== newNext) {
        throw new MalformedDiffException(
          `${label}: expected new line ${newNext}, got ${line.newLineNumber}`
        );
      }
      newNext++;
    }
  });

  if (oldNext !== oldEnd || newNext !== newEnd) {
    throw new MalformedDiffException(
      `${where(file, hunkIndex)}: line counts do not match the hunk header`
    );
  }
};

const validateFile = (file: FileDiff): void => {
  let previous: DiffHunk | undefined;

  file.hunks.forEach((hunk, hunkIndex) => {
    validateHunk(file, hunk, hunkIndex);

    if (previous) {
      const before = hunkOrigin(previous);
      const after = hunkOrigin(hunk);
      if (
        after.oldNext < before.oldNext + previous.oldCount ||
        after.newNext < before.newNext + previous.newCount
      ) {
        throw new MalformedDiffException(
          `${where(file, hunkIndex)} overlaps or precedes the hunk before it`
        );
      }
    }

    previous = hunk;
  });
};

/**
 * Check the structural invariants every downstream step relies on: one entry
 * per path on each side, numbered lines that agree with their hunk headers,
 * and hunks in ascending, non-overlapping order.
 */
export const validateGitDiff = (gitDiff: GitDiff): void => {
  const oldPaths = new Set<string>();
  const newPaths = new Set<string>();

  for (const file of gitDiff.files) {
    if (oldPaths.has(file.oldPath)) {
      throw new MalformedDiffException(`'${file.oldPath}' appears more than once as an old path`);
    }
    if (newPaths.has(file.newPath)) {
      throw new MalformedDiffException(`'${file.newPath}' appears more than once as a new path`);
    }
    oldPaths.add(file.oldPath);
    newPaths.add(file.newPath);

    validateFile(file);
  }
};
