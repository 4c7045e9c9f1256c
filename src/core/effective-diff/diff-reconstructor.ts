import { hunkOrigin, splitLines } from '@/core/diff/hunk-builder';
import {
  DiffLineType,
  type DiffHunk,
  type DiffLine,
  type FileDiff,
  type GitDiff,
} from '@/core/diff/types';
import { EffectiveDiffException } from '@/core/exceptions';
import { logger } from '@/utils/logger';
import type { ConsumedLines } from './consumed-lines';
import { LineSide, type MoveCandidate } from './types';

const isMoved = (
  line: DiffLine,
  movedRemoved: ReadonlySet<number>,
  movedAdded: ReadonlySet<number>
): boolean =>
  (line.type === DiffLineType.REMOVED &&
    line.oldLineNumber !== undefined &&
    movedRemoved.has(line.oldLineNumber)) ||
  (line.type === DiffLineType.ADDED &&
    line.newLineNumber !== undefined &&
    movedAdded.has(line.newLineNumber));

/**
 * Drop moved lines from a hunk. What is left is split into contiguous hunks
 * around each dropped line, and pieces with nothing but context disappear.
 */
export const filterMovedLines = (
  hunk: DiffHunk,
  movedRemoved: ReadonlySet<number>,
  movedAdded: ReadonlySet<number>
): DiffHunk[] => {
  const { oldNext, newNext } = hunkOrigin(hunk);
  return splitLines(
    hunk.lines,
    oldNext,
    newNext,
    (line) => !isMoved(line, movedRemoved, movedAdded)
  );
};

type ChangedLines = { removed: Map<number, string>; added: Map<number, string> } | null;

/**
 * Changed lines keyed by line number per side, or null if a number repeats.
 */
const collectChanges = (
  hunks: readonly DiffHunk[],
  include: (line: DiffLine) => boolean = () => true
): ChangedLines => {
  const removed = new Map<number, string>();
  const added = new Map<number, string>();

  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (!include(line)) continue;

      if (line.type === DiffLineType.REMOVED && line.oldLineNumber !== undefined) {
        if (removed.has(line.oldLineNumber)) return null;
        removed.set(line.oldLineNumber, line.content);
      } else if (line.type === DiffLineType.ADDED && line.newLineNumber !== undefined) {
        if (added.has(line.newLineNumber)) return null;
        added.set(line.newLineNumber, line.content);
      }
    }
  }

  return { removed, added };
};

const sameEntries = (a: Map<number, string>, b: Map<number, string>): boolean =>
  a.size === b.size && [...a].every(([lineNumber, content]) => b.get(lineNumber) === content);

/**
 * Whether `hunks` change exactly the lines of `original` that no move
 * claimed, no more and no fewer, with the same contents.
 */
export const accountsForChanges = (
  original: FileDiff,
  hunks: readonly DiffHunk[],
  movedRemoved: ReadonlySet<number>,
  movedAdded: ReadonlySet<number>
): boolean => {
  const expected = collectChanges(
    original.hunks,
    (line) => !isMoved(line, movedRemoved, movedAdded)
  );
  const actual = collectChanges(hunks);

  return (
    expected !== null &&
    actual !== null &&
    sameEntries(expected.removed, actual.removed) &&
    sameEntries(expected.added, actual.added)
  );
};

const positionKey = (line: DiffLine): string =>
  `${line.type}:${line.oldLineNumber ?? ''}:${line.newLineNumber ?? ''}`;

/**
 * Re-diffed hunks know nothing of missing trailing newlines; copy the
 * marker from the original line at the same position.
 */
const carryNoNewlineMarkers = (original: FileDiff, hunks: readonly DiffHunk[]): DiffHunk[] => {
  const marked = new Set(
    original.hunks
      .flatMap((hunk) => hunk.lines)
      .filter((line) => line.noNewlineAtEnd)
      .map(positionKey)
  );
  if (marked.size === 0) return [...hunks];

  return hunks.map((hunk) => ({
    ...hunk,
    lines: hunk.lines.map((line) =>
      marked.has(positionKey(line)) ? { ...line, noNewlineAtEnd: true } : line
    ),
  }));
};

/**
 * The effective hunks of one file pair.
 *
 * Residual hunks from the re-differ are used when they account for every
 * non-moved change; otherwise the original hunks are split around the moved
 * lines, so part of a hunk overlapping a move never costs the rest of it.
 */
export const reconstructFileDiff = (
  original: FileDiff,
  residualHunks: readonly DiffHunk[] | null,
  consumed: ConsumedLines
): FileDiff => {
  const movedRemoved = consumed.linesIn(LineSide.REMOVED, original.oldPath);
  const movedAdded = consumed.linesIn(LineSide.ADDED, original.newPath);

  if (movedRemoved.size === 0 && movedAdded.size === 0) {
    return original;
  }

  if (
    residualHunks !== null &&
    accountsForChanges(original, residualHunks, movedRemoved, movedAdded)
  ) {
    return { ...original, hunks: carryNoNewlineMarkers(original, residualHunks) };
  }

  if (residualHunks !== null) {
    logger.debug(`Residual hunks for ${original.newPath} disagree with the diff; filtering lines`);
  }

  return {
    ...original,
    hunks: original.hunks.flatMap((hunk) => filterMovedLines(hunk, movedRemoved, movedAdded)),
  };
};

const compareFiles = (a: FileDiff, b: FileDiff): number => {
  if (a.newPath !== b.newPath) return a.newPath < b.newPath ? -1 : 1;
  if (a.oldPath !== b.oldPath) return a.oldPath < b.oldPath ? -1 : 1;
  return 0;
};

/**
 * Assemble the effective diff. Files in `failedFiles` keep their original
 * hunks; files that had hunks and have none left are dropped. Files come out
 * ordered by new path, then old path.
 */
export const reconstructEffectiveDiff = (
  original: GitDiff,
  residuals: ReadonlyMap<number, readonly DiffHunk[]>,
  failedFiles: ReadonlySet<number>,
  consumed: ConsumedLines
): GitDiff => {
  const files: FileDiff[] = [];

  original.files.forEach((file, fileIndex) => {
    if (failedFiles.has(fileIndex)) {
      files.push(file);
      return;
    }

    const effective = reconstructFileDiff(file, residuals.get(fileIndex) ?? null, consumed);
    if (file.hunks.length > 0 && effective.hunks.length === 0) {
      logger.debug(`Dropping ${file.newPath}: every change is part of a move`);
      return;
    }
    files.push(effective);
  });

  return { commitHash: original.commitHash, files: files.sort(compareFiles) };
};

const lineKey = (side: LineSide, filePath: string, lineNumber: number): string =>
  `${side}\u0000${filePath}\u0000${lineNumber}`;

const changedLineKeys = (gitDiff: GitDiff): Map<string, number> => {
  const keys = new Map<string, number>();
  const count = (key: string): void => {
    keys.set(key, (keys.get(key) ?? 0) + 1);
  };

  for (const file of gitDiff.files) {
    for (const hunk of file.hunks) {
      for (const line of hunk.lines) {
        if (line.type === DiffLineType.REMOVED && line.oldLineNumber !== undefined) {
          count(lineKey(LineSide.REMOVED, file.oldPath, line.oldLineNumber));
        } else if (line.type === DiffLineType.ADDED && line.newLineNumber !== undefined) {
          count(lineKey(LineSide.ADDED, file.newPath, line.newLineNumber));
        }
      }
    }
  }

  return keys;
};

/**
 * Every changed line of `original` must be either claimed by exactly one
 * candidate or present exactly once in `effective`, and `effective` may
 * contain nothing else.
 */
export const verifyLineAccounting = (
  original: GitDiff,
  effective: GitDiff,
  candidates: readonly MoveCandidate[]
): void => {
  const expected = changedLineKeys(original);
  const present = changedLineKeys(effective);
  const moved = new Map<string, number>();

  for (const candidate of candidates) {
    for (let offset = 0; offset < candidate.matchedLineCount; offset++) {
      const keys = [
        lineKey(LineSide.REMOVED, candidate.sourceFile, candidate.sourceLineRange.start + offset),
        lineKey(LineSide.ADDED, candidate.targetFile, candidate.targetLineRange.start + offset),
      ];
      for (const key of keys) moved.set(key, (moved.get(key) ?? 0) + 1);
    }
  }

  for (const [key, count] of expected) {
    const total = (present.get(key) ?? 0) + (moved.get(key) ?? 0);
    if (count !== 1 || total !== 1) {
      throw new EffectiveDiffException(
        `line accounting failed for ${key.split('\u0000').join(' ')}: ` +
          `${present.get(key) ?? 0} in effective diff, ${moved.get(key) ?? 0} in moves`
      );
    }
  }

  for (const key of [...present.keys(), ...moved.keys()]) {
    if (!expected.has(key)) {
      throw new EffectiveDiffException(
        `line accounting failed for ${key.split('\u0000').join(' ')}: not a change in the input`
      );
    }
  }
};
