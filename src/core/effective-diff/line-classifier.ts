import { DiffLineType, type DiffHunk, type DiffLine, type GitDiff } from '@/core/diff/types';
import { ConsumedLines } from './consumed-lines';
import { LineSide, type MoveCandidate } from './types';

export enum LineClassification {
  /** Added line that is the target of a move. */
  MOVED = 'moved',
  /** Removed line that is the source of a move. */
  MOVED_REMOVAL = 'movedRemoval',
  ADDED = 'added',
  REMOVED = 'removed',
  CONTEXT = 'context',
}

export interface ClassifiedLine {
  readonly line: DiffLine;
  readonly classification: LineClassification;
}

export interface ClassifiedHunk {
  readonly hunk: DiffHunk;
  readonly lines: readonly ClassifiedLine[];
}

export interface ClassifiedFile {
  readonly oldPath: string;
  readonly newPath: string;
  readonly hunks: readonly ClassifiedHunk[];
}

const classify = (
  line: DiffLine,
  oldPath: string,
  newPath: string,
  consumed: ConsumedLines
): LineClassification => {
  switch (line.type) {
    case DiffLineType.ADDED:
      return line.newLineNumber !== undefined &&
        consumed.has(LineSide.ADDED, newPath, line.newLineNumber)
        ? LineClassification.MOVED
        : LineClassification.ADDED;
    case DiffLineType.REMOVED:
      return line.oldLineNumber !== undefined &&
        consumed.has(LineSide.REMOVED, oldPath, line.oldLineNumber)
        ? LineClassification.MOVED_REMOVAL
        : LineClassification.REMOVED;
    default:
      return LineClassification.CONTEXT;
  }
};

/**
 * Label every line of the original diff for display, given the accepted
 * moves.
 */
export const classifyLines = (
  gitDiff: GitDiff,
  candidates: readonly MoveCandidate[]
): ClassifiedFile[] => {
  const consumed = ConsumedLines.fromCandidates(candidates);

  return gitDiff.files.map((file) => ({
    oldPath: file.oldPath,
    newPath: file.newPath,
    hunks: file.hunks.map((hunk) => ({
      hunk,
      lines: hunk.lines.map((line) => ({
        line,
        classification: classify(line, file.oldPath, file.newPath, consumed),
      })),
    })),
  }));
};
