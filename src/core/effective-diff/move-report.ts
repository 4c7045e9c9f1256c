import { DiffLineType, type DiffHunk, type GitDiff } from '@/core/diff/types';
import { DEFAULT_OPTIONS } from './options';
import type { LineRange, MoveCandidate, MoveReport, MoveReportEntry, MoveSummary } from './types';

const compareEntries = (a: MoveReportEntry, b: MoveReportEntry): number => {
  if (a.sourceFile !== b.sourceFile) return a.sourceFile < b.sourceFile ? -1 : 1;
  if (a.sourceLineRange.start !== b.sourceLineRange.start) {
    return a.sourceLineRange.start - b.sourceLineRange.start;
  }
  if (a.targetFile !== b.targetFile) return a.targetFile < b.targetFile ? -1 : 1;
  return a.targetLineRange.start - b.targetLineRange.start;
};

const newSideRange = (hunk: DiffHunk): LineRange => ({
  start: hunk.newStart,
  end: hunk.newStart + Math.max(hunk.newCount - 1, 0),
});

const overlaps = (a: LineRange, b: LineRange): boolean => a.start <= b.end && b.start <= a.end;

/**
 * Added and removed lines of the effective-diff hunks in `targetFile` whose
 * new-side range comes within `proximity` lines of the move's target block.
 * A hunk counts whole once it reaches that window.
 */
export const countEffectiveLinesNearMove = (
  effectiveDiff: GitDiff,
  move: Pick<MoveCandidate, 'targetFile' | 'targetLineRange'>,
  proximity: number
): number => {
  const window = {
    start: move.targetLineRange.start - proximity,
    end: move.targetLineRange.end + proximity,
  };

  return effectiveDiff.files
    .filter((file) => file.newPath === move.targetFile)
    .flatMap((file) => file.hunks)
    .filter((hunk) => overlaps(newSideRange(hunk), window))
    .reduce(
      (sum, hunk) => sum + hunk.lines.filter((line) => line.type !== DiffLineType.CONTEXT).length,
      0
    );
};

/**
 * One entry per accepted move, ordered by source file and source start line.
 * `effectiveDiffLines` is measured against `effectiveDiff` within
 * `proximity` lines of the target block.
 */
export const buildMoveReport = (
  candidates: readonly MoveCandidate[],
  effectiveDiff: GitDiff,
  proximity: number = DEFAULT_OPTIONS.contextLines
): MoveReport =>
  candidates
    .map((candidate) => ({
      sourceFile: candidate.sourceFile,
      sourceLineRange: { ...candidate.sourceLineRange },
      targetFile: candidate.targetFile,
      targetLineRange: { ...candidate.targetLineRange },
      matchedLineCount: candidate.matchedLineCount,
      score: candidate.score,
      effectiveDiffLines: countEffectiveLinesNearMove(effectiveDiff, candidate, proximity),
    }))
    .sort(compareEntries);

export const summarizeMoves = (report: MoveReport): MoveSummary => ({
  movesDetected: report.length,
  totalLinesMoved: report.reduce((sum, entry) => sum + entry.matchedLineCount, 0),
  totalLinesEffectivelyChanged: report.reduce((sum, entry) => sum + entry.effectiveDiffLines, 0),
});
