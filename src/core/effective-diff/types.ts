import type { GitDiff } from '@/core/diff/types';

export enum LineSide {
  REMOVED = 'removed',
  ADDED = 'added',
}

/**
 * A removed or added diff line together with where it lives. Removed lines
 * are numbered in the old file, added lines in the new one.
 */
export interface TaggedLine {
  readonly side: LineSide;
  readonly filePath: string;
  readonly lineNumber: number;
  readonly content: string;
  readonly fileIndex: number;
  readonly hunkIndex: number;
}

export interface LineMatch {
  readonly removed: TaggedLine;
  readonly added: TaggedLine;
}

/** Inclusive, 1-based. */
export interface LineRange {
  readonly start: number;
  readonly end: number;
}

export interface MoveCandidate {
  readonly sourceFile: string;
  readonly sourceLineRange: LineRange;
  readonly targetFile: string;
  readonly targetLineRange: LineRange;
  readonly matchedLineCount: number;
  readonly score: number;
}

export interface MoveReportEntry extends MoveCandidate {
  /** Changed lines left in the effective diff near the target block. */
  readonly effectiveDiffLines: number;
}

/** Entries sorted by source file, then source start line. */
export type MoveReport = readonly MoveReportEntry[];

export interface MoveSummary {
  movesDetected: number;
  totalLinesMoved: number;
  totalLinesEffectivelyChanged: number;
}

export type FailureScope = 'file' | 'pipeline';

export interface PipelineFailure {
  readonly scope: FailureScope;
  readonly path?: string;
  readonly message: string;
}

export interface EffectiveDiffPipelineResult {
  readonly effectiveDiff: GitDiff;
  readonly moveReport: MoveReport;
  readonly failures: readonly PipelineFailure[];
}
