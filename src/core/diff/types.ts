/**
 * Core diff types and interfaces
 */

export interface DiffOptions {
  contextLines?: number; // Number of context lines (default: 3)
  ignoreWhitespace?: boolean;
  ignoreCase?: boolean;
}

export enum DiffOperation {
  EQUAL = 'equal',
  INSERT = 'insert',
  DELETE = 'delete',
}

export interface DiffEdit {
  operation: DiffOperation;
  lines: string[];
  oldIndex: number;
  newIndex: number;
}

export enum DiffLineType {
  CONTEXT = 'context', // ' '
  ADDED = 'added', // '+'
  REMOVED = 'removed', // '-'
}

/**
 * A single line of a hunk. Context lines carry both line numbers,
 * removed lines only the old one, added lines only the new one.
 */
export interface DiffLine {
  readonly type: DiffLineType;
  readonly content: string;
  readonly oldLineNumber?: number;
  readonly newLineNumber?: number;
  /** Last line of its side, without a trailing newline. */
  readonly noNewlineAtEnd?: boolean;
}

export interface DiffHunk {
  readonly oldStart: number;
  readonly oldCount: number;
  readonly newStart: number;
  readonly newCount: number;
  readonly lines: readonly DiffLine[];
}

export enum FileChangeType {
  ADDED = 'added',
  DELETED = 'deleted',
  MODIFIED = 'modified',
  RENAMED = 'renamed',
}

/**
 * One changed file pair. Added and deleted files name the existing
 * file in both paths; only renames carry two different paths.
 */
export interface FileDiff {
  readonly oldPath: string;
  readonly newPath: string;
  readonly type: FileChangeType;
  readonly hunks: readonly DiffHunk[];
}

export interface GitDiff {
  readonly commitHash: string;
  readonly files: readonly FileDiff[];
}

export interface DiffStatistics {
  filesChanged: number;
  insertions: number;
  deletions: number;
}

export const isChangedLine = (line: DiffLine): boolean =>
  line.type === DiffLineType.ADDED || line.type === DiffLineType.REMOVED;
