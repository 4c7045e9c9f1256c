import { DiffParseException } from '@/core/exceptions';
import {
  DiffLineType,
  FileChangeType,
  type DiffHunk,
  type DiffLine,
  type FileDiff,
  type GitDiff,
} from './types';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const DIFF_GIT_HEADER = /^diff --git a\/(.+) b\/(.+)$/;
const NULL_PATH = '/dev/null';

interface PendingFile {
  oldPath: string | null;
  newPath: string | null;
  type: FileChangeType;
  hunks: DiffHunk[];
}

interface PendingHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: DiffLine[];
  oldNext: number;
  newNext: number;
  oldRemaining: number;
  newRemaining: number;
  headerLine: number;
}

/**
 * A `\` marker applies to the line printed just before it.
 */
const markNoNewline = (pending: PendingHunk): void => {
  const index = pending.lines.length - 1;
  const last = pending.lines[index];
  if (last) pending.lines[index] = { ...last, noNewlineAtEnd: true };
};

const stripPrefix = (path: string): string | null => {
  const trimmed = path.split('\t')[0]?.trim() ?? '';
  if (trimmed === NULL_PATH) return null;
  return trimmed.replace(/^[ab]\//, '');
};

/**
 * Parse unified diff text (as printed by `git diff`) into structured form.
 *
 * Hunk bodies are consumed by their header counts, so a removed line that
 * happens to start with `-- ` is never mistaken for a file header.
 */
export const parseUnifiedDiff = (diffText: string, commitHash: string = ''): GitDiff => {
  const files: FileDiff[] = [];
  let file: PendingFile | null = null;
  let hunk: PendingHunk | null = null;

  const closeHunk = (lineNumber: number): void => {
    if (!hunk) return;
    if (hunk.oldRemaining > 0 || hunk.newRemaining > 0) {
      throw new DiffParseException(
        `hunk starting at line ${hunk.headerLine} is shorter than its header says`,
        lineNumber
      );
    }
    file?.hunks.push({
      oldStart: hunk.oldStart,
      oldCount: hunk.oldCount,
      newStart: hunk.newStart,
      newCount: hunk.newCount,
      lines: hunk.lines,
    });
    hunk = null;
  };

  const closeFile = (lineNumber: number): void => {
    closeHunk(lineNumber);
    if (!file) return;

    const oldPath = file.oldPath ?? file.newPath;
    const newPath = file.newPath ?? file.oldPath;
    if (oldPath === null || newPath === null) {
      throw new DiffParseException('file header names no path', lineNumber);
    }

    files.push({ oldPath, newPath, type: file.type, hunks: file.hunks });
    file = null;
  };

  const openFile = (): PendingFile => ({
    oldPath: null,
    newPath: null,
    type: FileChangeType.MODIFIED,
    hunks: [],
  });

  const lines = diffText.split('\n');
  if (diffText.endsWith('\n')) lines.pop();

  lines.forEach((raw, index) => {
    const lineNumber = index + 1;

    if (hunk && (hunk.oldRemaining > 0 || hunk.newRemaining > 0)) {
      const marker = raw.charAt(0);
      const content = raw.substring(1);

      if (marker === '\\') {
        markNoNewline(hunk);
        return;
      }

      if (marker === '+' && hunk.newRemaining > 0) {
        hunk.lines.push({ type: DiffLineType.ADDED, content, newLineNumber: hunk.newNext++ });
        hunk.newRemaining--;
        return;
      }

      if (marker === '-' && hunk.oldRemaining > 0) {
        hunk.lines.push({ type: DiffLineType.REMOVED, content, oldLineNumber: hunk.oldNext++ });
        hunk.oldRemaining--;
        return;
      }

      // Some tools strip the single space of an empty context line
      if ((marker === ' ' || raw === '') && hunk.oldRemaining > 0 && hunk.newRemaining > 0) {
        hunk.lines.push({
          type: DiffLineType.CONTEXT,
          content,
          oldLineNumber: hunk.oldNext++,
          newLineNumber: hunk.newNext++,
        });
        hunk.oldRemaining--;
        hunk.newRemaining--;
        return;
      }

      throw new DiffParseException(`unexpected line inside hunk: '${raw}'`, lineNumber);
    }

    if (raw.startsWith('\\')) {
      if (hunk) markNoNewline(hunk);
      return;
    }

    const gitHeader = raw.match(DIFF_GIT_HEADER);
    if (gitHeader) {
      closeFile(lineNumber);
      file = openFile();
      file.oldPath = gitHeader[1] ?? null;
      file.newPath = gitHeader[2] ?? null;
      return;
    }

    if (raw.startsWith('--- ')) {
      if (!file || file.hunks.length > 0 || hunk) {
        closeFile(lineNumber);
        file = openFile();
      }
      const path = stripPrefix(raw.substring(4));
      if (path === null) {
        file.type = FileChangeType.ADDED;
      }
      file.oldPath = path ?? file.oldPath;
      return;
    }

    if (raw.startsWith('+++ ')) {
      if (!file) {
        throw new DiffParseException("'+++' header without a preceding '---'", lineNumber);
      }
      const path = stripPrefix(raw.substring(4));
      if (path === null) {
        file.type = FileChangeType.DELETED;
      }
      file.newPath = path ?? file.newPath;
      return;
    }

    if (file && raw.startsWith('new file mode')) {
      file.type = FileChangeType.ADDED;
      return;
    }

    if (file && raw.startsWith('deleted file mode')) {
      file.type = FileChangeType.DELETED;
      return;
    }

    if (file && raw.startsWith('rename from ')) {
      file.type = FileChangeType.RENAMED;
      file.oldPath = raw.substring('rename from '.length);
      return;
    }

    if (file && raw.startsWith('rename to ')) {
      file.type = FileChangeType.RENAMED;
      file.newPath = raw.substring('rename to '.length);
      return;
    }

    if (raw.startsWith('@@')) {
      if (!file) {
        throw new DiffParseException('hunk header outside of a file', lineNumber);
      }
      closeHunk(lineNumber);

      const match = raw.match(HUNK_HEADER);
      if (!match) {
        throw new DiffParseException(`malformed hunk header '${raw}'`, lineNumber);
      }

      const oldStart = parseInt(match[1] ?? '0', 10);
      const oldCount = match[2] === undefined ? 1 : parseInt(match[2], 10);
      const newStart = parseInt(match[3] ?? '0', 10);
      const newCount = match[4] === undefined ? 1 : parseInt(match[4], 10);

      hunk = {
        oldStart,
        oldCount,
        newStart,
        newCount,
        lines: [],
        oldNext: oldCount > 0 ? oldStart : oldStart + 1,
        newNext: newCount > 0 ? newStart : newStart + 1,
        oldRemaining: oldCount,
        newRemaining: newCount,
        headerLine: lineNumber,
      };
      return;
    }

    // index, mode, similarity and binary lines carry nothing we model
  });

  closeFile(lines.length + 1);

  return { commitHash, files };
};
