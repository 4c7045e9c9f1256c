import { DiffLineType, FileChangeType, type DiffHunk, type FileDiff, type GitDiff } from './types';

const LINE_PREFIX: Record<DiffLineType, string> = {
  [DiffLineType.CONTEXT]: ' ',
  [DiffLineType.ADDED]: '+',
  [DiffLineType.REMOVED]: '-',
};

export const NO_NEWLINE_MARKER = '\\ No newline at end of file';

const formatRange = (start: number, count: number): string =>
  count === 1 ? `${start}` : `${start},${count}`;

export const formatHunkHeader = (hunk: DiffHunk): string =>
  `@@ -${formatRange(hunk.oldStart, hunk.oldCount)} +${formatRange(hunk.newStart, hunk.newCount)} @@`;

const formatFileHeader = (file: FileDiff): string[] => {
  const header = [`diff --git a/${file.oldPath} b/${file.newPath}`];

  switch (file.type) {
    case FileChangeType.ADDED:
      header.push('new file mode 100644', '--- /dev/null', `+++ b/${file.newPath}`);
      break;
    case FileChangeType.DELETED:
      header.push('deleted file mode 100644', `--- a/${file.oldPath}`, '+++ /dev/null');
      break;
    case FileChangeType.RENAMED:
      header.push(
        `rename from ${file.oldPath}`,
        `rename to ${file.newPath}`,
        `--- a/${file.oldPath}`,
        `+++ b/${file.newPath}`
      );
      break;
    default:
      header.push(`--- a/${file.oldPath}`, `+++ b/${file.newPath}`);
  }

  return header;
};

export const formatFileDiff = (file: FileDiff): string => {
  const output = formatFileHeader(file);

  for (const hunk of file.hunks) {
    output.push(formatHunkHeader(hunk));
    hunk.lines.forEach((line) => {
      output.push(`${LINE_PREFIX[line.type]}${line.content}`);
      if (line.noNewlineAtEnd) output.push(NO_NEWLINE_MARKER);
    });
  }

  return output.join('\n') + '\n';
};

/**
 * Render a diff back to unified text, one `diff --git` section per file.
 */
export const formatUnifiedDiff = (gitDiff: GitDiff): string =>
  gitDiff.files.map(formatFileDiff).join('');
