import { DiffLineType, type GitDiff } from '@/core/diff/types';
import { LineSide, type TaggedLine } from './types';

export interface ExtractedLines {
  removed: TaggedLine[];
  added: TaggedLine[];
}

/**
 * Pull every removed and added line out of the diff, in file, hunk and
 * line order. Removed lines are tagged with the old path, added lines with
 * the new one.
 */
export const extractTaggedLines = (gitDiff: GitDiff): ExtractedLines => {
  const removed: TaggedLine[] = [];
  const added: TaggedLine[] = [];

  gitDiff.files.forEach((file, fileIndex) => {
    file.hunks.forEach((hunk, hunkIndex) => {
      for (const line of hunk.lines) {
        if (line.type === DiffLineType.REMOVED && line.oldLineNumber !== undefined) {
          removed.push({
            side: LineSide.REMOVED,
            filePath: file.oldPath,
            lineNumber: line.oldLineNumber,
            content: line.content,
            fileIndex,
            hunkIndex,
          });
        } else if (line.type === DiffLineType.ADDED && line.newLineNumber !== undefined) {
          added.push({
            side: LineSide.ADDED,
            filePath: file.newPath,
            lineNumber: line.newLineNumber,
            content: line.content,
            fileIndex,
            hunkIndex,
          });
        }
      }
    });
  });

  return { removed, added };
};
