import { DiffLineType, FileChangeType, type DiffStatistics, type GitDiff } from './types';

/**
 * Count changed files, insertions and deletions. A pure rename with no hunks
 * does not count as a changed file.
 */
export const computeStatistics = (gitDiff: GitDiff): DiffStatistics => {
  let filesChanged = 0;
  let insertions = 0;
  let deletions = 0;

  for (const fileDiff of gitDiff.files) {
    if (fileDiff.type !== FileChangeType.RENAMED || fileDiff.hunks.length > 0) {
      filesChanged++;
    }

    for (const hunk of fileDiff.hunks) {
      hunk.lines.forEach((line) => {
        switch (line.type) {
          case DiffLineType.ADDED:
            insertions++;
            break;
          case DiffLineType.REMOVED:
            deletions++;
            break;
        }
      });
    }
  }

  return { filesChanged, insertions, deletions };
};
