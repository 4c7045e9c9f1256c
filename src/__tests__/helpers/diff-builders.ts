import { createHunk } from '@/core/diff/hunk-builder';
import {
  DiffLineType,
  FileChangeType,
  type DiffHunk,
  type DiffLine,
  type FileDiff,
  type GitDiff,
} from '@/core/diff/types';

/**
 * Build a hunk from unified-diff style lines (' ', '-' or '+' prefix),
 * numbering them from `oldNext` and `newNext`.
 */
export const hunkFrom = (oldNext: number, newNext: number, lines: readonly string[]): DiffHunk => {
  let oldLine = oldNext;
  let newLine = newNext;

  const diffLines: DiffLine[] = lines.map((raw) => {
    const content = raw.substring(1);
    switch (raw.charAt(0)) {
      case '-':
        return { type: DiffLineType.REMOVED, content, oldLineNumber: oldLine++ };
      case '+':
        return { type: DiffLineType.ADDED, content, newLineNumber: newLine++ };
      default:
        return {
          type: DiffLineType.CONTEXT,
          content,
          oldLineNumber: oldLine++,
          newLineNumber: newLine++,
        };
    }
  });

  return createHunk(diffLines, oldNext, newNext);
};

export const fileDiff = (
  path: string,
  hunks: DiffHunk[],
  type: FileChangeType = FileChangeType.MODIFIED,
  newPath: string = path
): FileDiff => ({ oldPath: path, newPath, type, hunks });

export const gitDiff = (...files: FileDiff[]): GitDiff => ({ commitHash: 'abc123', files });

export const toText = (lines: readonly string[]): string =>
  lines.length === 0 ? '' : lines.join('\n') + '\n';

export const range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, offset) => from + offset);

/**
 * A 30-line file whose lines 10-14 move down to 20-24 of the new revision,
 * with old line 21 (new line 16) edited along the way. The diff is one hunk
 * covering old and new lines 7-27.
 */
export const splitHunkScenario = (tag: string = 'v') => {
  const block = [
    `function ${tag}Moved() {`,
    `  const ${tag}Value = compute();`,
    `  log(${tag}Value);`,
    `  return ${tag}Value;`,
    `} // ${tag}Moved`,
  ];
  const filler = (n: number): string => `const ${tag}${n} = ${n};`;
  const edited = `const ${tag}21 = 210;`;

  const oldLines = range(1, 30).map((n) => (n >= 10 && n <= 14 ? block[n - 10] ?? '' : filler(n)));
  const newLines = [
    ...range(1, 9).map(filler),
    ...range(15, 24).map((n) => (n === 21 ? edited : filler(n))),
    ...block,
    ...range(25, 30).map(filler),
  ];

  const hunk = hunkFrom(7, 7, [
    ...range(7, 9).map((n) => ` ${filler(n)}`),
    ...block.map((line) => `-${line}`),
    ...range(15, 20).map((n) => ` ${filler(n)}`),
    `-${filler(21)}`,
    `+${edited}`,
    ...range(22, 24).map((n) => ` ${filler(n)}`),
    ...block.map((line) => `+${line}`),
    ...range(25, 27).map((n) => ` ${filler(n)}`),
  ]);

  return { block, filler, edited, oldLines, newLines, hunk };
};
