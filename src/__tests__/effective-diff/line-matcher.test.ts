import { FileChangeType } from '@/core/diff/types';
import { extractTaggedLines } from '@/core/effective-diff/line-extractor';
import { buildAddedIndex, LineMatchIndex } from '@/core/effective-diff/line-matcher';
import { computeLineUniqueness, scoreBlock } from '@/core/effective-diff/move-scoring';
import { LineSide } from '@/core/effective-diff/types';
import { fileDiff, gitDiff, hunkFrom } from '../helpers/diff-builders';

const diff = gitDiff(
  fileDiff(
    'src/old-name.ts',
    [hunkFrom(3, 3, [' keep();', '-shared();', '-', '+changed();']), hunkFrom(10, 9, ['-shared();', ' tail();'])],
    FileChangeType.RENAMED,
    'src/new-name.ts'
  ),
  fileDiff('src/other.ts', [hunkFrom(1, 1, ['+shared();', '+', '+shared();'])])
);

describe('extractTaggedLines', () => {
  test('tags removed lines with the old path and added lines with the new one', () => {
    const { removed, added } = extractTaggedLines(diff);

    expect(removed.map((line) => [line.filePath, line.lineNumber, line.content])).toEqual([
      ['src/old-name.ts', 4, 'shared();'],
      ['src/old-name.ts', 5, ''],
      ['src/old-name.ts', 10, 'shared();'],
    ]);
    expect(added.map((line) => [line.filePath, line.lineNumber, line.content])).toEqual([
      ['src/new-name.ts', 4, 'changed();'],
      ['src/other.ts', 1, 'shared();'],
      ['src/other.ts', 2, ''],
      ['src/other.ts', 3, 'shared();'],
    ]);
  });

  test('records file and hunk indices', () => {
    const { removed, added } = extractTaggedLines(diff);

    expect(removed[2]).toMatchObject({ side: LineSide.REMOVED, fileIndex: 0, hunkIndex: 1 });
    expect(added[1]).toMatchObject({ side: LineSide.ADDED, fileIndex: 1, hunkIndex: 0 });
  });
});

describe('LineMatchIndex', () => {
  const { removed, added } = extractTaggedLines(diff);
  const index = new LineMatchIndex(removed, added);

  test('pairs every removed line with every identical added line', () => {
    expect(
      Array.from(
        index.matches(),
        ({ removed: from, added: to }) => `${from.lineNumber}->${to.filePath}:${to.lineNumber}`
      )
    ).toEqual([
      '4->src/other.ts:1',
      '4->src/other.ts:3',
      '5->src/other.ts:2',
      '10->src/other.ts:1',
      '10->src/other.ts:3',
    ]);
  });

  test('counts pairs without listing them', () => {
    expect(index.matchCount).toBe(5);
  });

  test('counts added occurrences per content', () => {
    expect(index.addedFrequency('shared();')).toBe(2);
    expect(index.addedFrequency('changed();')).toBe(1);
    expect(index.addedFrequency('missing();')).toBe(0);
  });

  test('looks lines up by position', () => {
    expect(index.removedAt('src/old-name.ts', 10)?.content).toBe('shared();');
    expect(index.addedAt('src/other.ts', 2)?.content).toBe('');
    expect(index.addedAt('src/new-name.ts', 5)).toBeUndefined();
  });

  test('keeps added positions in extraction order', () => {
    const byContent = buildAddedIndex(added);

    expect(byContent.get('shared();')?.map((line) => line.lineNumber)).toEqual([1, 3]);
  });
});

describe('move scoring', () => {
  const { removed, added } = extractTaggedLines(diff);
  const index = new LineMatchIndex(removed, added);

  test('averages inverse added frequency', () => {
    expect(computeLineUniqueness(['shared();', 'changed();'], index)).toBeCloseTo(0.75);
    expect(computeLineUniqueness([], index)).toBe(0);
  });

  test('treats content that was never added as unique', () => {
    expect(computeLineUniqueness(['missing();'], index)).toBe(1);
  });

  test('grows with the number of matched lines', () => {
    const uniqueness = 0.4;
    const scores = [3, 4, 5, 10].map((count) => scoreBlock(count, uniqueness));

    scores.slice(1).forEach((score, offset) => {
      expect(score).toBeGreaterThan(scores[offset] ?? Infinity);
    });
  });
});
