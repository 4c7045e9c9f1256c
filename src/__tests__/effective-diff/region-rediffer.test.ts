import { DiffLineType } from '@/core/diff/types';
import { RediffException } from '@/core/exceptions';
import { ConsumedLines } from '@/core/effective-diff/consumed-lines';
import {
  buildResidualRegions,
  computeRegionSpans,
  rediffFilePair,
  remapResidualHunks,
} from '@/core/effective-diff/region-rediffer';
import { createRediffer, MyersRediffer } from '@/core/effective-diff/rediffer';
import { LineSide } from '@/core/effective-diff/types';
import { fileDiff, hunkFrom, range, splitHunkScenario, toText } from '../helpers/diff-builders';

describe('computeRegionSpans', () => {
  const hunks = [hunkFrom(5, 5, ['-a']), hunkFrom(12, 11, ['+b'])];

  test('merges spans whose padding touches', () => {
    expect(computeRegionSpans(hunks, 20, 20, 3)).toEqual([
      { oldFrom: 2, oldTo: 14, newFrom: 2, newTo: 14 },
    ]);
  });

  test('keeps spans apart when the padding leaves a gap', () => {
    expect(computeRegionSpans(hunks, 20, 20, 2)).toEqual([
      { oldFrom: 3, oldTo: 7, newFrom: 3, newTo: 6 },
      { oldFrom: 10, oldTo: 13, newFrom: 9, newTo: 13 },
    ]);
  });

  test('clamps to the file bounds', () => {
    expect(computeRegionSpans([hunkFrom(1, 1, ['-a', '+b'])], 2, 1, 3)).toEqual([
      { oldFrom: 1, oldTo: 2, newFrom: 1, newTo: 1 },
    ]);
  });
});

describe('residual regions', () => {
  const scenario = splitHunkScenario();
  const diff = fileDiff('src/app.ts', [scenario.hunk]);
  const consumed = new ConsumedLines();
  consumed.consumeRange(LineSide.REMOVED, 'src/app.ts', { start: 10, end: 14 });
  consumed.consumeRange(LineSide.ADDED, 'src/app.ts', { start: 20, end: 24 });

  test('takes moved lines out of the padded window', () => {
    const [region, ...rest] = buildResidualRegions(
      diff,
      scenario.oldLines,
      scenario.newLines,
      consumed,
      3
    );

    expect(rest).toEqual([]);
    expect(region?.oldLineMap).toEqual([...range(4, 9), ...range(15, 30)]);
    expect(region?.newLineMap).toEqual([...range(4, 19), ...range(25, 30)]);
    expect(region?.oldText).toBe(toText([...range(4, 9), ...range(15, 30)].map(scenario.filler)));
  });

  test('re-diffs the residual and maps hunks back to file lines', async () => {
    const hunks = await rediffFilePair(
      diff,
      toText(scenario.oldLines),
      toText(scenario.newLines),
      consumed,
      new MyersRediffer(),
      { contextLines: 3 }
    );

    expect(hunks).toHaveLength(1);
    expect(hunks[0]).toMatchObject({ oldStart: 18, oldCount: 7, newStart: 13, newCount: 7 });
    expect(hunks[0]?.lines[3]).toEqual({
      type: DiffLineType.REMOVED,
      content: scenario.filler(21),
      oldLineNumber: 21,
      newLineNumber: undefined,
    });
  });

  test('rejects hunks that fall outside the residual', async () => {
    const outOfRange = createRediffer(() => [hunkFrom(30, 30, ['-x'])]);

    await expect(
      rediffFilePair(
        diff,
        toText(scenario.oldLines),
        toText(scenario.newLines),
        consumed,
        outOfRange,
        { contextLines: 3 }
      )
    ).rejects.toThrow('rediff returned old line 30, outside the 22-line residual');
  });

  test('wraps rediffer errors with the file path', async () => {
    const failing = createRediffer(async () => {
      throw new Error('timeout');
    });

    await expect(
      rediffFilePair(
        diff,
        toText(scenario.oldLines),
        toText(scenario.newLines),
        consumed,
        failing,
        { contextLines: 3 }
      )
    ).rejects.toThrow(new RediffException("rediff failed for 'src/app.ts': timeout", 'src/app.ts'));
  });
});

describe('remapResidualHunks', () => {
  const region = {
    oldFrom: 1,
    oldTo: 6,
    newFrom: 1,
    newTo: 4,
    oldLineMap: [1, 2, 5, 6],
    newLineMap: [1, 2, 3, 4],
    oldText: '',
    newText: '',
  };

  test('splits a hunk where the old numbering skips moved lines', () => {
    const hunks = remapResidualHunks(
      region,
      [hunkFrom(1, 1, [' a', '-b', '-e', ' f'])],
      'x.ts'
    );

    expect(
      hunks.map(({ oldStart, oldCount, newStart, newCount }) => [oldStart, oldCount, newStart, newCount])
    ).toEqual([
      [1, 2, 1, 1],
      [5, 2, 2, 1],
    ]);
  });
});
