import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { classifyLines, LineClassification } from '@/core/effective-diff/line-classifier';
import {
  buildMoveReport,
  countEffectiveLinesNearMove,
  summarizeMoves,
} from '@/core/effective-diff/move-report';
import {
  ARTIFACT_FILES,
  serializeMoveReport,
  writeArtifacts,
} from '@/core/effective-diff/serialization';
import type { MoveCandidate } from '@/core/effective-diff/types';
import { fileDiff, gitDiff, hunkFrom } from '../helpers/diff-builders';

const move = (
  sourceFile: string,
  sourceStart: number,
  targetFile: string,
  targetStart: number,
  length: number
): MoveCandidate => ({
  sourceFile,
  sourceLineRange: { start: sourceStart, end: sourceStart + length - 1 },
  targetFile,
  targetLineRange: { start: targetStart, end: targetStart + length - 1 },
  matchedLineCount: length,
  score: length,
});

describe('buildMoveReport', () => {
  test('orders entries by source file and line', () => {
    const report = buildMoveReport(
      [move('b.ts', 1, 'c.ts', 1, 3), move('a.ts', 20, 'c.ts', 10, 3), move('a.ts', 5, 'd.ts', 1, 4)],
      gitDiff()
    );

    expect(report.map((entry) => `${entry.sourceFile}:${entry.sourceLineRange.start}`)).toEqual([
      'a.ts:5',
      'a.ts:20',
      'b.ts:1',
    ]);
  });

  test('copies the candidates it is given', () => {
    const candidate = move('a.ts', 1, 'b.ts', 1, 3);
    const [entry] = buildMoveReport([candidate], gitDiff());

    expect(entry).toEqual({ ...candidate, effectiveDiffLines: 0 });
    expect(entry?.sourceLineRange).not.toBe(candidate.sourceLineRange);
  });

  describe('effectiveDiffLines', () => {
    const effective = gitDiff(
      fileDiff('b.ts', [
        hunkFrom(14, 14, ['-near();', '+nearer();']),
        hunkFrom(40, 40, [' keep();', '-far();', '+farther();']),
      ]),
      fileDiff('c.ts', [hunkFrom(11, 11, ['-other();', '+another();'])])
    );
    const moved = move('a.ts', 1, 'b.ts', 10, 3);

    test('counts changes of the target file close to the target block', () => {
      const [entry] = buildMoveReport([moved], effective);

      expect(entry?.effectiveDiffLines).toBe(2);
    });

    test('narrows with the proximity', () => {
      expect(countEffectiveLinesNearMove(effective, moved, 0)).toBe(0);
      expect(countEffectiveLinesNearMove(effective, moved, 2)).toBe(2);
      expect(countEffectiveLinesNearMove(effective, moved, 30)).toBe(4);
    });
  });
});

describe('summarizeMoves', () => {
  test('totals moved lines and the changes near each move', () => {
    const effective = gitDiff(
      fileDiff('b.ts', [hunkFrom(5, 5, ['-x', '+y'])]),
      fileDiff('d.ts', [hunkFrom(90, 90, ['-far', '+away'])])
    );
    const report = buildMoveReport(
      [move('a.ts', 1, 'b.ts', 1, 3), move('a.ts', 10, 'c.ts', 1, 4)],
      effective
    );

    expect(report.map((entry) => entry.effectiveDiffLines)).toEqual([2, 0]);
    expect(summarizeMoves(report)).toEqual({
      movesDetected: 2,
      totalLinesMoved: 7,
      totalLinesEffectivelyChanged: 2,
    });
  });

  test('reports zeros for an empty run', () => {
    expect(summarizeMoves([])).toEqual({
      movesDetected: 0,
      totalLinesMoved: 0,
      totalLinesEffectivelyChanged: 0,
    });
  });
});

describe('classifyLines', () => {
  test('labels move sources, move targets and plain changes', () => {
    const diff = gitDiff(
      fileDiff('a.ts', [hunkFrom(1, 1, ['-m1();', '-m2();', '-m3();', ' k', '-x', '+y'])]),
      fileDiff('b.ts', [hunkFrom(1, 1, ['+m1();', '+m2();', '+m3();'])])
    );

    const files = classifyLines(diff, [move('a.ts', 1, 'b.ts', 1, 3)]);

    expect(
      files.map((file) => file.hunks.flatMap((hunk) => hunk.lines.map((line) => line.classification)))
    ).toEqual([
      [
        LineClassification.MOVED_REMOVAL,
        LineClassification.MOVED_REMOVAL,
        LineClassification.MOVED_REMOVAL,
        LineClassification.CONTEXT,
        LineClassification.REMOVED,
        LineClassification.ADDED,
      ],
      [LineClassification.MOVED, LineClassification.MOVED, LineClassification.MOVED],
    ]);
  });
});

describe('artifacts', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'effdiff-artifacts-'));
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  test('serializes the move report with its summary', () => {
    const report = buildMoveReport([move('a.ts', 1, 'b.ts', 1, 3)], gitDiff());

    expect(JSON.parse(serializeMoveReport(report))).toEqual({
      movesDetected: 1,
      totalLinesMoved: 3,
      totalLinesEffectivelyChanged: 0,
      moves: [
        {
          sourceFile: 'a.ts',
          sourceLineRange: { start: 1, end: 3 },
          targetFile: 'b.ts',
          targetLineRange: { start: 1, end: 3 },
          matchedLineCount: 3,
          score: 3,
          effectiveDiffLines: 0,
        },
      ],
    });
  });

  test('writes all three files into a new directory', async () => {
    const outputDir = path.join(tmp, 'out');
    const effectiveDiff = gitDiff(fileDiff('a.ts', [hunkFrom(1, 1, ['-x', '+y'])]));

    const written = await writeArtifacts(outputDir, {
      effectiveDiff,
      moveReport: [],
      failures: [],
    });

    expect(written).toEqual([
      path.join(outputDir, ARTIFACT_FILES.effectiveDiff),
      path.join(outputDir, ARTIFACT_FILES.effectivePatch),
      path.join(outputDir, ARTIFACT_FILES.moves),
    ]);
    expect(await fs.readJson(path.join(outputDir, ARTIFACT_FILES.effectiveDiff))).toEqual(
      JSON.parse(JSON.stringify(effectiveDiff))
    );
    expect(await fs.readFile(path.join(outputDir, ARTIFACT_FILES.effectivePatch), 'utf8')).toBe(
      'diff --git a/a.ts b/a.ts\n--- a/a.ts\n+++ b/a.ts\n@@ -1 +1 @@\n-x\n+y\n'
    );
  });
});
