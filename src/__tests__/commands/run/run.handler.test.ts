import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { annotatePatch } from '@/commands/annotate/annotate.handler';
import { toJsonOutput } from '@/commands/run/run.display';
import { loadDiff, runEffectiveDiff } from '@/commands/run/run.handler';
import { formatUnifiedDiff } from '@/core/diff/unified-diff-writer';
import { LineClassification } from '@/core/effective-diff/line-classifier';
import { ARTIFACT_FILES } from '@/core/effective-diff/serialization';
import { fileDiff, gitDiff, splitHunkScenario, toText } from '../../helpers/diff-builders';

describe('run handler', () => {
  const scenario = splitHunkScenario();
  let tmp: string;
  let patchPath: string;
  let oldDir: string;
  let newDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'effdiff-run-'));
    patchPath = path.join(tmp, 'change.diff');
    oldDir = path.join(tmp, 'old');
    newDir = path.join(tmp, 'new');
    configPath = path.join(tmp, 'config.json');

    await fs.outputFile(patchPath, formatUnifiedDiff(gitDiff(fileDiff('src/app.ts', [scenario.hunk]))));
    await fs.outputFile(path.join(oldDir, 'src', 'app.ts'), toText(scenario.oldLines));
    await fs.outputFile(path.join(newDir, 'src', 'app.ts'), toText(scenario.newLines));
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  describe('loadDiff', () => {
    test('parses the patch file', async () => {
      const diff = await loadDiff(patchPath, 'feedbeef');

      expect(diff.commitHash).toBe('feedbeef');
      expect(diff.files[0]?.hunks).toEqual([scenario.hunk]);
    });

    test('fails for a missing patch', async () => {
      await expect(loadDiff(path.join(tmp, 'missing.diff'))).rejects.toThrow(
        `no patch content for '${path.join(tmp, 'missing.diff')}'`
      );
    });
  });

  describe('runEffectiveDiff', () => {
    test('detects the move between the two checkouts', async () => {
      const outcome = await runEffectiveDiff(patchPath, { oldDir, newDir, configPath });

      expect(outcome.result.failures).toEqual([]);
      expect(outcome.summary).toEqual({
        movesDetected: 1,
        totalLinesMoved: 5,
        totalLinesEffectivelyChanged: 2,
      });
      expect(outcome.artifacts).toEqual([]);
    });

    test('applies option overrides on top of the config file', async () => {
      await fs.writeJson(configPath, { options: { minBlockSize: 4 } });

      const outcome = await runEffectiveDiff(patchPath, {
        oldDir,
        newDir,
        configPath,
        overrides: { minBlockSize: 6 },
      });

      expect(outcome.config.options.minBlockSize).toBe(4);
      expect(outcome.result.moveReport).toEqual([]);
      expect(outcome.result.effectiveDiff).toBe(outcome.gitDiff);
    });

    test('writes artifacts into the output directory', async () => {
      const output = path.join(tmp, 'out');

      const outcome = await runEffectiveDiff(patchPath, { oldDir, newDir, configPath, output });

      expect(outcome.artifacts).toEqual([
        path.join(output, ARTIFACT_FILES.effectiveDiff),
        path.join(output, ARTIFACT_FILES.effectivePatch),
        path.join(output, ARTIFACT_FILES.moves),
      ]);
      const moves = await fs.readJson(path.join(output, ARTIFACT_FILES.moves));
      expect(moves.movesDetected).toBe(1);
    });

    test('fails when a checkout is missing', async () => {
      const missing = path.join(tmp, 'nowhere');

      await expect(runEffectiveDiff(patchPath, { oldDir: missing, newDir, configPath })).rejects.toThrow(
        `directory ${missing} does not exist`
      );
    });

    test('prints JSON with the move summary', async () => {
      const outcome = await runEffectiveDiff(patchPath, { oldDir, newDir, configPath });

      const json = JSON.parse(toJsonOutput(outcome));

      expect(json.moveReport.movesDetected).toBe(1);
      expect(json.moveReport.moves[0].sourceLineRange).toEqual({ start: 10, end: 14 });
      expect(json.failures).toEqual([]);
    });
  });

  describe('annotatePatch', () => {
    test('labels moved and edited lines', async () => {
      const { files } = await annotatePatch(patchPath, { oldDir, newDir, configPath });

      const counts = new Map<LineClassification, number>();
      for (const line of files[0]?.hunks[0]?.lines ?? []) {
        counts.set(line.classification, (counts.get(line.classification) ?? 0) + 1);
      }

      expect(Object.fromEntries(counts)).toEqual({
        [LineClassification.CONTEXT]: 15,
        [LineClassification.MOVED_REMOVAL]: 5,
        [LineClassification.MOVED]: 5,
        [LineClassification.REMOVED]: 1,
        [LineClassification.ADDED]: 1,
      });
    });
  });
});
