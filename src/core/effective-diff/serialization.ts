import fs from 'fs-extra';
import path from 'path';
import { formatUnifiedDiff } from '@/core/diff/unified-diff-writer';
import type { GitDiff } from '@/core/diff/types';
import { summarizeMoves } from './move-report';
import type { EffectiveDiffPipelineResult, MoveReport, MoveReportEntry, MoveSummary } from './types';

export const ARTIFACT_FILES = {
  effectiveDiff: 'effective-diff-parsed.json',
  effectivePatch: 'effective-diff.diff',
  moves: 'effective-diff-moves.json',
} as const;

export interface MoveReportDocument extends MoveSummary {
  moves: readonly MoveReportEntry[];
}

export const toMoveReportDocument = (report: MoveReport): MoveReportDocument => ({
  ...summarizeMoves(report),
  moves: report,
});

export const serializeEffectiveDiff = (effectiveDiff: GitDiff): string =>
  JSON.stringify(effectiveDiff, null, 2);

export const serializeMoveReport = (report: MoveReport): string =>
  JSON.stringify(toMoveReportDocument(report), null, 2);

/**
 * Write the effective diff (JSON and unified text) and the move report into
 * `outputDir`, creating it if needed. Returns the paths written.
 */
export const writeArtifacts = async (
  outputDir: string,
  result: EffectiveDiffPipelineResult
): Promise<string[]> => {
  await fs.ensureDir(outputDir);

  const written: [string, string][] = [
    [ARTIFACT_FILES.effectiveDiff, serializeEffectiveDiff(result.effectiveDiff)],
    [ARTIFACT_FILES.effectivePatch, formatUnifiedDiff(result.effectiveDiff)],
    [ARTIFACT_FILES.moves, serializeMoveReport(result.moveReport)],
  ];

  return Promise.all(
    written.map(async ([fileName, content]) => {
      const filePath = path.join(outputDir, fileName);
      await fs.writeFile(filePath, content.endsWith('\n') ? content : content + '\n', 'utf8');
      return filePath;
    })
  );
};
