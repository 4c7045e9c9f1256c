import chalk from 'chalk';
import { computeStatistics } from '@/core/diff/diff-statistics';
import { formatUnifiedDiff } from '@/core/diff/unified-diff-writer';
import { toMoveReportDocument } from '@/core/effective-diff/serialization';
import type { MoveReportEntry, PipelineFailure } from '@/core/effective-diff/types';
import { display, formatLabelValue } from '@/utils/cli/display';
import type { RunOutcome } from './run.handler';

export type RunOutputFormat = 'summary' | 'json' | 'patch';

export const formatMove = (move: MoveReportEntry): string => {
  const source = `${move.sourceFile}:${move.sourceLineRange.start}-${move.sourceLineRange.end}`;
  const target = `${move.targetFile}:${move.targetLineRange.start}-${move.targetLineRange.end}`;
  return `${chalk.cyan(source)} ${chalk.gray('→')} ${chalk.cyan(target)} ${chalk.gray(
    `(${move.matchedLineCount} lines, score ${move.score.toFixed(2)}, ` +
      `${move.effectiveDiffLines} changed nearby)`
  )}`;
};

export const formatFailure = (failure: PipelineFailure): string =>
  failure.path
    ? `${chalk.yellow(failure.path)}: ${failure.message}`
    : `${chalk.yellow(failure.scope)}: ${failure.message}`;

/**
 * The machine-readable form printed by `--json`.
 */
export const toJsonOutput = (outcome: RunOutcome): string =>
  JSON.stringify(
    {
      effectiveDiff: outcome.result.effectiveDiff,
      moveReport: toMoveReportDocument(outcome.result.moveReport),
      failures: outcome.result.failures,
    },
    null,
    2
  );

const displaySummary = (outcome: RunOutcome): void => {
  const before = computeStatistics(outcome.gitDiff);
  const after = computeStatistics(outcome.result.effectiveDiff);
  const { summary } = outcome;

  const details = [
    formatLabelValue('Moves detected', chalk.white(String(summary.movesDetected))),
    formatLabelValue('Lines moved', chalk.white(String(summary.totalLinesMoved))),
    formatLabelValue(
      'Changed lines',
      `${chalk.white(String(before.insertions + before.deletions))} ${chalk.gray('→')} ${chalk.green.bold(
        String(after.insertions + after.deletions)
      )}`
    ),
    formatLabelValue(
      'Changed near moves',
      chalk.white(String(summary.totalLinesEffectivelyChanged))
    ),
    formatLabelValue(
      'Files',
      `${chalk.white(String(before.filesChanged))} ${chalk.gray('→')} ${chalk.white(
        String(after.filesChanged)
      )}`
    ),
  ].join('\n');

  display.success(details, chalk.bold.green('Effective Diff'));

  if (outcome.result.moveReport.length > 0) {
    display.info(outcome.result.moveReport.map(formatMove).join('\n'), chalk.bold.blue('Moves'));
  }
};

const displayFailures = (failures: readonly PipelineFailure[]): void => {
  if (failures.length === 0) return;
  display.warning(failures.map(formatFailure).join('\n'), chalk.yellow('Degraded results'));
};

export const displayRunResult = (outcome: RunOutcome, format: RunOutputFormat): void => {
  switch (format) {
    case 'json':
      console.log(toJsonOutput(outcome));
      return;
    case 'patch':
      process.stdout.write(formatUnifiedDiff(outcome.result.effectiveDiff));
      return;
    default:
      displaySummary(outcome);
      displayFailures(outcome.result.failures);
      if (outcome.artifacts.length > 0) {
        display.info(
          outcome.artifacts.map((artifact) => chalk.white(artifact)).join('\n'),
          chalk.blue('Artifacts written')
        );
      }
  }
};

export const displayRunError = (error: Error): void => {
  display.error(
    [
      formatLabelValue('Error Type', chalk.red(error.name)),
      formatLabelValue('Message', chalk.red(error.message)),
    ].join('\n'),
    chalk.bold.red('effdiff run failed')
  );
};
