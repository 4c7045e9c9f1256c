import chalk from 'chalk';
import { formatHunkHeader } from '@/core/diff/unified-diff-writer';
import {
  LineClassification,
  type ClassifiedFile,
  type ClassifiedLine,
} from '@/core/effective-diff/line-classifier';
import { display } from '@/utils/cli/display';
import { formatFailure } from '../run/run.display';
import type { AnnotateOutcome } from './annotate.handler';

const MARKERS: Record<LineClassification, { marker: string; color: (text: string) => string }> = {
  [LineClassification.MOVED]: { marker: '>', color: chalk.cyan },
  [LineClassification.MOVED_REMOVAL]: { marker: '<', color: chalk.magenta },
  [LineClassification.ADDED]: { marker: '+', color: chalk.green },
  [LineClassification.REMOVED]: { marker: '-', color: chalk.red },
  [LineClassification.CONTEXT]: { marker: ' ', color: chalk.gray },
};

export const formatClassifiedLine = ({ line, classification }: ClassifiedLine): string => {
  const { marker, color } = MARKERS[classification];
  return color(`${marker}${line.content}`);
};

export const formatClassifiedFile = (file: ClassifiedFile): string[] => {
  const header =
    file.oldPath === file.newPath ? file.newPath : `${file.oldPath} → ${file.newPath}`;
  const output = [chalk.bold(header)];

  for (const { hunk, lines } of file.hunks) {
    output.push(chalk.cyan(formatHunkHeader(hunk)));
    output.push(...lines.map(formatClassifiedLine));
  }

  return output;
};

export const displayAnnotations = (outcome: AnnotateOutcome): void => {
  outcome.files.forEach((file) => console.log(formatClassifiedFile(file).join('\n') + '\n'));

  console.log(
    chalk.gray(
      `${chalk.magenta('<')} moved from here  ${chalk.cyan('>')} moved to here  ` +
        `${chalk.red('-')} removed  ${chalk.green('+')} added`
    )
  );

  if (outcome.failures.length > 0) {
    display.warning(outcome.failures.map(formatFailure).join('\n'), chalk.yellow('Degraded results'));
  }
};
