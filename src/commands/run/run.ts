import { Command, InvalidArgumentError } from 'commander';
import type { EffectiveDiffOptions } from '@/core/effective-diff/options';
import { toError } from '@/core/exceptions';
import { logger } from '@/utils/logger';
import { SpinnerManager } from '@/utils/spinner';
import { displayRunError, displayRunResult, type RunOutputFormat } from './run.display';
import { runEffectiveDiff } from './run.handler';

interface RunCommandOptions {
  old: string;
  new: string;
  commit?: string;
  json?: boolean;
  format?: string;
  output?: string;
  minBlockSize?: number;
  minSignificantLength?: number;
  context?: number;
  concurrency?: number;
}

export const parseInteger = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

const parseFormat = (format: string | undefined, json: boolean | undefined): RunOutputFormat => {
  if (json) return 'json';
  switch (format) {
    case undefined:
    case 'summary':
      return 'summary';
    case 'json':
    case 'patch':
      return format;
    default:
      throw new InvalidArgumentError(`unknown format '${format}'`);
  }
};

const collectOverrides = (options: RunCommandOptions): Partial<EffectiveDiffOptions> => {
  const overrides: Partial<EffectiveDiffOptions> = {};
  if (options.minBlockSize !== undefined) overrides.minBlockSize = options.minBlockSize;
  if (options.minSignificantLength !== undefined) {
    overrides.minSignificantLength = options.minSignificantLength;
  }
  if (options.context !== undefined) overrides.contextLines = options.context;
  if (options.concurrency !== undefined) overrides.maxConcurrency = options.concurrency;
  return overrides;
};

export const runCommand = new Command('run')
  .description('Detect moved blocks in a patch and print the effective diff')
  .argument('<patch>', 'Unified diff file (as written by git diff)')
  .requiredOption('--old <dir>', 'Checkout of the old revision')
  .requiredOption('--new <dir>', 'Checkout of the new revision')
  .option('--commit <hash>', 'Commit hash recorded in the output')
  .option('--json', 'Print the effective diff, move report and failures as JSON')
  .option('--format <format>', 'Output format: summary, json or patch')
  .option('-o, --output <dir>', 'Write the effective diff and move report into a directory')
  .option('--min-block-size <n>', 'Shortest block reported as a move', parseInteger)
  .option('--min-significant-length <n>', 'Trimmed length below which a line is trivial', parseInteger)
  .option('--context <n>', 'Context lines around re-diffed regions', parseInteger)
  .option('--concurrency <n>', 'File pairs re-diffed at once', parseInteger)
  .action(async (patch: string, options: RunCommandOptions, command: Command) => {
    const globals = command.optsWithGlobals<{ config?: string; quiet?: boolean }>();
    let spinner = new SpinnerManager(false);
    try {
      const format = parseFormat(options.format, options.json);
      spinner = new SpinnerManager(format === 'summary' && !globals.quiet);
      spinner.start({ text: 'Detecting moved code...' });

      const outcome = await runEffectiveDiff(patch, {
        oldDir: options.old,
        newDir: options.new,
        commit: options.commit,
        configPath: globals.config,
        output: options.output,
        overrides: collectOverrides(options),
      });

      if (outcome.result.failures.length > 0) {
        spinner.warn(`Finished with ${outcome.result.failures.length} failure(s)`);
      } else {
        spinner.succeed(`Found ${outcome.result.moveReport.length} move(s)`);
      }

      displayRunResult(outcome, format);
    } catch (error) {
      spinner.fail('Effective diff failed');
      logger.error(`error: ${toError(error).message}`);
      displayRunError(toError(error));
      process.exit(1);
    }
  });
