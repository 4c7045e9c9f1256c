import { Command } from 'commander';
import { toError } from '@/core/exceptions';
import { logger } from '@/utils/logger';
import { displayAnnotations } from './annotate.display';
import { annotatePatch } from './annotate.handler';

interface AnnotateCommandOptions {
  old: string;
  new: string;
}

export const annotateCommand = new Command('annotate')
  .description('Print a patch with moved lines marked')
  .argument('<patch>', 'Unified diff file (as written by git diff)')
  .requiredOption('--old <dir>', 'Checkout of the old revision')
  .requiredOption('--new <dir>', 'Checkout of the new revision')
  .action(async (patch: string, options: AnnotateCommandOptions, command: Command) => {
    try {
      const outcome = await annotatePatch(patch, {
        oldDir: options.old,
        newDir: options.new,
        configPath: command.optsWithGlobals<{ config?: string }>().config,
      });
      displayAnnotations(outcome);
    } catch (error) {
      logger.error(`error: ${toError(error).message}`);
      process.exit(1);
    }
  });
