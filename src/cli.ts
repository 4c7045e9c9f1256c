#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from './utils/logger';
import { toError } from './core/exceptions';
import { displayError, displayVersion, formatHelp, type PackageInfo } from './utils/cli';
import { annotateCommand, configCommand, runCommand } from './commands';

const readPackageInfo = (): PackageInfo => {
  const data: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '../package.json'), 'utf8')
  );
  const record: Record<string, unknown> = typeof data === 'object' && data !== null ? { ...data } : {};
  const field = (key: string): string => String(record[key] ?? '');

  return {
    name: field('name'),
    version: field('version'),
    description: field('description'),
    license: field('license'),
  };
};

const pkg = readPackageInfo();
const program = new Command();

program
  .name('effdiff')
  .description('Find moved code in a diff and show only what really changed')
  .version(pkg.version, '-v, --version', 'Display version information')
  .option('-V, --verbose', 'Enable verbose logging')
  .option('-q, --quiet', 'Suppress output')
  .option('--config <path>', 'Config file (default ~/.effdiff/config.json)')
  .configureHelp({
    formatHelp: (cmd) => formatHelp(cmd),
  })
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<{ quiet?: boolean; verbose?: boolean }>();

    if (options.quiet) {
      logger.level = 'silent';
    } else if (options.verbose) {
      logger.level = 'debug';
    }
  });

program.addCommand(runCommand);
program.addCommand(annotateCommand);
program.addCommand(configCommand);

program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    if (error.code === 'commander.version') {
      displayVersion(pkg);
      process.exit(0);
    }
    if (error.code === 'commander.help' || error.code === 'commander.helpDisplayed') {
      process.exit(0);
    }
    process.exit(error.exitCode);
  }

  displayError(toError(error));
  process.exit(1);
});
