import { Command } from 'commander';
import { toError } from '@/core/exceptions';
import { logger } from '@/utils/logger';
import { displayConfig } from './config.display';
import { resetConfig, setConfigOption, showConfig } from './config.handler';

const configPathOf = (command: Command): string | undefined =>
  command.optsWithGlobals<{ config?: string }>().config;

const fail = (action: string, error: unknown): never => {
  logger.error(`Failed to ${action} configuration: ${toError(error).message}`);
  process.exit(1);
};

export const configCommand = new Command('config').description(
  'Show or change the engine options'
);

configCommand
  .command('show')
  .description('Print the options in effect')
  .action(async (_options: object, command: Command) => {
    try {
      displayConfig(await showConfig(configPathOf(command)), 'Configuration');
    } catch (error) {
      fail('read', error);
    }
  });

configCommand
  .command('set')
  .description('Set one option')
  .argument('<key>', 'minBlockSize, minSignificantLength, contextLines or maxConcurrency')
  .argument('<value>', 'Whole number')
  .action(async (key: string, value: string, _options: object, command: Command) => {
    try {
      displayConfig(await setConfigOption(key, value, configPathOf(command)), 'Configuration saved');
    } catch (error) {
      fail('set', error);
    }
  });

configCommand
  .command('reset')
  .description('Write the default options')
  .action(async (_options: object, command: Command) => {
    try {
      displayConfig(await resetConfig(configPathOf(command)), 'Configuration reset');
    } catch (error) {
      fail('reset', error);
    }
  });
