import chalk from 'chalk';
import { Command } from 'commander';
import { displayBox, DisplayThemes, formatLabelValue } from './display';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
  license: string;
}

const COMMAND_ICONS: Record<string, string> = {
  run: '🔍',
  annotate: '📝',
  config: '🔧',
  help: '❓',
};

/**
 * Custom help formatter with enhanced styling
 */
export const formatHelp = (cmd: Command): string => {
  const commandName = chalk.cyan.bold(cmd.name());
  let help = `${commandName} - ${chalk.gray(cmd.description())}\n\n`;

  help += `${chalk.yellow.bold('📋 Usage:')}\n`;
  help += `  ${chalk.green('$')} ${commandName} ${chalk.gray(cmd.usage())}\n\n`;

  const argumentsList = cmd.registeredArguments;
  if (argumentsList.length > 0) {
    help += `${chalk.yellow.bold('📥 Arguments:')}\n`;
    argumentsList.forEach((argument) => {
      help += `  ${chalk.green(argument.name())}  ${chalk.gray(argument.description)}\n`;
    });
    help += '\n';
  }

  const options = cmd.options;
  if (options.length > 0) {
    help += `${chalk.yellow.bold('⚙️  Options:')}\n`;
    const maxLength = Math.max(...options.map((opt) => opt.flags.length));
    options.forEach((option) => {
      help += `  ${chalk.green(option.flags.padEnd(maxLength))}  ${chalk.gray(option.description)}\n`;
    });
    help += '\n';
  }

  const commands = cmd.commands;
  if (commands.length > 0) {
    help += `${chalk.yellow.bold('🚀 Commands:')}\n`;
    const maxLength = Math.max(...commands.map((command) => command.name().length));
    commands.forEach((command) => {
      const icon = COMMAND_ICONS[command.name()] ?? '⚡';
      help += `  ${icon} ${chalk.green(command.name().padEnd(maxLength))}  ${chalk.gray(command.description())}\n`;
    });
    help += '\n';
  }

  if (!cmd.parent) {
    help += chalk.yellow.bold('💡 Examples:') + '\n';
    help += `  ${chalk.green('$')} effdiff run change.diff --old ./before --new ./after\n`;
    help += `  ${chalk.green('$')} effdiff run change.diff --old ./before --new ./after --format patch\n`;
    help += `  ${chalk.green('$')} effdiff annotate change.diff --old ./before --new ./after\n\n`;
  }

  help +=
    chalk.gray('For more information on a command, run: ') +
    chalk.green(`effdiff help <command>`) +
    '\n';

  return help;
};

export const displayVersion = (pkg: PackageInfo): void => {
  const info = [
    `${chalk.bold.blue(pkg.name)} ${chalk.green(`v${pkg.version}`)}`,
    '',
    formatLabelValue('Node.js', chalk.cyan(process.version)),
    formatLabelValue('Platform', `${chalk.cyan(process.platform)} ${chalk.cyan(process.arch)}`),
    formatLabelValue('License', chalk.yellow(pkg.license)),
    formatLabelValue('Description', chalk.white(pkg.description)),
  ].join('\n');

  displayBox(info, { title: chalk.bold.magenta('Version'), theme: DisplayThemes.HIGHLIGHT });
};

export const displayError = (error: Error): void => {
  const content = [
    formatLabelValue('Error Type', chalk.red(error.name || 'Error')),
    formatLabelValue('Message', chalk.red(error.message)),
    '',
    `${chalk.blue('💡 Tip:')} Use ${chalk.green('--verbose')} for detailed logs`,
  ].join('\n');

  displayBox(content, {
    title: chalk.bold.red('🚨 Error'),
    theme: DisplayThemes.ERROR,
    stream: process.stderr,
  });
};
