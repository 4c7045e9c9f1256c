import chalk from 'chalk';
import { display, formatLabelValue } from '@/utils/cli/display';
import type { ConfigResult } from './config.handler';

export const formatConfig = ({ path, config }: ConfigResult): string =>
  [
    formatLabelValue('File', chalk.white(path)),
    '',
    ...Object.entries(config.options).map(([key, value]) =>
      formatLabelValue(key, chalk.cyan(String(value)))
    ),
  ].join('\n');

export const displayConfig = (result: ConfigResult, title: string): void => {
  display.info(formatConfig(result), chalk.bold.blue(title));
};
