import boxen from 'boxen';
import chalk from 'chalk';

type BoxenOptions = NonNullable<Parameters<typeof boxen>[1]>;

/**
 * Standard boxen configuration used across all commands
 */
const DEFAULT_BOX_OPTIONS: BoxenOptions = {
  padding: 1,
  margin: { top: 1, bottom: 1, left: 1, right: 1 },
  borderStyle: 'round',
};

/**
 * Color themes for different types of displays
 */
export const DisplayThemes = {
  INFO: 'blue',
  SUCCESS: 'green',
  WARNING: 'yellow',
  ERROR: 'red',
  HIGHLIGHT: 'magenta',
} as const;

export type DisplayTheme = (typeof DisplayThemes)[keyof typeof DisplayThemes];

interface DisplayBoxOptions {
  title?: string;
  titleAlignment?: 'left' | 'center' | 'right';
  theme?: DisplayTheme;
  /** Defaults to stdout. */
  stream?: NodeJS.WritableStream;
}

export const createDisplayBox = (content: string, options: DisplayBoxOptions = {}): string => {
  const { theme = DisplayThemes.INFO, title, titleAlignment = 'center' } = options;

  return boxen(content, {
    ...DEFAULT_BOX_OPTIONS,
    borderColor: theme,
    ...(title ? { title, titleAlignment } : {}),
  });
};

export const displayBox = (content: string, options: DisplayBoxOptions = {}): void => {
  const { stream = process.stdout } = options;
  stream.write(createDisplayBox(content, options) + '\n');
};

/**
 * Creates formatted label-value pairs commonly used in command outputs
 */
export const formatLabelValue = (label: string, value: string): string => {
  return `${chalk.gray(`${label}:`)} ${value}`;
};

/**
 * Titled boxes per theme. Errors and warnings go to stderr so they never mix
 * into a patch or JSON document printed on stdout.
 */
export const display = {
  success: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.SUCCESS, title }),

  info: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.INFO, title }),

  warning: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.WARNING, title, stream: process.stderr }),

  error: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.ERROR, title, stream: process.stderr }),
};
