import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import {
  isOptionKey,
  resetConfig,
  setConfigOption,
  showConfig,
} from '@/commands/config/config.handler';
import { configCommand } from '@/commands/config/config';
import { DEFAULT_OPTIONS } from '@/core/effective-diff/options';

describe('config handler', () => {
  let tmp: string;
  let configPath: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'effdiff-config-cmd-'));
    configPath = path.join(tmp, 'config.json');
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  test('recognises option keys', () => {
    expect(isOptionKey('contextLines')).toBe(true);
    expect(isOptionKey('colour')).toBe(false);
  });

  test('shows defaults when no file exists', async () => {
    expect(await showConfig(configPath)).toEqual({
      path: configPath,
      config: { options: DEFAULT_OPTIONS },
    });
  });

  test('sets one option and keeps the rest', async () => {
    const result = await setConfigOption('minBlockSize', '5', configPath);

    expect(result.config.options).toEqual({ ...DEFAULT_OPTIONS, minBlockSize: 5 });
    expect(await fs.readJson(configPath)).toEqual({
      options: { ...DEFAULT_OPTIONS, minBlockSize: 5 },
    });
  });

  test('rejects unknown keys', async () => {
    await expect(setConfigOption('colour', 'blue', configPath)).rejects.toThrow(
      "unknown option 'colour', expected one of minBlockSize, minSignificantLength, contextLines, maxConcurrency"
    );
    expect(await fs.pathExists(configPath)).toBe(false);
  });

  test('rejects values that are not valid', async () => {
    await expect(setConfigOption('minBlockSize', '0', configPath)).rejects.toThrow(
      'minBlockSize must be an integer >= 1, got 0'
    );
    await expect(setConfigOption('contextLines', 'many', configPath)).rejects.toThrow(
      'contextLines must be an integer >= 0, got NaN'
    );
  });

  test('resets the file to defaults', async () => {
    await setConfigOption('maxConcurrency', '8', configPath);

    const result = await resetConfig(configPath);

    expect(result.config.options).toEqual(DEFAULT_OPTIONS);
    expect(await fs.readJson(configPath)).toEqual({ options: DEFAULT_OPTIONS });
  });
});

describe('config command', () => {
  test('has show, set and reset subcommands', () => {
    expect(configCommand.name()).toBe('config');
    expect(configCommand.commands.map((command) => command.name())).toEqual(['show', 'set', 'reset']);
  });
});
