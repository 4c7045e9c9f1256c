import path from 'path';
import { ConfigException } from '@/core/exceptions';
import {
  OPTION_KEYS,
  resolveOptions,
  type EffectiveDiffOptions,
} from '@/core/effective-diff/options';
import { ConfigManager, type Config } from '@/utils/config';

export interface ConfigResult {
  path: string;
  config: Config;
}

export const isOptionKey = (key: string): key is keyof EffectiveDiffOptions =>
  OPTION_KEYS.some((optionKey) => optionKey === key);

const createConfigManager = (configPath?: string): ConfigManager =>
  new ConfigManager(configPath ? path.resolve(configPath) : undefined);

export const showConfig = async (configPath?: string): Promise<ConfigResult> => {
  const manager = createConfigManager(configPath);
  const config = await manager.load();
  return { path: manager.path, config };
};

/**
 * Validate one option and write it to the config file.
 */
export const setConfigOption = async (
  key: string,
  value: string,
  configPath?: string
): Promise<ConfigResult> => {
  if (!isOptionKey(key)) {
    throw new ConfigException(`unknown option '${key}', expected one of ${OPTION_KEYS.join(', ')}`);
  }

  const manager = createConfigManager(configPath);
  await manager.load();
  manager.set('options', resolveOptions({ ...manager.get('options'), [key]: Number(value) }));
  await manager.save();

  return { path: manager.path, config: manager.getAll() };
};

export const resetConfig = async (configPath?: string): Promise<ConfigResult> => {
  const manager = createConfigManager(configPath);
  manager.reset();
  await manager.save();
  return { path: manager.path, config: manager.getAll() };
};
