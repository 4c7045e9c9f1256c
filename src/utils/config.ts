import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { ConfigException, toError } from '@/core/exceptions';
import {
  DEFAULT_OPTIONS,
  OPTION_KEYS,
  resolveOptions,
  type EffectiveDiffOptions,
} from '@/core/effective-diff/options';
import { logger } from './logger';

export interface Config {
  options: EffectiveDiffOptions;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readOptions = (value: unknown): Partial<EffectiveDiffOptions> => {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigException("'options' must be an object");
  }

  const overrides: Partial<EffectiveDiffOptions> = {};
  for (const key of OPTION_KEYS) {
    const field = value[key];
    if (field === undefined) continue;
    if (typeof field !== 'number') {
      throw new ConfigException(`options.${key} must be a number`);
    }
    overrides[key] = field;
  }

  for (const key of Object.keys(value)) {
    if (!(key in DEFAULT_OPTIONS)) {
      logger.warn(`Ignoring unknown config option '${key}'`);
    }
  }

  return overrides;
};

/**
 * Loads engine options from a JSON file. A missing file
 * means defaults; a file with a bad field is rejected.
 */
export class ConfigManager {
  private config: Config;

  constructor(private readonly configPath: string = ConfigManager.defaultPath()) {
    this.config = ConfigManager.getDefaultConfig();
  }

  static defaultPath(): string {
    return path.join(os.homedir(), '.effdiff', 'config.json');
  }

  static getDefaultConfig(): Config {
    return { options: { ...DEFAULT_OPTIONS } };
  }

  /**
   * Validate a parsed config document and merge it onto the defaults.
   */
  static parse(data: unknown): Config {
    if (!isRecord(data)) {
      throw new ConfigException('config must be a JSON object');
    }

    return { options: resolveOptions(readOptions(data['options'])) };
  }

  get path(): string {
    return this.configPath;
  }

  async load(): Promise<Config> {
    if (!(await fs.pathExists(this.configPath))) {
      logger.debug(`No config at ${this.configPath}, using defaults`);
      this.config = ConfigManager.getDefaultConfig();
      return this.getAll();
    }

    let data: unknown;
    try {
      data = await fs.readJson(this.configPath);
    } catch (error) {
      throw new ConfigException(`cannot read config ${this.configPath}`, toError(error));
    }

    this.config = ConfigManager.parse(data);
    return this.getAll();
  }

  async save(): Promise<void> {
    await fs.ensureDir(path.dirname(this.configPath));
    await fs.writeJson(this.configPath, this.config, { spaces: 2 });
  }

  get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  set<K extends keyof Config>(key: K, value: Config[K]): void {
    this.config[key] = value;
  }

  getAll(): Config {
    return { options: { ...this.config.options } };
  }

  reset(): void {
    this.config = ConfigManager.getDefaultConfig();
  }
}
