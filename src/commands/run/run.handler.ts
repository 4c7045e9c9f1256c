import fs from 'fs-extra';
import path from 'path';
import { DirectoryContentProvider } from '@/core/content/file-content-provider';
import { parseUnifiedDiff } from '@/core/diff/unified-diff-parser';
import type { GitDiff } from '@/core/diff/types';
import { FileNotFoundException, toError } from '@/core/exceptions';
import { summarizeMoves } from '@/core/effective-diff/move-report';
import type { EffectiveDiffOptions } from '@/core/effective-diff/options';
import { runEffectiveDiffPipelineWithProvider } from '@/core/effective-diff/pipeline';
import { MyersRediffer } from '@/core/effective-diff/rediffer';
import { writeArtifacts } from '@/core/effective-diff/serialization';
import type { EffectiveDiffPipelineResult, MoveSummary } from '@/core/effective-diff/types';
import { ConfigManager, type Config } from '@/utils/config';
import { logger } from '@/utils/logger';

export interface RunHandlerOptions {
  oldDir: string;
  newDir: string;
  commit?: string;
  configPath?: string;
  output?: string;
  overrides?: Partial<EffectiveDiffOptions>;
}

export interface RunOutcome {
  gitDiff: GitDiff;
  result: EffectiveDiffPipelineResult;
  summary: MoveSummary;
  config: Config;
  artifacts: string[];
}

/**
 * Read and parse a unified diff from disk.
 */
export const loadDiff = async (patchPath: string, commitHash: string = ''): Promise<GitDiff> => {
  const fullPath = path.resolve(patchPath);
  if (!(await fs.pathExists(fullPath))) {
    throw new FileNotFoundException(patchPath, 'patch');
  }
  return parseUnifiedDiff(await fs.readFile(fullPath, 'utf8'), commitHash);
};

export const loadConfig = async (configPath?: string): Promise<Config> =>
  new ConfigManager(configPath ? path.resolve(configPath) : undefined).load();

/**
 * Parse the patch, run the pipeline against the two checkouts and write the
 * artifacts when an output directory is given.
 */
export const runEffectiveDiff = async (
  patchPath: string,
  options: RunHandlerOptions
): Promise<RunOutcome> => {
  const config = await loadConfig(options.configPath);
  const engineOptions: EffectiveDiffOptions = { ...config.options, ...options.overrides };

  for (const dir of [options.oldDir, options.newDir]) {
    if (!(await fs.pathExists(dir))) {
      throw new Error(`directory ${dir} does not exist`);
    }
  }

  const gitDiff = await loadDiff(patchPath, options.commit);
  const provider = new DirectoryContentProvider(options.oldDir, options.newDir);
  const rediffer = new MyersRediffer({ contextLines: engineOptions.contextLines });

  const result = await runEffectiveDiffPipelineWithProvider(
    gitDiff,
    provider,
    rediffer,
    engineOptions
  );

  let artifacts: string[] = [];
  if (options.output) {
    try {
      artifacts = await writeArtifacts(path.resolve(options.output), result);
    } catch (error) {
      throw new Error(`cannot write artifacts to ${options.output}: ${toError(error).message}`);
    }
    logger.info(`Wrote ${artifacts.length} artifact(s) to ${options.output}`);
  }

  return {
    gitDiff,
    result,
    summary: summarizeMoves(result.moveReport),
    config,
    artifacts,
  };
};
