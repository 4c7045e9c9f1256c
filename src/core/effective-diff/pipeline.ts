import {
  InMemoryContentProvider,
  Revision,
  type FileContentProvider,
} from '@/core/content/file-content-provider';
import { validateGitDiff } from '@/core/diff/diff-validator';
import { FileChangeType, type DiffHunk, type FileDiff, type GitDiff } from '@/core/diff/types';
import { toError } from '@/core/exceptions';
import { runWithConcurrency } from '@/utils/helpers/task-pool';
import { logger } from '@/utils/logger';
import { findMoveCandidates } from './block-aggregator';
import { ConsumedLines } from './consumed-lines';
import { reconstructEffectiveDiff, verifyLineAccounting } from './diff-reconstructor';
import { extractTaggedLines } from './line-extractor';
import { LineMatchIndex } from './line-matcher';
import { buildMoveReport } from './move-report';
import { resolveOptions, type EffectiveDiffOptions } from './options';
import type { Rediffer } from './rediffer';
import { rediffFilePair } from './region-rediffer';
import type { EffectiveDiffPipelineResult, MoveCandidate, PipelineFailure } from './types';

export type PipelineOptions = Partial<EffectiveDiffOptions> & { signal?: AbortSignal };

type RediffOutcome =
  | { fileIndex: number; hunks: DiffHunk[] }
  | { fileIndex: number; failure: PipelineFailure };

const touchesFile = (candidate: MoveCandidate, file: FileDiff): boolean =>
  candidate.sourceFile === file.oldPath || candidate.targetFile === file.newPath;

const readContent = async (
  provider: FileContentProvider,
  file: FileDiff,
  revision: Revision
): Promise<string> => {
  if (revision === Revision.OLD && file.type === FileChangeType.ADDED) return '';
  if (revision === Revision.NEW && file.type === FileChangeType.DELETED) return '';
  return provider.getContent(revision === Revision.OLD ? file.oldPath : file.newPath, revision);
};

const fallback = (gitDiff: GitDiff, error: unknown): EffectiveDiffPipelineResult => {
  const message = toError(error).message;
  logger.warn(`Effective diff unavailable, returning the input diff: ${message}`);
  return {
    effectiveDiff: gitDiff,
    moveReport: [],
    failures: [{ scope: 'pipeline', message }],
  };
};

const runPipeline = async (
  gitDiff: GitDiff,
  provider: FileContentProvider,
  rediffer: Rediffer,
  pipelineOptions: PipelineOptions
): Promise<EffectiveDiffPipelineResult> => {
  const { signal, ...overrides } = pipelineOptions;
  const options = resolveOptions(overrides);

  validateGitDiff(gitDiff);
  signal?.throwIfAborted();

  const { removed, added } = extractTaggedLines(gitDiff);
  const index = new LineMatchIndex(removed, added);
  const accepted = findMoveCandidates(index, options);

  logger.debug(
    `${removed.length} removed, ${added.length} added, ${index.matchCount} matches, ` +
      `${accepted.length} move(s) accepted`
  );

  if (accepted.length === 0) {
    return { effectiveDiff: gitDiff, moveReport: [], failures: [] };
  }

  const consumed = ConsumedLines.fromCandidates(accepted);
  const touched = gitDiff.files
    .map((file, fileIndex) => ({ file, fileIndex }))
    .filter(({ file }) => accepted.some((candidate) => touchesFile(candidate, file)));

  const outcomes = await runWithConcurrency(
    touched,
    options.maxConcurrency,
    async ({ file, fileIndex }): Promise<RediffOutcome> => {
      try {
        const [oldText, newText] = await Promise.all([
          readContent(provider, file, Revision.OLD),
          readContent(provider, file, Revision.NEW),
        ]);
        const hunks = await rediffFilePair(file, oldText, newText, consumed, rediffer, {
          contextLines: options.contextLines,
          signal,
        });
        return { fileIndex, hunks };
      } catch (error) {
        if (signal?.aborted) throw error;
        const message = toError(error).message;
        logger.warn(`Keeping original hunks for ${file.newPath}: ${message}`);
        return { fileIndex, failure: { scope: 'file', path: file.newPath, message } };
      }
    },
    signal
  );

  const residuals = new Map<number, DiffHunk[]>();
  const failedFiles = new Set<number>();
  const failures: PipelineFailure[] = [];

  for (const outcome of outcomes) {
    if ('failure' in outcome) {
      failedFiles.add(outcome.fileIndex);
      failures.push(outcome.failure);
    } else {
      residuals.set(outcome.fileIndex, outcome.hunks);
    }
  }

  const failedDiffs = gitDiff.files.filter((_, fileIndex) => failedFiles.has(fileIndex));
  const surviving = accepted.filter(
    (candidate) => !failedDiffs.some((file) => touchesFile(candidate, file))
  );

  if (surviving.length < accepted.length) {
    logger.debug(`Withdrew ${accepted.length - surviving.length} move(s) touching failed files`);
  }

  if (surviving.length === 0) {
    return { effectiveDiff: gitDiff, moveReport: [], failures };
  }

  const effectiveDiff = reconstructEffectiveDiff(
    gitDiff,
    residuals,
    failedFiles,
    ConsumedLines.fromCandidates(surviving)
  );
  verifyLineAccounting(gitDiff, effectiveDiff, surviving);

  return {
    effectiveDiff,
    moveReport: buildMoveReport(surviving, effectiveDiff, options.contextLines),
    failures,
  };
};

/**
 * Detect relocated blocks in `gitDiff` and return the diff without them,
 * together with a report of every accepted move.
 *
 * Never rejects. A file pair whose contents cannot be read or re-diffed
 * keeps its original hunks, and moves touching it are withdrawn. Anything
 * else that goes wrong, including malformed input, bad options or
 * cancellation through `options.signal`, yields the input diff unchanged
 * with an empty report. Both cases are listed in `failures`.
 */
export const runEffectiveDiffPipelineWithProvider = async (
  gitDiff: GitDiff,
  provider: FileContentProvider,
  rediffer: Rediffer,
  options: PipelineOptions = {}
): Promise<EffectiveDiffPipelineResult> => {
  try {
    return await runPipeline(gitDiff, provider, rediffer, options);
  } catch (error) {
    return fallback(gitDiff, error);
  }
};

export const runEffectiveDiffPipeline = (
  gitDiff: GitDiff,
  oldFileContents: ReadonlyMap<string, string>,
  newFileContents: ReadonlyMap<string, string>,
  rediffer: Rediffer,
  options: PipelineOptions = {}
): Promise<EffectiveDiffPipelineResult> =>
  runEffectiveDiffPipelineWithProvider(
    gitDiff,
    new InMemoryContentProvider(oldFileContents, newFileContents),
    rediffer,
    options
  );
