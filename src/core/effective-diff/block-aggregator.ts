import { logger } from '@/utils/logger';
import { ConsumedLines } from './consumed-lines';
import type { LineMatchIndex } from './line-matcher';
import { computeLineUniqueness, scoreBlock } from './move-scoring';
import type { EffectiveDiffOptions } from './options';
import { LineSide, type LineMatch, type MoveCandidate } from './types';

/**
 * A run of removed lines paired one-to-one with a run of added lines of the
 * same contents: source line `sourceStart + i` matches target line
 * `targetStart + i`.
 */
export interface Block {
  readonly sourceFile: string;
  readonly sourceStart: number;
  readonly targetFile: string;
  readonly targetStart: number;
  readonly length: number;
}

export type AggregationOptions = Pick<EffectiveDiffOptions, 'minBlockSize' | 'minSignificantLength'>;

/**
 * Longest first, then source file, source start, target file, target start.
 */
export const compareBlocks = (a: Block, b: Block): number => {
  if (a.length !== b.length) return b.length - a.length;
  if (a.sourceFile !== b.sourceFile) return a.sourceFile < b.sourceFile ? -1 : 1;
  if (a.sourceStart !== b.sourceStart) return a.sourceStart - b.sourceStart;
  if (a.targetFile !== b.targetFile) return a.targetFile < b.targetFile ? -1 : 1;
  return a.targetStart - b.targetStart;
};

const canPair = (
  index: LineMatchIndex,
  consumed: ConsumedLines,
  sourceFile: string,
  sourceLine: number,
  targetFile: string,
  targetLine: number
): boolean => {
  const removed = index.removedAt(sourceFile, sourceLine);
  const added = index.addedAt(targetFile, targetLine);

  return (
    removed !== undefined &&
    added !== undefined &&
    removed.content === added.content &&
    !consumed.has(LineSide.REMOVED, sourceFile, sourceLine) &&
    !consumed.has(LineSide.ADDED, targetFile, targetLine)
  );
};

/**
 * Grow a matched pair backwards and forwards while both sides stay
 * contiguous, in the same file pairing, with equal content.
 */
export const growBlock = (
  index: LineMatchIndex,
  consumed: ConsumedLines,
  seed: LineMatch
): Block => {
  const sourceFile = seed.removed.filePath;
  const targetFile = seed.added.filePath;
  let sourceStart = seed.removed.lineNumber;
  let targetStart = seed.added.lineNumber;
  let length = 1;

  while (canPair(index, consumed, sourceFile, sourceStart - 1, targetFile, targetStart - 1)) {
    sourceStart--;
    targetStart--;
    length++;
  }

  while (
    canPair(
      index,
      consumed,
      sourceFile,
      sourceStart + length,
      targetFile,
      targetStart + length
    )
  ) {
    length++;
  }

  return { sourceFile, sourceStart, targetFile, targetStart, length };
};

const isSignificant = (content: string, options: AggregationOptions): boolean =>
  content.trim().length >= options.minSignificantLength;

/**
 * Whether a matched pair further back on the same diagonal, with nothing
 * unmatched in between, is a significant line. That pair seeds the block.
 */
const hasEarlierSeed = (
  index: LineMatchIndex,
  consumed: ConsumedLines,
  seed: LineMatch,
  options: AggregationOptions
): boolean => {
  const sourceFile = seed.removed.filePath;
  const targetFile = seed.added.filePath;

  for (let back = 1; ; back++) {
    const sourceLine = seed.removed.lineNumber - back;
    const targetLine = seed.added.lineNumber - back;
    if (!canPair(index, consumed, sourceFile, sourceLine, targetFile, targetLine)) return false;

    const content = index.removedAt(sourceFile, sourceLine)?.content ?? '';
    if (isSignificant(content, options)) return true;
  }
};

/**
 * Every maximal block of at least `minBlockSize` lines holding a significant
 * line. Each block is grown once, from its first significant line; trivial
 * lines are never seeds but still join a block while it grows.
 */
export const discoverBlocks = (
  index: LineMatchIndex,
  consumed: ConsumedLines,
  options: AggregationOptions
): Block[] => {
  const blocks: Block[] = [];

  for (const removed of index.removedLines) {
    if (!isSignificant(removed.content, options)) continue;
    if (consumed.has(LineSide.REMOVED, removed.filePath, removed.lineNumber)) continue;

    for (const added of index.candidatesFor(removed)) {
      if (consumed.has(LineSide.ADDED, added.filePath, added.lineNumber)) continue;

      const seed = { removed, added };
      if (hasEarlierSeed(index, consumed, seed, options)) continue;

      const block = growBlock(index, consumed, seed);
      if (block.length >= options.minBlockSize) blocks.push(block);
    }
  }

  return blocks;
};

/**
 * The parts of a block whose lines are still unclaimed on both sides.
 */
const unconsumedRuns = (block: Block, consumed: ConsumedLines): Block[] => {
  const runs: Block[] = [];
  let runStart = -1;

  for (let offset = 0; offset <= block.length; offset++) {
    const free =
      offset < block.length &&
      !consumed.has(LineSide.REMOVED, block.sourceFile, block.sourceStart + offset) &&
      !consumed.has(LineSide.ADDED, block.targetFile, block.targetStart + offset);

    if (free && runStart < 0) {
      runStart = offset;
    } else if (!free && runStart >= 0) {
      runs.push({
        ...block,
        sourceStart: block.sourceStart + runStart,
        targetStart: block.targetStart + runStart,
        length: offset - runStart,
      });
      runStart = -1;
    }
  }

  return runs;
};

const blockContents = (index: LineMatchIndex, block: Block): string[] => {
  const contents: string[] = [];
  for (let offset = 0; offset < block.length; offset++) {
    contents.push(index.removedAt(block.sourceFile, block.sourceStart + offset)?.content ?? '');
  }
  return contents;
};

/**
 * Ordered worst-first so the best block is popped from the end.
 */
const insertByRank = (queue: Block[], block: Block): void => {
  let low = 0;
  let high = queue.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const probe = queue[middle];
    if (probe !== undefined && compareBlocks(probe, block) < 0) {
      high = middle;
    } else {
      low = middle + 1;
    }
  }
  queue.splice(low, 0, block);
};

/**
 * Turn matched line pairs into non-overlapping move candidates.
 *
 * Blocks are taken greedily, longest first. Taking a block claims its lines
 * on both sides in `consumed`; a block that lost lines to an earlier pick is
 * split into what is left of it and queued again. Blocks shorter than
 * `minBlockSize`, or made only of trivial lines, are never taken.
 */
export const findMoveCandidates = (
  index: LineMatchIndex,
  options: AggregationOptions,
  consumed: ConsumedLines = new ConsumedLines()
): MoveCandidate[] => {
  const queue = discoverBlocks(index, consumed, options).sort((a, b) => compareBlocks(b, a));
  const candidates: MoveCandidate[] = [];

  for (let block = queue.pop(); block !== undefined; block = queue.pop()) {
    if (block.length < options.minBlockSize) break;

    const runs = unconsumedRuns(block, consumed);
    const intact = runs.length === 1 && runs[0]?.length === block.length;

    if (!intact) {
      runs
        .filter((run) => run.length >= options.minBlockSize)
        .forEach((run) => insertByRank(queue, run));
      continue;
    }

    const contents = blockContents(index, block);
    if (!contents.some((content) => isSignificant(content, options))) {
      logger.debug(
        `Skipping trivial block ${block.sourceFile}:${block.sourceStart} (${block.length} lines)`
      );
      continue;
    }

    const sourceLineRange = { start: block.sourceStart, end: block.sourceStart + block.length - 1 };
    const targetLineRange = { start: block.targetStart, end: block.targetStart + block.length - 1 };

    consumed.consumeRange(LineSide.REMOVED, block.sourceFile, sourceLineRange);
    consumed.consumeRange(LineSide.ADDED, block.targetFile, targetLineRange);

    candidates.push({
      sourceFile: block.sourceFile,
      sourceLineRange,
      targetFile: block.targetFile,
      targetLineRange,
      matchedLineCount: block.length,
      score: scoreBlock(block.length, computeLineUniqueness(contents, index)),
    });
  }

  return candidates;
};
