import { hunkOrigin, splitLines } from '@/core/diff/hunk-builder';
import { TextDiff } from '@/core/diff/text-diff';
import type { DiffHunk, DiffLine, FileDiff } from '@/core/diff/types';
import { FileContentException, RediffException, toError } from '@/core/exceptions';
import { logger } from '@/utils/logger';
import type { ConsumedLines } from './consumed-lines';
import type { Rediffer } from './rediffer';
import { LineSide } from './types';

/**
 * A padded window of one file pair, with moved lines taken out.
 * `oldLineMap[i]` is the absolute old line number of residual old line
 * `i + 1`; likewise `newLineMap`.
 */
export interface ResidualRegion {
  readonly oldFrom: number;
  readonly oldTo: number;
  readonly newFrom: number;
  readonly newTo: number;
  readonly oldLineMap: readonly number[];
  readonly newLineMap: readonly number[];
  readonly oldText: string;
  readonly newText: string;
}

export interface RegionRediffOptions {
  contextLines: number;
  signal?: AbortSignal;
}

interface Span {
  oldFrom: number;
  oldTo: number;
  newFrom: number;
  newTo: number;
}

/**
 * Hunk spans padded by `contextLines` and clamped to the files, merged when
 * they touch on either side. Spans are inclusive and may be empty on one
 * side (`to < from`).
 */
export const computeRegionSpans = (
  hunks: readonly DiffHunk[],
  oldLength: number,
  newLength: number,
  contextLines: number
): Span[] => {
  const spans: Span[] = [];

  for (const hunk of hunks) {
    const { oldNext, newNext } = hunkOrigin(hunk);
    const span: Span = {
      oldFrom: Math.max(1, oldNext - contextLines),
      oldTo: Math.min(oldLength, oldNext + hunk.oldCount - 1 + contextLines),
      newFrom: Math.max(1, newNext - contextLines),
      newTo: Math.min(newLength, newNext + hunk.newCount - 1 + contextLines),
    };

    const last = spans[spans.length - 1];
    if (last && (span.oldFrom <= last.oldTo + 1 || span.newFrom <= last.newTo + 1)) {
      last.oldTo = Math.max(last.oldTo, span.oldTo);
      last.newTo = Math.max(last.newTo, span.newTo);
    } else {
      spans.push(span);
    }
  }

  return spans;
};

const joinLines = (lines: readonly string[]): string =>
  lines.length === 0 ? '' : lines.join('\n') + '\n';

const residualSide = (
  lines: readonly string[],
  from: number,
  to: number,
  moved: ReadonlySet<number>
): { map: number[]; text: string } => {
  const map: number[] = [];
  const kept: string[] = [];

  for (let lineNumber = from; lineNumber <= to; lineNumber++) {
    if (moved.has(lineNumber)) continue;
    map.push(lineNumber);
    kept.push(lines[lineNumber - 1] ?? '');
  }

  return { map, text: joinLines(kept) };
};

export const buildResidualRegions = (
  fileDiff: FileDiff,
  oldLines: readonly string[],
  newLines: readonly string[],
  consumed: ConsumedLines,
  contextLines: number
): ResidualRegion[] => {
  const movedOld = consumed.linesIn(LineSide.REMOVED, fileDiff.oldPath);
  const movedNew = consumed.linesIn(LineSide.ADDED, fileDiff.newPath);

  return computeRegionSpans(fileDiff.hunks, oldLines.length, newLines.length, contextLines).map(
    (span) => {
      const oldSide = residualSide(oldLines, span.oldFrom, span.oldTo, movedOld);
      const newSide = residualSide(newLines, span.newFrom, span.newTo, movedNew);
      return {
        ...span,
        oldLineMap: oldSide.map,
        newLineMap: newSide.map,
        oldText: oldSide.text,
        newText: newSide.text,
      };
    }
  );
};

/**
 * Fail when the supplied contents disagree with the lines the diff shows.
 */
const checkContents = (
  fileDiff: FileDiff,
  oldLines: readonly string[],
  newLines: readonly string[]
): void => {
  for (const hunk of fileDiff.hunks) {
    for (const line of hunk.lines) {
      if (line.oldLineNumber !== undefined && oldLines[line.oldLineNumber - 1] !== line.content) {
        throw new FileContentException(
          `old content of '${fileDiff.oldPath}' does not match the diff at line ${line.oldLineNumber}`,
          fileDiff.oldPath
        );
      }
      if (line.newLineNumber !== undefined && newLines[line.newLineNumber - 1] !== line.content) {
        throw new FileContentException(
          `new content of '${fileDiff.newPath}' does not match the diff at line ${line.newLineNumber}`,
          fileDiff.newPath
        );
      }
    }
  }
};

/**
 * Absolute line number for a residual-local "next line" position. A position
 * just past the last residual line maps to the line after it.
 */
const mapPosition = (map: readonly number[], localNext: number, regionFrom: number): number => {
  const mapped = map[localNext - 1];
  if (mapped !== undefined) return mapped;
  const last = map[map.length - 1];
  return last === undefined ? regionFrom : last + 1;
};

const remapNumber = (
  map: readonly number[],
  localNumber: number | undefined,
  side: string,
  filePath: string
): number | undefined => {
  if (localNumber === undefined) return undefined;
  const absolute = map[localNumber - 1];
  if (absolute === undefined) {
    throw new RediffException(
      `rediff returned ${side} line ${localNumber}, outside the ${map.length}-line residual`,
      filePath
    );
  }
  return absolute;
};

/**
 * Translate hunks numbered against a residual back to absolute line numbers,
 * splitting wherever the numbering skips over moved lines.
 */
export const remapResidualHunks = (
  region: ResidualRegion,
  hunks: readonly DiffHunk[],
  filePath: string
): DiffHunk[] => {
  const remapped: DiffHunk[] = [];

  for (const hunk of hunks) {
    const lines: DiffLine[] = hunk.lines.map((line) => ({
      type: line.type,
      content: line.content,
      oldLineNumber: remapNumber(region.oldLineMap, line.oldLineNumber, 'old', filePath),
      newLineNumber: remapNumber(region.newLineMap, line.newLineNumber, 'new', filePath),
    }));

    const origin = hunkOrigin(hunk);
    remapped.push(
      ...splitLines(
        lines,
        mapPosition(region.oldLineMap, origin.oldNext, region.oldFrom),
        mapPosition(region.newLineMap, origin.newNext, region.newFrom)
      )
    );
  }

  return remapped;
};

const compareHunks = (a: DiffHunk, b: DiffHunk): number => {
  const first = hunkOrigin(a);
  const second = hunkOrigin(b);
  return first.oldNext - second.oldNext || first.newNext - second.newNext;
};

/**
 * Re-diff one file pair with its moved lines taken out. Returned hunks carry
 * absolute line numbers, in ascending order.
 */
export const rediffFilePair = async (
  fileDiff: FileDiff,
  oldText: string,
  newText: string,
  consumed: ConsumedLines,
  rediffer: Rediffer,
  options: RegionRediffOptions
): Promise<DiffHunk[]> => {
  const oldLines = TextDiff.splitIntoLines(oldText);
  const newLines = TextDiff.splitIntoLines(newText);
  checkContents(fileDiff, oldLines, newLines);

  const regions = buildResidualRegions(
    fileDiff,
    oldLines,
    newLines,
    consumed,
    options.contextLines
  );
  const hunks: DiffHunk[] = [];

  for (const region of regions) {
    options.signal?.throwIfAborted();

    let residualHunks: DiffHunk[];
    try {
      residualHunks = await rediffer.rediff(region.oldText, region.newText, options.signal);
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw new RediffException(
        `rediff failed for '${fileDiff.newPath}': ${toError(error).message}`,
        fileDiff.newPath,
        toError(error)
      );
    }

    hunks.push(...remapResidualHunks(region, residualHunks, fileDiff.newPath));
  }

  logger.debug(
    `Re-diffed ${fileDiff.newPath}: ${regions.length} region(s), ${hunks.length} hunk(s)`
  );
  return hunks.sort(compareHunks);
};
