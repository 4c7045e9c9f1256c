import { TextDiff } from '@/core/diff/text-diff';
import type { DiffHunk, DiffOptions } from '@/core/diff/types';

/**
 * Computes hunks between two texts. Numbers in the returned hunks are local
 * to the texts it was given. Implementations may be synchronous or not, and
 * should stop early once `signal` aborts.
 */
export interface Rediffer {
  rediff(oldText: string, newText: string, signal?: AbortSignal): DiffHunk[] | Promise<DiffHunk[]>;
}

/**
 * In-process rediffer built on the Myers line diff.
 */
export class MyersRediffer implements Rediffer {
  constructor(private readonly options: DiffOptions = {}) {}

  rediff(oldText: string, newText: string, signal?: AbortSignal): DiffHunk[] {
    signal?.throwIfAborted();
    const edits = TextDiff.computeLineDiff(oldText, newText, this.options);
    return TextDiff.createHunks(edits, this.options.contextLines ?? 3);
  }
}

/**
 * Adapt a plain function to the Rediffer interface.
 */
export const createRediffer = (rediff: Rediffer['rediff']): Rediffer => ({ rediff });
