export type MyersEdit = {
  type: 'insert' | 'delete' | 'equal';
  oldIndex: number;
  newIndex: number;
  length: number;
};

/**
 * Myers diff algorithm implementation
 *
 * This is the core algorithm used by Git for computing minimal diffs.
 * It finds the shortest edit script (SES) to transform one sequence into another.
 *
 * The algorithm works by:
 * 1. Walking the edit graph one edit distance D at a time, keeping the furthest
 *    reaching x for every diagonal k = x - y
 * 2. Following "snakes" of equal elements for free after every edit
 * 3. Backtracking through the recorded frontiers to reconstruct the edits
 *
 * Time complexity: O((M+N)D) where M,N are sequence lengths and D is the edit distance
 * Space complexity: O((M+N)D) for the recorded frontiers
 */
export class MyersDiff {
  /**
   * Compute the shortest edit script between two sequences
   */
  public diff<T>(
    oldSequence: readonly T[],
    newSequence: readonly T[],
    areEqual: (a: T, b: T) => boolean = (a, b) => a === b
  ): MyersEdit[] {
    const trace = this.findShortestPath(oldSequence, newSequence, areEqual);
    const edits = this.backtrack(trace, oldSequence.length, newSequence.length);
    return this.mergeConsecutiveOperations(edits);
  }

  /**
   * Forward pass. Returns one frontier snapshot per edit distance, taken
   * before that distance is explored.
   */
  private findShortestPath<T>(
    oldSequence: readonly T[],
    newSequence: readonly T[],
    areEqual: (a: T, b: T) => boolean
  ): Map<number, number>[] {
    const n = oldSequence.length;
    const m = newSequence.length;
    const frontier = new Map<number, number>([[1, 0]]);
    const trace: Map<number, number>[] = [];

    for (let d = 0; d <= n + m; d++) {
      trace.push(new Map(frontier));

      for (let k = -d; k <= d; k += 2) {
        let x = this.followsInsertion(frontier, k, d)
          ? this.reach(frontier, k + 1)
          : this.reach(frontier, k - 1) + 1;
        let y = x - k;

        while (x < n && y < m && this.equalAt(oldSequence, newSequence, x, y, areEqual)) {
          x++;
          y++;
        }

        frontier.set(k, x);

        if (x >= n && y >= m) {
          return trace;
        }
      }
    }

    return trace;
  }

  private backtrack(trace: Map<number, number>[], n: number, m: number): MyersEdit[] {
    const edits: MyersEdit[] = [];
    let x = n;
    let y = m;

    for (let d = trace.length - 1; d >= 0 && (x > 0 || y > 0); d--) {
      const frontier = trace[d] ?? new Map<number, number>();
      const k = x - y;
      const previousK = this.followsInsertion(frontier, k, d) ? k + 1 : k - 1;
      const previousX = this.reach(frontier, previousK);
      const previousY = previousX - previousK;

      while (x > previousX && y > previousY) {
        edits.push(this.myersEdit('equal', x - 1, y - 1, 1));
        x--;
        y--;
      }

      if (d > 0) {
        if (x === previousX) {
          edits.push(this.myersEdit('insert', x, y - 1, 1));
        } else {
          edits.push(this.myersEdit('delete', x - 1, y, 1));
        }
      }

      x = previousX;
      y = previousY;
    }

    return edits.reverse();
  }

  private equalAt<T>(
    oldSequence: readonly T[],
    newSequence: readonly T[],
    x: number,
    y: number,
    areEqual: (a: T, b: T) => boolean
  ): boolean {
    const a = oldSequence[x];
    const b = newSequence[y];
    return a !== undefined && b !== undefined && areEqual(a, b);
  }

  private followsInsertion(frontier: Map<number, number>, k: number, d: number): boolean {
    return k === -d || (k !== d && this.reach(frontier, k - 1) < this.reach(frontier, k + 1));
  }

  private reach(frontier: Map<number, number>, k: number): number {
    return frontier.get(k) ?? 0;
  }

  /**
   * Merge consecutive operations of the same type to create cleaner, more readable diffs
   */
  private mergeConsecutiveOperations(operations: MyersEdit[]): MyersEdit[] {
    const mergedOperations: MyersEdit[] = [];

    for (const nextOperation of operations) {
      const currentOperation = mergedOperations[mergedOperations.length - 1];
      const oldAdvance = currentOperation?.type === 'insert' ? 0 : currentOperation?.length ?? 0;
      const newAdvance = currentOperation?.type === 'delete' ? 0 : currentOperation?.length ?? 0;

      const canMerge =
        currentOperation !== undefined &&
        currentOperation.type === nextOperation.type &&
        currentOperation.oldIndex + oldAdvance === nextOperation.oldIndex &&
        currentOperation.newIndex + newAdvance === nextOperation.newIndex;

      if (canMerge) {
        currentOperation.length += nextOperation.length;
      } else {
        mergedOperations.push({ ...nextOperation });
      }
    }

    return mergedOperations;
  }

  private myersEdit(
    type: MyersEdit['type'],
    oldIndex: number,
    newIndex: number,
    length: number
  ): MyersEdit {
    return { type, oldIndex, newIndex, length };
  }
}
