import { LineSide, type LineRange, type MoveCandidate } from './types';

/**
 * Lines already claimed by an accepted move, per side and file.
 * Each pipeline run owns its own instance.
 */
export class ConsumedLines {
  private readonly sides: Record<LineSide, Map<string, Set<number>>> = {
    [LineSide.REMOVED]: new Map(),
    [LineSide.ADDED]: new Map(),
  };

  static fromCandidates(candidates: readonly MoveCandidate[]): ConsumedLines {
    const consumed = new ConsumedLines();
    for (const candidate of candidates) {
      consumed.consumeRange(LineSide.REMOVED, candidate.sourceFile, candidate.sourceLineRange);
      consumed.consumeRange(LineSide.ADDED, candidate.targetFile, candidate.targetLineRange);
    }
    return consumed;
  }

  has(side: LineSide, filePath: string, lineNumber: number): boolean {
    return this.sides[side].get(filePath)?.has(lineNumber) ?? false;
  }

  consumeRange(side: LineSide, filePath: string, range: LineRange): void {
    let lines = this.sides[side].get(filePath);
    if (!lines) {
      lines = new Set();
      this.sides[side].set(filePath, lines);
    }
    for (let line = range.start; line <= range.end; line++) {
      lines.add(line);
    }
  }

  linesIn(side: LineSide, filePath: string): ReadonlySet<number> {
    return this.sides[side].get(filePath) ?? new Set();
  }

  get size(): number {
    let total = 0;
    for (const side of [LineSide.REMOVED, LineSide.ADDED]) {
      for (const lines of this.sides[side].values()) total += lines.size;
    }
    return total;
  }
}
