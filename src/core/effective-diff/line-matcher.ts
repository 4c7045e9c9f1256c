import type { LineMatch, TaggedLine } from './types';

/**
 * Line positions keyed by file path, then line number.
 */
class PositionIndex {
  private readonly byFile = new Map<string, Map<number, TaggedLine>>();

  constructor(lines: readonly TaggedLine[]) {
    for (const line of lines) {
      let byLine = this.byFile.get(line.filePath);
      if (!byLine) {
        byLine = new Map();
        this.byFile.set(line.filePath, byLine);
      }
      byLine.set(line.lineNumber, line);
    }
  }

  at(filePath: string, lineNumber: number): TaggedLine | undefined {
    return this.byFile.get(filePath)?.get(lineNumber);
  }
}

/**
 * Index added lines by exact content. Each list keeps extraction order.
 */
export const buildAddedIndex = (addedLines: readonly TaggedLine[]): Map<string, TaggedLine[]> => {
  const index = new Map<string, TaggedLine[]>();

  for (const line of addedLines) {
    const positions = index.get(line.content);
    if (positions) {
      positions.push(line);
    } else {
      index.set(line.content, [line]);
    }
  }

  return index;
};

/**
 * Every removed line paired with every added line of byte-identical content,
 * anywhere in the diff. Nothing is filtered here: blank lines and lone braces
 * match like any other line and are judged later, per block.
 *
 * Pairs are produced on demand; repeated lines pair off quadratically.
 */
export class LineMatchIndex {
  private readonly addedByContent: Map<string, TaggedLine[]>;
  private readonly removedPositions: PositionIndex;
  private readonly addedPositions: PositionIndex;

  constructor(
    public readonly removedLines: readonly TaggedLine[],
    public readonly addedLines: readonly TaggedLine[]
  ) {
    this.addedByContent = buildAddedIndex(addedLines);
    this.removedPositions = new PositionIndex(removedLines);
    this.addedPositions = new PositionIndex(addedLines);
  }

  *matches(): Generator<LineMatch> {
    for (const removed of this.removedLines) {
      for (const added of this.candidatesFor(removed)) {
        yield { removed, added };
      }
    }
  }

  get matchCount(): number {
    return this.removedLines.reduce((sum, removed) => sum + this.candidatesFor(removed).length, 0);
  }

  candidatesFor(removed: TaggedLine): readonly TaggedLine[] {
    return this.addedByContent.get(removed.content) ?? [];
  }

  /** How many added lines carry this content. */
  addedFrequency(content: string): number {
    return this.addedByContent.get(content)?.length ?? 0;
  }

  removedAt(filePath: string, lineNumber: number): TaggedLine | undefined {
    return this.removedPositions.at(filePath, lineNumber);
  }

  addedAt(filePath: string, lineNumber: number): TaggedLine | undefined {
    return this.addedPositions.at(filePath, lineNumber);
  }
}
