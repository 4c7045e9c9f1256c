import { MyersDiff, type MyersEdit } from './myers-diff';
import { createHunk } from './hunk-builder';
import { DiffOptions, DiffEdit, DiffOperation, DiffHunk, DiffLine, DiffLineType } from './types';

/**
 * TextDiff handles line-by-line diffing of text content
 */
export class TextDiff {
  /**
   * Compute line-by-line diff between two text strings
   */
  public static computeLineDiff(
    oldText: string,
    newText: string,
    options: DiffOptions = {}
  ): DiffEdit[] {
    const oldLines = this.splitIntoLines(oldText);
    const newLines = this.splitIntoLines(newText);

    const oldKeys = oldLines.map((line) => this.normalizeLine(line, options));
    const newKeys = newLines.map((line) => this.normalizeLine(line, options));

    const myersEdits = new MyersDiff().diff(oldKeys, newKeys);

    return this.convertMyersEdits(myersEdits, oldLines, newLines);
  }

  /**
   * Create unified diff format hunks
   */
  public static createHunks(edits: DiffEdit[], contextLines: number = 3): DiffHunk[] {
    const lines = this.numberLines(edits);
    const [firstChange, ...otherChanges] = lines
      .map((line, index) => (line.type === DiffLineType.CONTEXT ? -1 : index))
      .filter((index) => index >= 0);

    if (firstChange === undefined) return [];

    const hunks: DiffHunk[] = [];
    let hunkFrom = Math.max(0, firstChange - contextLines);
    let hunkTo = Math.min(lines.length - 1, firstChange + contextLines);

    for (const changeIndex of otherChanges) {
      const windowFrom = Math.max(0, changeIndex - contextLines);

      // Two changes share a hunk when their context windows touch
      if (windowFrom > hunkTo + 1) {
        hunks.push(this.sliceHunk(lines, hunkFrom, hunkTo));
        hunkFrom = windowFrom;
      }

      hunkTo = Math.min(lines.length - 1, changeIndex + contextLines);
    }

    hunks.push(this.sliceHunk(lines, hunkFrom, hunkTo));
    return hunks;
  }

  /**
   * Split text into lines, preserving empty lines. A carriage return stays
   * part of its line so contents compare equal to parsed diff lines.
   */
  public static splitIntoLines(text: string): string[] {
    if (text === '') return [];

    const lines = text.split('\n');

    // If text ends with newline, remove the empty last element
    if (text.endsWith('\n')) {
      lines.pop();
    }

    return lines;
  }

  /**
   * Normalize a line for comparison based on diff options
   */
  private static normalizeLine(line: string, options: DiffOptions): string {
    let normalized = line;

    if (options.ignoreCase) {
      normalized = normalized.toLowerCase();
    }

    if (options.ignoreWhitespace) {
      normalized = normalized.replace(/[ \t]+/g, ' ').trim();
    }

    return normalized;
  }

  /**
   * Convert Myers algorithm edits to our DiffEdit format
   */
  private static convertMyersEdits(
    myersEdits: MyersEdit[],
    oldLines: string[],
    newLines: string[]
  ): DiffEdit[] {
    return myersEdits.map(({ type, oldIndex, newIndex, length }) => {
      switch (type) {
        case 'equal':
          return {
            operation: DiffOperation.EQUAL,
            lines: oldLines.slice(oldIndex, oldIndex + length),
            oldIndex,
            newIndex,
          };
        case 'delete':
          return {
            operation: DiffOperation.DELETE,
            lines: oldLines.slice(oldIndex, oldIndex + length),
            oldIndex,
            newIndex,
          };
        case 'insert':
          return {
            operation: DiffOperation.INSERT,
            lines: newLines.slice(newIndex, newIndex + length),
            oldIndex,
            newIndex,
          };
      }
    });
  }

  /**
   * Flatten edits into numbered diff lines (1-based)
   */
  private static numberLines(edits: DiffEdit[]): DiffLine[] {
    const lines: DiffLine[] = [];

    for (const edit of edits) {
      edit.lines.forEach((content, offset) => {
        switch (edit.operation) {
          case DiffOperation.EQUAL:
            lines.push({
              type: DiffLineType.CONTEXT,
              content,
              oldLineNumber: edit.oldIndex + offset + 1,
              newLineNumber: edit.newIndex + offset + 1,
            });
            break;
          case DiffOperation.DELETE:
            lines.push({
              type: DiffLineType.REMOVED,
              content,
              oldLineNumber: edit.oldIndex + offset + 1,
            });
            break;
          case DiffOperation.INSERT:
            lines.push({
              type: DiffLineType.ADDED,
              content,
              newLineNumber: edit.newIndex + offset + 1,
            });
            break;
        }
      });
    }

    return lines;
  }

  private static sliceHunk(lines: DiffLine[], from: number, to: number): DiffHunk {
    const slice = lines.slice(from, to + 1);
    const { oldNext, newNext } = this.positionAt(lines, from);
    return createHunk(slice, oldNext, newNext);
  }

  /**
   * Old and new line numbers at an index of the flattened line list
   */
  private static positionAt(lines: DiffLine[], index: number): { oldNext: number; newNext: number } {
    let oldNext = 1;
    let newNext = 1;

    for (const line of lines.slice(0, index)) {
      if (line.oldLineNumber !== undefined) oldNext = line.oldLineNumber + 1;
      if (line.newLineNumber !== undefined) newNext = line.newLineNumber + 1;
    }

    return { oldNext, newNext };
  }
}
