import type { Position } from './token';

/**
 * Maps character offsets in a template to line/column positions
 */
export class LineMap {
  // Offsets at which each line starts
  private readonly lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  /**
   * Get the position of a character offset
   */
  positionAt(index: number): Position {
    // Binary search for the last line starting at or before index
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= index) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return {
      line: low + 1,
      column: index - this.lineStarts[low],
      index,
    };
  }
}
