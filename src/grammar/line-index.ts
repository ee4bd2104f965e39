/**
 * Offset → line/column lookup (1-based lines, 1-based columns)
 */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      const char = text[i];
      if (char === "\r") {
        if (text[i + 1] === "\n") i++;
        this.starts.push(i + 1);
      } else if (char === "\n") {
        this.starts.push(i + 1);
      }
    }
  }

  position(offset: number): { line: number; column: number } {
    let low = 0;
    let high = this.starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.starts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { line: low + 1, column: offset - this.starts[low] + 1 };
  }

  /** Offset of the first character of a 1-based line */
  lineStart(line: number): number {
    return this.starts[line - 1] ?? this.starts[this.starts.length - 1];
  }
}
