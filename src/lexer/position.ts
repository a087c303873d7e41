export interface Position {
  line: number;
  column: number;
}

/** Mutable line/column counters owned by a single scanner. */
export class PositionTracker {
  private line: number = 1;
  private column: number = 1;

  reset(): void {
    this.line = 1;
    this.column = 1;
  }

  advanceColumn(): void {
    this.column++;
  }

  advanceLine(): void {
    this.line++;
    this.column = 1;
  }

  snapshot(): Position {
    return Object.freeze({ line: this.line, column: this.column });
  }
}
