/**
 * Forward-only cursor over the code points of a source string.
 * `peek` looks any distance ahead without consuming; only `next` commits.
 */
export class CharCursor {
  private readonly chars: string[];
  private index: number = 0;

  constructor(source: string) {
    this.chars = Array.from(source);
  }

  next(): string | undefined {
    if (this.index >= this.chars.length) return undefined;
    return this.chars[this.index++];
  }

  peek(distance: number = 0): string | undefined {
    return this.chars[this.index + distance];
  }

  isAtEnd(): boolean {
    return this.index >= this.chars.length;
  }
}
