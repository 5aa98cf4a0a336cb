import type { SourceSpan } from "../diagnostics/index.js";

export interface SourcePosition {
  index: number;
  line: number;
  column: number;
}

const isSurrogatePair = (high: string, low: string | undefined): boolean => {
  const highCode = high.charCodeAt(0);
  const lowCode = low?.charCodeAt(0) ?? 0;
  return highCode >= 0xd800 && highCode <= 0xdbff && lowCode >= 0xdc00 && lowCode <= 0xdfff;
};

export class CharStream {
  readonly filePath: string;
  readonly contents: string;
  private readonly location: SourcePosition = {
    index: 0,
    line: 1,
    column: 1,
  };

  constructor(contents: string, filePath: string) {
    this.contents = contents;
    this.filePath = filePath;
  }

  /** Current index the file is on */
  get position() {
    return this.location.index;
  }

  get hasCharacters() {
    return this.position < this.contents.length;
  }

  get next(): string | undefined {
    return this.contents[this.position];
  }

  at(offset: number): string | undefined {
    return this.contents[this.position + offset];
  }

  mark(): SourcePosition {
    return { ...this.location };
  }

  spanFrom(start: SourcePosition): SourceSpan {
    return {
      file: this.filePath,
      start: start.index,
      end: this.position,
      line: start.line,
      column: start.column,
    };
  }

  textFrom(start: SourcePosition): string {
    return this.contents.slice(start.index, this.position);
  }

  /**
   * Returns the next character and removes it from the queue. A surrogate
   * pair is one character: columns count code points.
   */
  consumeChar(): string {
    const first = this.contents[this.position];
    if (first === undefined) {
      throw new Error("Out of characters");
    }

    const char = isSurrogatePair(first, this.at(1))
      ? this.contents.slice(this.position, this.position + 2)
      : first;
    this.location.index += char.length;
    this.location.column += 1;
    if (char === "\n") {
      this.location.line += 1;
      this.location.column = 1;
    }

    return char;
  }
}
