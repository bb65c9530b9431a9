import type { SourceLocation } from "./errors.js";

export class CharStream {
  readonly filePath: string;
  readonly source: string;
  /** Exclusive upper bound; sub-streams stop here instead of at EOF. */
  readonly limit: number;
  readonly location: { index: number; line: number; column: number };

  constructor(
    source: string,
    filePath: string,
    range: { start?: number; end?: number; line?: number; column?: number } = {},
  ) {
    this.source = source;
    this.filePath = filePath;
    this.limit = range.end ?? source.length;
    this.location = {
      index: range.start ?? 0,
      line: range.line ?? 1,
      column: range.column ?? 0,
    };
  }

  /** Current index the stream is on */
  get position() {
    return this.location.index;
  }

  get line() {
    return this.location.line;
  }

  get column() {
    return this.location.column;
  }

  get hasCharacters() {
    return this.position < this.limit;
  }

  get next(): string | undefined {
    return this.at(0);
  }

  currentSourceLocation(): SourceLocation {
    return {
      filePath: this.filePath,
      index: this.position,
      line: this.line,
      column: this.column,
    };
  }

  at(offset: number): string | undefined {
    const index = this.position + offset;
    return index < this.limit ? this.source[index] : undefined;
  }

  startsWith(text: string): boolean {
    return (
      this.position + text.length <= this.limit &&
      this.source.startsWith(text, this.position)
    );
  }

  /** Returns the next character and advances past it */
  consumeChar(): string {
    const char = this.next;
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.location.index += 1;
    this.location.column += 1;
    if (char === "\n") {
      this.location.line += 1;
      this.location.column = 0;
    }

    return char;
  }

  consumeChars(count: number): string {
    let text = "";
    for (let i = 0; i < count; i += 1) {
      text += this.consumeChar();
    }
    return text;
  }
}
