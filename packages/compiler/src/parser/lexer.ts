import { Token, type TokenKind } from "./token.js";
import { CharStream } from "./char-stream.js";
import { ParserSyntaxError, type SourceLocation } from "./errors.js";
import {
  NUMBER_PATTERN,
  OPERATORS,
  isClosingBracket,
  isDigit,
  isIdentifierPart,
  isIdentifierStart,
  isOpeningBracket,
  isQuote,
  isStringPrefix,
} from "./grammar.js";

const TAB_WIDTH = 8;

/**
 * Turns source text into a flat token list, synthesizing NEWLINE, INDENT and
 * DEDENT tokens from the physical layout. Newlines inside brackets are
 * joined; `implicitJoin` starts the stream as if inside a bracket, which is
 * how f-string replacement fields are lexed.
 */
export class Lexer {
  private readonly chars: CharStream;
  private readonly tokens: Token[] = [];
  private readonly indents: number[] = [0];
  private depth: number;
  private atLineStart: boolean;
  private lineHasTokens = false;

  constructor(chars: CharStream, opts: { implicitJoin?: boolean } = {}) {
    this.chars = chars;
    this.depth = opts.implicitJoin ? 1 : 0;
    this.atLineStart = !opts.implicitJoin;
  }

  tokenize(): Token[] {
    const chars = this.chars;

    while (chars.hasCharacters) {
      if (this.atLineStart) {
        this.consumeIndentation();
        continue;
      }

      const char = chars.next;
      if (char === undefined) break;

      if (char === " " || char === "\t" || char === "\f" || char === "\r") {
        chars.consumeChar();
        continue;
      }

      if (char === "#") {
        this.skipComment();
        continue;
      }

      if (char === "\\" && this.nextIsLineBreak(1)) {
        chars.consumeChar();
        if (chars.next === "\r") chars.consumeChar();
        chars.consumeChar();
        continue;
      }

      if (char === "\n") {
        const start = chars.currentSourceLocation();
        chars.consumeChar();
        if (this.depth > 0) continue;
        if (this.lineHasTokens) {
          this.push("newline", start, "\n");
        }
        this.atLineStart = true;
        this.lineHasTokens = false;
        continue;
      }

      if (isQuote(char)) {
        this.consumeString(chars.currentSourceLocation());
        continue;
      }

      if (isDigit(char) || (char === "." && isDigit(chars.at(1)))) {
        this.consumeNumber();
        continue;
      }

      if (isIdentifierStart(char)) {
        this.consumeName();
        continue;
      }

      this.consumeOperator(char);
    }

    const end = chars.currentSourceLocation();
    if (this.lineHasTokens) {
      this.push("newline", end, "");
    }
    while (this.indents.length > 1) {
      this.indents.pop();
      this.push("dedent", end);
    }
    this.push("end", end);
    return this.tokens;
  }

  private push(kind: TokenKind, location: SourceLocation, value?: string) {
    this.tokens.push(
      new Token({ kind, location, value, end: this.chars.position }),
    );
    if (kind !== "newline" && kind !== "indent" && kind !== "dedent") {
      this.lineHasTokens = true;
    }
  }

  private nextIsLineBreak(offset: number): boolean {
    const char = this.chars.at(offset);
    return char === "\n" || (char === "\r" && this.chars.at(offset + 1) === "\n");
  }

  private skipComment() {
    while (this.chars.hasCharacters && this.chars.next !== "\n") {
      this.chars.consumeChar();
    }
  }

  private consumeIndentation() {
    const chars = this.chars;
    let width = 0;

    while (chars.hasCharacters) {
      const char = chars.next;
      if (char === " ") {
        width += 1;
      } else if (char === "\t") {
        width = (Math.floor(width / TAB_WIDTH) + 1) * TAB_WIDTH;
      } else if (char === "\f") {
        width = 0;
      } else {
        break;
      }
      chars.consumeChar();
    }

    const char = chars.next;
    if (char === undefined) return;

    // Blank and comment-only lines never affect indentation.
    if (char === "#" || char === "\n" || char === "\r") {
      this.skipComment();
      if (chars.next === "\r") chars.consumeChar();
      if (chars.next === "\n") chars.consumeChar();
      return;
    }

    this.atLineStart = false;
    const location = chars.currentSourceLocation();
    const current = this.indents.at(-1) ?? 0;

    if (width > current) {
      this.indents.push(width);
      this.push("indent", location);
      return;
    }

    while (width < (this.indents.at(-1) ?? 0)) {
      this.indents.pop();
      this.push("dedent", location);
    }

    if (width !== (this.indents.at(-1) ?? 0)) {
      throw new ParserSyntaxError(
        "unindent does not match any outer indentation level",
        location,
      );
    }
  }

  private consumeName() {
    const chars = this.chars;
    const start = chars.currentSourceLocation();
    let name = chars.consumeChar();

    while (chars.hasCharacters) {
      const char = chars.next;
      if (char === undefined || !isIdentifierPart(char)) break;
      name += chars.consumeChar();
    }

    if (isStringPrefix(name) && isQuote(chars.next)) {
      this.consumeString(start);
      return;
    }

    this.push("name", start, name);
  }

  /** Consumes a string literal whose prefix (if any) starts at `start`. */
  private consumeString(start: SourceLocation) {
    const chars = this.chars;
    const quote = chars.consumeChar();
    const triple = chars.next === quote && chars.at(1) === quote;
    if (triple) chars.consumeChars(2);

    while (true) {
      const char = chars.next;
      if (char === undefined) {
        throw new ParserSyntaxError("unterminated string literal", start);
      }

      if (char === "\\") {
        chars.consumeChar();
        if (chars.hasCharacters) chars.consumeChar();
        continue;
      }

      if (triple) {
        if (chars.startsWith(quote.repeat(3))) {
          chars.consumeChars(3);
          break;
        }
      } else if (char === quote) {
        chars.consumeChar();
        break;
      } else if (char === "\n") {
        throw new ParserSyntaxError("unterminated string literal", start);
      }

      chars.consumeChar();
    }

    this.push("string", start, chars.source.slice(start.index, chars.position));
  }

  private consumeNumber() {
    const chars = this.chars;
    const start = chars.currentSourceLocation();
    NUMBER_PATTERN.lastIndex = chars.position;
    const match = NUMBER_PATTERN.exec(chars.source);
    if (!match || match[0].length === 0) {
      throw new ParserSyntaxError("invalid number literal", start);
    }
    this.push("number", start, chars.consumeChars(match[0].length));
  }

  private consumeOperator(char: string) {
    const chars = this.chars;
    const start = chars.currentSourceLocation();
    const op = OPERATORS.find((candidate) => chars.startsWith(candidate));
    if (!op) {
      throw new ParserSyntaxError(`invalid character '${char}'`, start);
    }

    chars.consumeChars(op.length);
    if (isOpeningBracket(op)) {
      this.depth += 1;
    } else if (isClosingBracket(op)) {
      if (this.depth === 0) {
        throw new ParserSyntaxError(`unmatched '${op}'`, start);
      }
      this.depth -= 1;
    }
    this.push("op", start, op);
  }
}

export const tokenize = (source: string, filePath: string): Token[] =>
  new Lexer(new CharStream(source, filePath)).tokenize();
