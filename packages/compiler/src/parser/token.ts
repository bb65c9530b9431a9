import type { SourceLocation } from "./errors.js";

export type TokenKind =
  | "name"
  | "number"
  | "string"
  | "op"
  | "newline"
  | "indent"
  | "dedent"
  | "end";

export class Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly location: SourceLocation;
  /** Exclusive end offset into the module source. */
  readonly end: number;

  constructor(opts: {
    kind: TokenKind;
    location: SourceLocation;
    end: number;
    value?: string;
  }) {
    this.kind = opts.kind;
    this.value = opts.value ?? "";
    this.location = opts.location;
    this.end = opts.end;
  }

  get start() {
    return this.location.index;
  }

  get line() {
    return this.location.line;
  }

  /** Matches operators and keywords by their spelling. */
  is(value: string): boolean {
    return (this.kind === "op" || this.kind === "name") && this.value === value;
  }

  isOp(value: string): boolean {
    return this.kind === "op" && this.value === value;
  }
}
