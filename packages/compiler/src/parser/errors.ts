export interface SourceLocation {
  filePath: string;
  /** Character offset into the module source. */
  index: number;
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

export class ParserSyntaxError extends Error {
  readonly location?: SourceLocation;

  constructor(message: string, location?: SourceLocation) {
    super(message);
    this.name = "ParserSyntaxError";
    this.location = location ? { ...location } : undefined;
  }
}

export const parserErrorLocation = (
  error: unknown,
): SourceLocation | undefined =>
  error instanceof ParserSyntaxError ? error.location : undefined;
