export const KEYWORDS: ReadonlySet<string> = new Set([
  "False",
  "None",
  "True",
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
]);

/** Sorted longest first so the lexer can take the first match. */
export const OPERATORS: readonly string[] = [
  "**=",
  "//=",
  ">>=",
  "<<=",
  "...",
  "->",
  ":=",
  "**",
  "//",
  ">>",
  "<<",
  "<=",
  ">=",
  "==",
  "!=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "@=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "@",
  "&",
  "|",
  "^",
  "~",
  "<",
  ">",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ":",
  ".",
  ";",
  "=",
];

export const AUGMENTED_ASSIGN_OPS: ReadonlySet<string> = new Set([
  "+=",
  "-=",
  "*=",
  "/=",
  "//=",
  "%=",
  "**=",
  ">>=",
  "<<=",
  "&=",
  "|=",
  "^=",
  "@=",
]);

export const COMPARISON_OPS: ReadonlySet<string> = new Set([
  "<",
  ">",
  "==",
  ">=",
  "<=",
  "!=",
]);

const OPENING_BRACKETS = new Set(["(", "[", "{"]);
const CLOSING_BRACKETS = new Set([")", "]", "}"]);

export const isOpeningBracket = (value: string) => OPENING_BRACKETS.has(value);
export const isClosingBracket = (value: string) => CLOSING_BRACKETS.has(value);

export const isIdentifierStart = (char: string) => /[\p{L}\p{Nl}_]/u.test(char);

export const isIdentifierPart = (char: string) =>
  /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]/u.test(char);

export const isDigit = (char: string | undefined) =>
  char !== undefined && char >= "0" && char <= "9";

export const isQuote = (char: string | undefined) =>
  char === "'" || char === '"';

/** Prefixes that may precede a string literal (case-insensitive). */
export const isStringPrefix = (value: string) =>
  /^(?:[rRuUbBfF]|[bB][rR]|[rR][bB]|[fF][rR]|[rR][fF])$/.test(value);

export const NUMBER_PATTERN =
  /(?:0[xX](?:_?[0-9a-fA-F])+|0[bB](?:_?[01])+|0[oO](?:_?[0-7])+|(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?)/y;
