export * from "./ast.js";
export { CharStream } from "./char-stream.js";
export {
  ParserSyntaxError,
  parserErrorLocation,
  type SourceLocation,
} from "./errors.js";
export { Lexer, tokenize } from "./lexer.js";
export { parseModule } from "./parser.js";
export { Token, type TokenKind } from "./token.js";
