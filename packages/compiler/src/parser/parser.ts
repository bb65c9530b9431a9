import {
  NodeStore,
  type ExprContext,
  type ImportAlias,
  type NamedSpan,
  type NodeId,
  type ParamKind,
  type SyntaxNode,
  type TextSpan,
} from "./ast.js";
import { CharStream } from "./char-stream.js";
import { ParserSyntaxError } from "./errors.js";
import {
  AUGMENTED_ASSIGN_OPS,
  COMPARISON_OPS,
  KEYWORDS,
  isClosingBracket,
  isOpeningBracket,
} from "./grammar.js";
import { Lexer } from "./lexer.js";
import type { Token } from "./token.js";

const EXPRESSION_TERMINATORS: ReadonlySet<string> = new Set([
  ")",
  "]",
  "}",
  "=",
  ":",
  ";",
]);

const BITOR = new Set(["|"]);
const BITXOR = new Set(["^"]);
const BITAND = new Set(["&"]);
const SHIFT = new Set(["<<", ">>"]);
const ARITH = new Set(["+", "-"]);
const TERM = new Set(["*", "/", "//", "%", "@"]);
const UNARY = new Set(["+", "-", "~"]);

const describeToken = (token: Token): string => {
  switch (token.kind) {
    case "newline":
      return "end of line";
    case "end":
      return "end of file";
    case "indent":
      return "indent";
    case "dedent":
      return "dedent";
    default:
      return `'${token.value}'`;
  }
};

const stringPrefixOf = (raw: string): string =>
  (/^[A-Za-z]*/.exec(raw)?.[0] ?? "").toLowerCase();

const quoteLengthOf = (raw: string, prefixLength: number): number => {
  const quote = raw[prefixLength];
  return raw.startsWith(`${quote}${quote}${quote}`, prefixLength) ? 3 : 1;
};

const stringContents = (raw: string): string => {
  const prefixLength = stringPrefixOf(raw).length;
  const quoteLength = quoteLengthOf(raw, prefixLength);
  return raw.slice(prefixLength + quoteLength, raw.length - quoteLength);
};

class Parser {
  private readonly store: NodeStore;
  private readonly tokens: Token[];
  private pos = 0;
  /** End offset of the last consumed source token. */
  private lastEnd = 0;

  constructor(store: NodeStore, tokens: Token[]) {
    this.store = store;
    this.tokens = tokens;
  }

  parseFile(): NodeId {
    const body: NodeId[] = [];
    while (this.current.kind !== "end") {
      if (this.current.kind === "newline") {
        this.advance();
        continue;
      }
      body.push(...this.parseStatement());
    }

    const root = this.add({
      kind: "module",
      body,
      span: { start: 0, end: this.store.source.length },
      line: 1,
    });
    this.store.setRoot(root);
    return root;
  }

  /** Entry point for f-string replacement fields. */
  parseStandaloneExpression(): NodeId {
    const expr = this.current.is("yield")
      ? this.parseYield()
      : this.parseStarExpressions();
    if (this.current.kind === "newline") this.advance();
    if (this.current.kind !== "end") {
      this.fail(`unexpected ${describeToken(this.current)} in f-string`);
    }
    return expr;
  }

  // Token cursor

  private get current(): Token {
    return this.peek(0);
  }

  private peek(offset: number): Token {
    const token =
      this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
    if (!token) {
      throw new Error("parser received an empty token stream");
    }
    return token;
  }

  private advance(): Token {
    const token = this.current;
    if (token.kind !== "end") this.pos += 1;
    if (
      token.kind !== "newline" &&
      token.kind !== "indent" &&
      token.kind !== "dedent" &&
      token.kind !== "end"
    ) {
      this.lastEnd = token.end;
    }
    return token;
  }

  private accept(value: string): Token | undefined {
    return this.current.is(value) ? this.advance() : undefined;
  }

  private expect(value: string): Token {
    const token = this.accept(value);
    if (!token) {
      this.fail(`expected '${value}', found ${describeToken(this.current)}`);
    }
    return token;
  }

  private isIdentifier(token: Token): boolean {
    return token.kind === "name" && !KEYWORDS.has(token.value);
  }

  private expectName(): Token {
    const token = this.current;
    if (!this.isIdentifier(token)) {
      this.fail(`expected identifier, found ${describeToken(token)}`);
    }
    return this.advance();
  }

  private expectNewline() {
    if (this.current.kind === "newline") {
      this.advance();
      return;
    }
    if (this.current.kind !== "end") {
      this.fail(`expected end of line, found ${describeToken(this.current)}`);
    }
  }

  private atStatementEnd(): boolean {
    const token = this.current;
    return token.kind === "newline" || token.kind === "end" || token.isOp(";");
  }

  private atExpressionEnd(): boolean {
    const token = this.current;
    if (token.kind === "newline" || token.kind === "end") return true;
    if (token.kind === "op") {
      return (
        EXPRESSION_TERMINATORS.has(token.value) ||
        AUGMENTED_ASSIGN_OPS.has(token.value)
      );
    }
    return token.is("in");
  }

  private fail(message: string, token: Token = this.current): never {
    throw new ParserSyntaxError(message, token.location);
  }

  private failAt(id: NodeId, message: string): never {
    const node = this.store.get(id);
    throw new ParserSyntaxError(message, {
      filePath: this.store.file,
      index: node.span.start,
      line: node.line,
      column: 0,
    });
  }

  // Node helpers

  private add(node: SyntaxNode): NodeId {
    return this.store.add(node);
  }

  private spanFrom(start: number | Token): TextSpan {
    const startIndex = typeof start === "number" ? start : start.start;
    return { start: startIndex, end: Math.max(this.lastEnd, startIndex) };
  }

  private startOf(id: NodeId): number {
    return this.store.get(id).span.start;
  }

  private lineOf(id: NodeId): number {
    return this.store.get(id).line;
  }

  private setContext(id: NodeId, ctx: ExprContext) {
    const node = this.store.get(id);
    switch (node.kind) {
      case "name":
      case "attribute":
      case "subscript":
        node.ctx = ctx;
        return;
      case "starred":
        node.ctx = ctx;
        this.setContext(node.value, ctx);
        return;
      case "tuple":
      case "list":
        node.ctx = ctx;
        node.elts.forEach((elt) => this.setContext(elt, ctx));
        return;
      default:
        this.failAt(
          id,
          ctx === "del"
            ? "cannot delete expression"
            : "cannot assign to expression",
        );
    }
  }

  // Statements

  private parseStatement(): NodeId[] {
    const token = this.current;
    if (token.kind === "indent") this.fail("unexpected indent");
    if (token.isOp("@")) return [this.parseDecorated()];

    if (token.kind === "name") {
      switch (token.value) {
        case "def":
          return [this.parseFunctionDef([], token, false)];
        case "class":
          return [this.parseClassDef([], token)];
        case "if":
          return [this.parseIf()];
        case "while":
          return [this.parseWhile()];
        case "for":
          return [this.parseFor(false, token)];
        case "try":
          return [this.parseTry()];
        case "with":
          return [this.parseWith(false, token)];
        case "async": {
          const next = this.peek(1);
          if (next.is("def")) return [this.parseFunctionDef([], token, true)];
          if (next.is("for")) return [this.parseFor(true, token)];
          if (next.is("with")) return [this.parseWith(true, token)];
          this.fail("expected 'def', 'for' or 'with' after 'async'");
        }
        case "match":
          if (this.looksLikeMatchStatement()) {
            this.fail("match statements are not supported");
          }
      }
    }

    return this.parseSimpleStatements();
  }

  private looksLikeMatchStatement(): boolean {
    const next = this.peek(1);
    if (
      next.kind === "newline" ||
      next.kind === "end" ||
      next.isOp("=") ||
      next.isOp(".") ||
      next.isOp(":") ||
      (next.kind === "op" && AUGMENTED_ASSIGN_OPS.has(next.value))
    ) {
      return false;
    }

    for (let i = this.pos + 1; i < this.tokens.length; i += 1) {
      const token = this.tokens[i];
      if (!token || token.kind === "end") return false;
      if (token.kind === "newline") {
        const before = this.tokens[i - 1];
        const after = this.tokens[i + 1];
        return Boolean(before?.isOp(":") && after?.kind === "indent");
      }
    }
    return false;
  }

  private parseDecorated(): NodeId {
    const first = this.current;
    const decorators: NodeId[] = [];
    while (this.accept("@")) {
      decorators.push(this.parseNamedExpr());
      this.expectNewline();
    }

    const token = this.current;
    if (token.is("def")) return this.parseFunctionDef(decorators, first, false);
    if (token.is("async") && this.peek(1).is("def")) {
      return this.parseFunctionDef(decorators, first, true);
    }
    if (token.is("class")) return this.parseClassDef(decorators, first);
    return this.fail("expected function or class definition after decorator");
  }

  private parseFunctionDef(
    decorators: NodeId[],
    start: Token,
    isAsync: boolean,
  ): NodeId {
    if (isAsync) this.advance();
    const defToken = this.expect("def");
    const nameToken = this.expectName();
    this.expect("(");
    const params = this.parseParams(")", true);
    this.expect(")");
    const returns = this.accept("->") ? this.parseExpression() : undefined;
    this.expect(":");
    const body = this.parseBlock();

    return this.add({
      kind: "function-def",
      name: nameToken.value,
      nameSpan: { start: nameToken.start, end: nameToken.end },
      isAsync,
      decorators,
      params,
      returns,
      body,
      span: this.spanFrom(start),
      line: defToken.line,
    });
  }

  private parseParams(closing: string, allowAnnotations: boolean): NodeId[] {
    const params: NodeId[] = [];
    let keywordOnly = false;

    const param = (start: Token, paramKind: ParamKind): NodeId => {
      const nameToken = this.expectName();
      const annotation =
        allowAnnotations && this.accept(":") ? this.parseExpression() : undefined;
      const defaultValue =
        paramKind === "positional" || paramKind === "keyword-only"
          ? this.accept("=")
            ? this.parseExpression()
            : undefined
          : undefined;
      return this.add({
        kind: "param",
        name: nameToken.value,
        paramKind,
        annotation,
        default: defaultValue,
        span: this.spanFrom(start),
        line: start.line,
      });
    };

    while (!this.current.isOp(closing)) {
      const token = this.current;
      if (token.isOp("/")) {
        this.advance();
      } else if (token.isOp("**")) {
        this.advance();
        params.push(param(token, "kwarg"));
      } else if (token.isOp("*")) {
        this.advance();
        keywordOnly = true;
        if (this.isIdentifier(this.current)) {
          params.push(param(token, "vararg"));
        }
      } else {
        params.push(param(token, keywordOnly ? "keyword-only" : "positional"));
      }

      if (!this.accept(",")) break;
    }

    return params;
  }

  private parseClassDef(decorators: NodeId[], start: Token): NodeId {
    const classToken = this.expect("class");
    const nameToken = this.expectName();
    let bases: NodeId[] = [];
    let keywords: NodeId[] = [];
    if (this.accept("(")) {
      ({ args: bases, keywords } = this.parseCallArguments());
      this.expect(")");
    }
    this.expect(":");
    const body = this.parseBlock();

    return this.add({
      kind: "class-def",
      name: nameToken.value,
      nameSpan: { start: nameToken.start, end: nameToken.end },
      decorators,
      bases,
      keywords,
      body,
      span: this.spanFrom(start),
      line: classToken.line,
    });
  }

  private parseBlock(): NodeId[] {
    if (this.peek(0).kind !== "newline") {
      return this.parseSimpleStatements();
    }

    this.advance();
    if (this.peek(0).kind !== "indent") {
      this.fail("expected an indented block");
    }
    this.advance();

    const body: NodeId[] = [];
    while (this.current.kind !== "dedent" && this.current.kind !== "end") {
      body.push(...this.parseStatement());
    }
    if (this.current.kind === "dedent") this.advance();
    return body;
  }

  private parseIf(): NodeId {
    const token = this.advance();
    const test = this.parseNamedExpr();
    this.expect(":");
    const body = this.parseBlock();

    let orelse: NodeId[] = [];
    if (this.current.is("elif")) {
      orelse = [this.parseIf()];
    } else if (this.accept("else")) {
      this.expect(":");
      orelse = this.parseBlock();
    }

    return this.add({
      kind: "if",
      test,
      body,
      orelse,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseElseBlock(): NodeId[] {
    if (!this.accept("else")) return [];
    this.expect(":");
    return this.parseBlock();
  }

  private parseWhile(): NodeId {
    const token = this.advance();
    const test = this.parseNamedExpr();
    this.expect(":");
    const body = this.parseBlock();
    const orelse = this.parseElseBlock();
    return this.add({
      kind: "while",
      test,
      body,
      orelse,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseFor(isAsync: boolean, start: Token): NodeId {
    if (isAsync) this.advance();
    const forToken = this.expect("for");
    const target = this.parseTargetList();
    this.expect("in");
    const iter = this.parseStarExpressions();
    this.expect(":");
    const body = this.parseBlock();
    const orelse = this.parseElseBlock();
    return this.add({
      kind: "for",
      isAsync,
      target,
      iter,
      body,
      orelse,
      span: this.spanFrom(start),
      line: forToken.line,
    });
  }

  private parseTry(): NodeId {
    const token = this.advance();
    this.expect(":");
    const body = this.parseBlock();

    const handlers: NodeId[] = [];
    while (this.current.is("except")) {
      const exceptToken = this.advance();
      this.accept("*");
      let type: NodeId | undefined;
      let name: NamedSpan | undefined;
      if (!this.current.isOp(":")) {
        type = this.parseExpression();
        if (this.accept("as")) {
          const nameToken = this.expectName();
          name = {
            name: nameToken.value,
            span: { start: nameToken.start, end: nameToken.end },
          };
        }
      }
      this.expect(":");
      const handlerBody = this.parseBlock();
      handlers.push(
        this.add({
          kind: "except-handler",
          type,
          name,
          body: handlerBody,
          span: this.spanFrom(exceptToken),
          line: exceptToken.line,
        }),
      );
    }

    const orelse = this.parseElseBlock();
    let finalbody: NodeId[] = [];
    if (this.accept("finally")) {
      this.expect(":");
      finalbody = this.parseBlock();
    }

    if (handlers.length === 0 && finalbody.length === 0) {
      this.fail("expected 'except' or 'finally' block");
    }

    return this.add({
      kind: "try",
      body,
      handlers,
      orelse,
      finalbody,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseWith(isAsync: boolean, start: Token): NodeId {
    if (isAsync) this.advance();
    const withToken = this.expect("with");
    const items: NodeId[] = [];

    if (this.current.isOp("(") && this.isParenthesizedWithItems()) {
      this.advance();
      while (!this.current.isOp(")")) {
        items.push(this.parseWithItem());
        if (!this.accept(",")) break;
      }
      this.expect(")");
    } else {
      do {
        items.push(this.parseWithItem());
      } while (this.accept(","));
    }

    this.expect(":");
    const body = this.parseBlock();
    return this.add({
      kind: "with",
      isAsync,
      items,
      body,
      span: this.spanFrom(start),
      line: withToken.line,
    });
  }

  private isParenthesizedWithItems(): boolean {
    let depth = 0;
    let sawItemSyntax = false;
    for (let i = this.pos; i < this.tokens.length; i += 1) {
      const token = this.tokens[i];
      if (!token || token.kind === "newline" || token.kind === "end") {
        return false;
      }
      if (token.kind === "op" && isOpeningBracket(token.value)) {
        depth += 1;
      } else if (token.kind === "op" && isClosingBracket(token.value)) {
        depth -= 1;
        if (depth === 0) {
          return sawItemSyntax && Boolean(this.tokens[i + 1]?.isOp(":"));
        }
      } else if (depth === 1 && (token.is("as") || token.isOp(","))) {
        sawItemSyntax = true;
      }
    }
    return false;
  }

  private parseWithItem(): NodeId {
    const start = this.current;
    const context = this.parseExpression();
    let target: NodeId | undefined;
    if (this.accept("as")) {
      target = this.parseTargetItem();
      this.setContext(target, "store");
    }
    return this.add({
      kind: "with-item",
      context,
      target,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseSimpleStatements(): NodeId[] {
    const statements = [this.parseSimpleStatement()];
    while (this.accept(";")) {
      if (this.current.kind === "newline" || this.current.kind === "end") break;
      statements.push(this.parseSimpleStatement());
    }
    this.expectNewline();
    return statements;
  }

  private parseSimpleStatement(): NodeId {
    const token = this.current;
    if (token.kind === "name") {
      switch (token.value) {
        case "pass":
        case "break":
        case "continue":
          this.advance();
          return this.add({
            kind: token.value,
            span: this.spanFrom(token),
            line: token.line,
          });
        case "return": {
          this.advance();
          const value = this.atStatementEnd()
            ? undefined
            : this.parseStarExpressions();
          return this.add({
            kind: "return",
            value,
            span: this.spanFrom(token),
            line: token.line,
          });
        }
        case "raise": {
          this.advance();
          const exc = this.atStatementEnd() ? undefined : this.parseExpression();
          const cause =
            exc !== undefined && this.accept("from")
              ? this.parseExpression()
              : undefined;
          return this.add({
            kind: "raise",
            exc,
            cause,
            span: this.spanFrom(token),
            line: token.line,
          });
        }
        case "global":
        case "nonlocal": {
          this.advance();
          const names: NamedSpan[] = [];
          do {
            const nameToken = this.expectName();
            names.push({
              name: nameToken.value,
              span: { start: nameToken.start, end: nameToken.end },
            });
          } while (this.accept(","));
          return this.add({
            kind: token.value,
            names,
            span: this.spanFrom(token),
            line: token.line,
          });
        }
        case "del": {
          this.advance();
          const targets: NodeId[] = [];
          do {
            if (this.atStatementEnd()) break;
            const target = this.parseBitOr();
            this.setContext(target, "del");
            targets.push(target);
          } while (this.accept(","));
          return this.add({
            kind: "delete",
            targets,
            span: this.spanFrom(token),
            line: token.line,
          });
        }
        case "assert": {
          this.advance();
          const test = this.parseExpression();
          const msg = this.accept(",") ? this.parseExpression() : undefined;
          return this.add({
            kind: "assert",
            test,
            msg,
            span: this.spanFrom(token),
            line: token.line,
          });
        }
        case "import":
          return this.parseImport();
        case "from":
          return this.parseFromImport();
      }
    }

    return this.parseExpressionStatement();
  }

  private parseDottedName(): string {
    const parts = [this.expectName().value];
    while (this.accept(".")) {
      parts.push(this.expectName().value);
    }
    return parts.join(".");
  }

  private parseImport(): NodeId {
    const token = this.advance();
    const names: ImportAlias[] = [];
    do {
      const start = this.current;
      const name = this.parseDottedName();
      const asname = this.accept("as") ? this.expectName().value : undefined;
      names.push({ name, asname, span: this.spanFrom(start) });
    } while (this.accept(","));

    return this.add({
      kind: "import",
      names,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseFromImport(): NodeId {
    const token = this.advance();
    let level = 0;
    while (this.current.isOp(".") || this.current.isOp("...")) {
      level += this.advance().value.length;
    }

    const module = this.current.is("import") ? undefined : this.parseDottedName();
    this.expect("import");

    const names: ImportAlias[] = [];
    let wildcard = false;
    if (this.accept("*")) {
      wildcard = true;
    } else {
      const parenthesized = this.accept("(") !== undefined;
      while (true) {
        const start = this.expectName();
        const asname = this.accept("as") ? this.expectName().value : undefined;
        names.push({ name: start.value, asname, span: this.spanFrom(start) });
        if (!this.accept(",")) break;
        if (parenthesized && this.current.isOp(")")) break;
      }
      if (parenthesized) this.expect(")");
    }

    if (module === undefined && level === 0) {
      this.fail("expected module name", token);
    }

    return this.add({
      kind: "import-from",
      module,
      level,
      names,
      wildcard,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseExpressionStatement(): NodeId {
    const start = this.current;
    const first = this.parseYieldOrStarExpressions();

    if (this.accept(":")) {
      this.setContext(first, "store");
      const annotation = this.parseExpression();
      const value = this.accept("=")
        ? this.parseYieldOrStarExpressions()
        : undefined;
      return this.add({
        kind: "ann-assign",
        target: first,
        annotation,
        value,
        span: this.spanFrom(start),
        line: start.line,
      });
    }

    const token = this.current;
    if (token.kind === "op" && AUGMENTED_ASSIGN_OPS.has(token.value)) {
      this.advance();
      this.setContext(first, "store");
      const value = this.parseYieldOrStarExpressions();
      return this.add({
        kind: "aug-assign",
        target: first,
        op: token.value,
        value,
        span: this.spanFrom(start),
        line: start.line,
      });
    }

    if (this.current.isOp("=")) {
      const chain = [first];
      while (this.accept("=")) {
        chain.push(this.parseYieldOrStarExpressions());
      }
      const value = chain.pop();
      if (value === undefined) this.fail("expected assignment value");
      chain.forEach((target) => this.setContext(target, "store"));
      return this.add({
        kind: "assign",
        targets: chain,
        value,
        span: this.spanFrom(start),
        line: start.line,
      });
    }

    return this.add({
      kind: "expr-stmt",
      value: first,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  // Expressions

  private parseYieldOrStarExpressions(): NodeId {
    return this.current.is("yield") ? this.parseYield() : this.parseStarExpressions();
  }

  private parseYield(): NodeId {
    const token = this.advance();
    if (this.accept("from")) {
      const value = this.parseExpression();
      return this.add({
        kind: "yield-from",
        value,
        span: this.spanFrom(token),
        line: token.line,
      });
    }
    const value = this.atExpressionEnd() ? undefined : this.parseStarExpressions();
    return this.add({
      kind: "yield",
      value,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  /** Comma-separated expressions forming an unparenthesized tuple. */
  private parseStarExpressions(): NodeId {
    const start = this.current;
    const first = this.parseStarOrNamed();
    if (!this.current.isOp(",")) return first;

    const elts = [first];
    while (this.accept(",")) {
      if (this.atExpressionEnd()) break;
      elts.push(this.parseStarOrNamed());
    }
    return this.add({
      kind: "tuple",
      elts,
      ctx: "load",
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseStarOrNamed(): NodeId {
    const token = this.current;
    if (!token.isOp("*")) return this.parseNamedExpr();
    this.advance();
    const value = this.parseBitOr();
    return this.add({
      kind: "starred",
      value,
      ctx: "load",
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  /** Assignment targets of `for` loops and comprehensions, up to `in`. */
  private parseTargetList(): NodeId {
    const start = this.current;
    const first = this.parseTargetItem();
    let target = first;
    if (this.current.isOp(",")) {
      const elts = [first];
      while (this.accept(",")) {
        if (this.current.is("in") || this.current.isOp("=")) break;
        elts.push(this.parseTargetItem());
      }
      target = this.add({
        kind: "tuple",
        elts,
        ctx: "load",
        span: this.spanFrom(start),
        line: start.line,
      });
    }
    this.setContext(target, "store");
    return target;
  }

  private parseTargetItem(): NodeId {
    const token = this.current;
    if (!token.isOp("*")) return this.parseBitOr();
    this.advance();
    const value = this.parseBitOr();
    return this.add({
      kind: "starred",
      value,
      ctx: "load",
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseNamedExpr(): NodeId {
    const token = this.current;
    if (!this.isIdentifier(token) || !this.peek(1).isOp(":=")) {
      return this.parseExpression();
    }

    this.advance();
    const target = this.add({
      kind: "name",
      id: token.value,
      ctx: "store",
      span: { start: token.start, end: token.end },
      line: token.line,
    });
    this.expect(":=");
    const value = this.parseExpression();
    return this.add({
      kind: "named-expr",
      target,
      value,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseExpression(): NodeId {
    if (this.current.is("lambda")) return this.parseLambda();

    const start = this.current;
    const body = this.parseDisjunction();
    if (!this.accept("if")) return body;

    const test = this.parseDisjunction();
    this.expect("else");
    const orelse = this.parseExpression();
    return this.add({
      kind: "if-exp",
      test,
      body,
      orelse,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseLambda(): NodeId {
    const token = this.advance();
    const params = this.parseParams(":", false);
    this.expect(":");
    const body = this.parseExpression();
    return this.add({
      kind: "lambda",
      params,
      body,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseBoolean(
    op: "and" | "or",
    next: () => NodeId,
  ): NodeId {
    const start = this.current;
    const first = next();
    if (!this.current.is(op)) return first;

    const values = [first];
    while (this.accept(op)) {
      values.push(next());
    }
    return this.add({
      kind: "bool-op",
      op,
      values,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseDisjunction(): NodeId {
    return this.parseBoolean("or", () => this.parseConjunction());
  }

  private parseConjunction(): NodeId {
    return this.parseBoolean("and", () => this.parseInversion());
  }

  private parseInversion(): NodeId {
    const token = this.current;
    if (!token.is("not")) return this.parseComparison();
    this.advance();
    const operand = this.parseInversion();
    return this.add({
      kind: "unary-op",
      op: "not",
      operand,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parseComparison(): NodeId {
    const start = this.current;
    const left = this.parseBitOr();
    const ops: string[] = [];
    const comparators: NodeId[] = [];

    while (true) {
      const token = this.current;
      let op: string;
      if (token.kind === "op" && COMPARISON_OPS.has(token.value)) {
        this.advance();
        op = token.value;
      } else if (token.is("in")) {
        this.advance();
        op = "in";
      } else if (token.is("not") && this.peek(1).is("in")) {
        this.advance();
        this.advance();
        op = "not in";
      } else if (token.is("is")) {
        this.advance();
        op = this.accept("not") ? "is not" : "is";
      } else {
        break;
      }
      ops.push(op);
      comparators.push(this.parseBitOr());
    }

    if (ops.length === 0) return left;
    return this.add({
      kind: "compare",
      left,
      ops,
      comparators,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseBinary(ops: ReadonlySet<string>, next: () => NodeId): NodeId {
    const start = this.current;
    let left = next();
    while (this.current.kind === "op" && ops.has(this.current.value)) {
      const op = this.advance().value;
      const right = next();
      left = this.add({
        kind: "bin-op",
        left,
        op,
        right,
        span: this.spanFrom(start),
        line: start.line,
      });
    }
    return left;
  }

  private parseBitOr(): NodeId {
    return this.parseBinary(BITOR, () => this.parseBitXor());
  }

  private parseBitXor(): NodeId {
    return this.parseBinary(BITXOR, () => this.parseBitAnd());
  }

  private parseBitAnd(): NodeId {
    return this.parseBinary(BITAND, () => this.parseShift());
  }

  private parseShift(): NodeId {
    return this.parseBinary(SHIFT, () => this.parseArith());
  }

  private parseArith(): NodeId {
    return this.parseBinary(ARITH, () => this.parseTerm());
  }

  private parseTerm(): NodeId {
    return this.parseBinary(TERM, () => this.parseFactor());
  }

  private parseFactor(): NodeId {
    const token = this.current;
    if (!(token.kind === "op" && UNARY.has(token.value))) {
      return this.parsePower();
    }
    this.advance();
    const operand = this.parseFactor();
    return this.add({
      kind: "unary-op",
      op: token.value,
      operand,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parsePower(): NodeId {
    const start = this.current;
    const base = this.parseAwaitPrimary();
    if (!this.accept("**")) return base;
    const exponent = this.parseFactor();
    return this.add({
      kind: "bin-op",
      left: base,
      op: "**",
      right: exponent,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseAwaitPrimary(): NodeId {
    const token = this.current;
    if (!token.is("await")) return this.parsePrimary();
    this.advance();
    const value = this.parsePrimary();
    return this.add({
      kind: "await",
      value,
      span: this.spanFrom(token),
      line: token.line,
    });
  }

  private parsePrimary(): NodeId {
    const start = this.current;
    let expr = this.parseAtom();

    while (true) {
      if (this.accept(".")) {
        const attrToken = this.expectName();
        expr = this.add({
          kind: "attribute",
          value: expr,
          attr: attrToken.value,
          attrSpan: { start: attrToken.start, end: attrToken.end },
          ctx: "load",
          span: this.spanFrom(start),
          line: start.line,
        });
      } else if (this.accept("(")) {
        const { args, keywords } = this.parseCallArguments();
        this.expect(")");
        expr = this.add({
          kind: "call",
          func: expr,
          args,
          keywords,
          span: this.spanFrom(start),
          line: start.line,
        });
      } else if (this.accept("[")) {
        const slice = this.parseSlices();
        this.expect("]");
        expr = this.add({
          kind: "subscript",
          value: expr,
          slice,
          ctx: "load",
          span: this.spanFrom(start),
          line: start.line,
        });
      } else {
        return expr;
      }
    }
  }

  private parseCallArguments(): { args: NodeId[]; keywords: NodeId[] } {
    const args: NodeId[] = [];
    const keywords: NodeId[] = [];

    while (!this.current.isOp(")")) {
      const token = this.current;
      if (token.isOp("*")) {
        args.push(this.parseStarOrNamed());
      } else if (token.isOp("**")) {
        this.advance();
        const value = this.parseExpression();
        keywords.push(
          this.add({
            kind: "keyword",
            value,
            span: this.spanFrom(token),
            line: token.line,
          }),
        );
      } else if (this.isIdentifier(token) && this.peek(1).isOp("=")) {
        this.advance();
        this.advance();
        const value = this.parseExpression();
        keywords.push(
          this.add({
            kind: "keyword",
            arg: token.value,
            value,
            span: this.spanFrom(token),
            line: token.line,
          }),
        );
      } else {
        let arg = this.parseNamedExpr();
        if (this.atComprehension()) {
          const generators = this.parseComprehensionClauses();
          arg = this.add({
            kind: "generator-exp",
            elt: arg,
            generators,
            span: this.spanFrom(this.startOf(arg)),
            line: this.lineOf(arg),
          });
        }
        args.push(arg);
      }

      if (!this.accept(",")) break;
    }

    return { args, keywords };
  }

  private parseSlices(): NodeId {
    const start = this.current;
    const first = this.parseSliceItem();
    if (!this.current.isOp(",")) return first;

    const elts = [first];
    while (this.accept(",")) {
      if (this.current.isOp("]")) break;
      elts.push(this.parseSliceItem());
    }
    return this.add({
      kind: "tuple",
      elts,
      ctx: "load",
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseSliceItem(): NodeId {
    const start = this.current;
    let lower: NodeId | undefined;
    if (!start.isOp(":")) {
      if (start.isOp("*")) return this.parseStarOrNamed();
      lower = this.parseNamedExpr();
      if (!this.current.isOp(":")) return lower;
    }

    this.expect(":");
    const atBoundary = () =>
      this.current.isOp("]") || this.current.isOp(",") || this.current.isOp(":");
    const upper = atBoundary() ? undefined : this.parseExpression();
    let step: NodeId | undefined;
    if (this.accept(":")) {
      step = atBoundary() ? undefined : this.parseExpression();
    }
    return this.add({
      kind: "slice",
      lower,
      upper,
      step,
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseAtom(): NodeId {
    const token = this.current;

    if (token.kind === "name") {
      const constKind =
        token.value === "None"
          ? "none"
          : token.value === "True"
            ? "true"
            : token.value === "False"
              ? "false"
              : undefined;
      if (constKind) {
        this.advance();
        return this.add({
          kind: "constant",
          constKind,
          raw: token.value,
          span: this.spanFrom(token),
          line: token.line,
        });
      }
      if (KEYWORDS.has(token.value)) {
        this.fail(`unexpected keyword '${token.value}'`);
      }
      this.advance();
      return this.add({
        kind: "name",
        id: token.value,
        ctx: "load",
        span: this.spanFrom(token),
        line: token.line,
      });
    }

    if (token.kind === "number") {
      this.advance();
      return this.add({
        kind: "constant",
        constKind: "number",
        raw: token.value,
        span: this.spanFrom(token),
        line: token.line,
      });
    }

    if (token.kind === "string") return this.parseStrings();

    if (token.isOp("...")) {
      this.advance();
      return this.add({
        kind: "constant",
        constKind: "ellipsis",
        raw: "...",
        span: this.spanFrom(token),
        line: token.line,
      });
    }

    if (token.isOp("(")) return this.parseParenthesized();
    if (token.isOp("[")) return this.parseListDisplay();
    if (token.isOp("{")) return this.parseBraceDisplay();

    return this.fail(`invalid syntax: unexpected ${describeToken(token)}`);
  }

  private atComprehension(): boolean {
    return (
      this.current.is("for") ||
      (this.current.is("async") && this.peek(1).is("for"))
    );
  }

  private parseComprehensionClauses(): NodeId[] {
    const generators: NodeId[] = [];
    while (this.atComprehension()) {
      const start = this.current;
      const isAsync = this.accept("async") !== undefined;
      this.expect("for");
      const target = this.parseTargetList();
      this.expect("in");
      const iter = this.parseDisjunction();
      const ifs: NodeId[] = [];
      while (this.accept("if")) {
        ifs.push(this.parseDisjunction());
      }
      generators.push(
        this.add({
          kind: "comprehension",
          isAsync,
          target,
          iter,
          ifs,
          span: this.spanFrom(start),
          line: start.line,
        }),
      );
    }
    return generators;
  }

  private parseParenthesized(): NodeId {
    const open = this.advance();
    if (this.accept(")")) {
      return this.add({
        kind: "tuple",
        elts: [],
        ctx: "load",
        span: this.spanFrom(open),
        line: open.line,
      });
    }

    if (this.current.is("yield")) {
      const value = this.parseYield();
      this.expect(")");
      return value;
    }

    const first = this.parseStarOrNamed();
    if (this.atComprehension()) {
      const generators = this.parseComprehensionClauses();
      this.expect(")");
      return this.add({
        kind: "generator-exp",
        elt: first,
        generators,
        span: this.spanFrom(open),
        line: open.line,
      });
    }

    if (this.accept(",")) {
      const elts = [first];
      while (!this.current.isOp(")")) {
        elts.push(this.parseStarOrNamed());
        if (!this.accept(",")) break;
      }
      this.expect(")");
      return this.add({
        kind: "tuple",
        elts,
        ctx: "load",
        span: this.spanFrom(open),
        line: open.line,
      });
    }

    this.expect(")");
    return first;
  }

  private parseListDisplay(): NodeId {
    const open = this.advance();
    const elts: NodeId[] = [];
    if (!this.current.isOp("]")) {
      const first = this.parseStarOrNamed();
      if (this.atComprehension()) {
        const generators = this.parseComprehensionClauses();
        this.expect("]");
        return this.add({
          kind: "list-comp",
          elt: first,
          generators,
          span: this.spanFrom(open),
          line: open.line,
        });
      }
      elts.push(first);
      while (this.accept(",")) {
        if (this.current.isOp("]")) break;
        elts.push(this.parseStarOrNamed());
      }
    }
    this.expect("]");
    return this.add({
      kind: "list",
      elts,
      ctx: "load",
      span: this.spanFrom(open),
      line: open.line,
    });
  }

  private parseBraceDisplay(): NodeId {
    const open = this.advance();
    if (this.accept("}")) {
      return this.add({
        kind: "dict",
        keys: [],
        values: [],
        span: this.spanFrom(open),
        line: open.line,
      });
    }

    if (this.current.isOp("**") || this.isDictEntryAhead()) {
      return this.parseDictRest(open);
    }

    const first = this.parseStarOrNamed();
    if (this.atComprehension()) {
      const generators = this.parseComprehensionClauses();
      this.expect("}");
      return this.add({
        kind: "set-comp",
        elt: first,
        generators,
        span: this.spanFrom(open),
        line: open.line,
      });
    }

    const elts = [first];
    while (this.accept(",")) {
      if (this.current.isOp("}")) break;
      elts.push(this.parseStarOrNamed());
    }
    this.expect("}");
    return this.add({
      kind: "set",
      elts,
      span: this.spanFrom(open),
      line: open.line,
    });
  }

  /** Looks for a top-level `:` before the first top-level `,` or `}`. */
  private isDictEntryAhead(): boolean {
    let depth = 0;
    for (let i = this.pos; i < this.tokens.length; i += 1) {
      const token = this.tokens[i];
      if (!token || token.kind === "end") return false;
      if (token.kind !== "op") continue;
      if (isOpeningBracket(token.value)) {
        depth += 1;
      } else if (isClosingBracket(token.value)) {
        if (depth === 0) return false;
        depth -= 1;
      } else if (depth === 0 && token.value === ",") {
        return false;
      } else if (depth === 0 && token.value === ":") {
        return true;
      }
    }
    return false;
  }

  private parseDictRest(open: Token): NodeId {
    const keys: (NodeId | undefined)[] = [];
    const values: NodeId[] = [];

    const parseEntry = () => {
      if (this.accept("**")) {
        keys.push(undefined);
        values.push(this.parseBitOr());
        return;
      }
      keys.push(this.parseExpression());
      this.expect(":");
      values.push(this.parseExpression());
    };

    parseEntry();
    const firstKey = keys[0];
    const firstValue = values[0];
    if (
      firstKey !== undefined &&
      firstValue !== undefined &&
      this.atComprehension()
    ) {
      const generators = this.parseComprehensionClauses();
      this.expect("}");
      return this.add({
        kind: "dict-comp",
        key: firstKey,
        value: firstValue,
        generators,
        span: this.spanFrom(open),
        line: open.line,
      });
    }

    while (this.accept(",")) {
      if (this.current.isOp("}")) break;
      parseEntry();
    }
    this.expect("}");
    return this.add({
      kind: "dict",
      keys,
      values,
      span: this.spanFrom(open),
      line: open.line,
    });
  }

  // Strings

  private parseStrings(): NodeId {
    const start = this.current;
    const parts: Token[] = [];
    while (this.current.kind === "string") {
      parts.push(this.advance());
    }

    const prefixes = parts.map((part) => stringPrefixOf(part.value));
    if (prefixes.some((prefix) => prefix.includes("f"))) {
      const values = parts.flatMap((part, index) => {
        const prefix = prefixes[index] ?? "";
        return prefix.includes("f") ? this.parseFStringFields(part, prefix) : [];
      });
      return this.add({
        kind: "f-string",
        values,
        span: this.spanFrom(start),
        line: start.line,
      });
    }

    return this.add({
      kind: "constant",
      constKind: prefixes[0]?.includes("b") ? "bytes" : "string",
      raw: this.store.source.slice(start.start, this.lastEnd),
      text: parts.map((part) => stringContents(part.value)).join(""),
      span: this.spanFrom(start),
      line: start.line,
    });
  }

  private parseFStringFields(token: Token, prefix: string): NodeId[] {
    const quoteLength = quoteLengthOf(token.value, prefix.length);
    const scanner = new FStringScanner({
      store: this.store,
      token,
      raw: prefix.includes("r"),
    });
    return scanner.scan(
      token.start + prefix.length + quoteLength,
      token.end - quoteLength,
    );
  }
}

/**
 * Finds the replacement fields of one f-string literal and parses each
 * expression in place, so node spans point into the original source.
 */
class FStringScanner {
  private readonly store: NodeStore;
  private readonly source: string;
  private readonly token: Token;
  private readonly raw: boolean;
  private readonly ids: NodeId[] = [];

  constructor({
    store,
    token,
    raw,
  }: {
    store: NodeStore;
    token: Token;
    raw: boolean;
  }) {
    this.store = store;
    this.source = store.source;
    this.token = token;
    this.raw = raw;
  }

  scan(start: number, end: number): NodeId[] {
    let index = start;
    while (index < end) {
      const char = this.source[index];
      if (char === "\\" && !this.raw) {
        if (this.source.startsWith("N{", index + 1)) {
          const close = this.source.indexOf("}", index);
          index = close < 0 ? end : close + 1;
        } else {
          index += 2;
        }
        continue;
      }
      if (char === "{") {
        if (this.source[index + 1] === "{") {
          index += 2;
          continue;
        }
        index = this.scanField(index + 1, end);
        continue;
      }
      index += 1;
    }
    return this.ids;
  }

  /** Parses one field starting after `{`; returns the index after `}`. */
  private scanField(open: number, end: number): number {
    let index = open;
    let depth = 0;
    while (index < end) {
      const char = this.source[index];
      if (char === "'" || char === '"') {
        index = this.skipString(index, end);
        continue;
      }
      if (char === "(" || char === "[" || char === "{") {
        depth += 1;
      } else if (char === ")" || char === "]" || char === "}") {
        if (depth === 0) break;
        depth -= 1;
      } else if (depth === 0) {
        if (char === "!" && this.source[index + 1] !== "=") break;
        if (char === ":") break;
      }
      index += 1;
    }

    const expressionEnd = this.trimDebugSpecifier(open, index);
    if (this.source.slice(open, expressionEnd).trim().length === 0) {
      this.fail("f-string: empty expression not allowed");
    }
    this.ids.push(this.parseExpression(open, expressionEnd));

    if (this.source[index] === "!") index += 2;
    if (this.source[index] === ":") {
      index += 1;
      while (index < end && this.source[index] !== "}") {
        if (this.source[index] === "{") {
          index = this.scanField(index + 1, end);
          continue;
        }
        index += 1;
      }
    }

    if (this.source[index] !== "}") {
      this.fail("f-string: expecting '}'");
    }
    return index + 1;
  }

  private trimDebugSpecifier(start: number, end: number): number {
    let last = end - 1;
    while (last >= start && /\s/.test(this.source[last] ?? "")) last -= 1;
    if (this.source[last] !== "=") return end;
    const before = this.source[last - 1];
    if (before === "=" || before === "!" || before === "<" || before === ">") {
      return end;
    }
    return last;
  }

  private skipString(start: number, end: number): number {
    const quote = this.source[start] ?? "";
    const triple = this.source.startsWith(quote.repeat(3), start);
    const delimiter = triple ? quote.repeat(3) : quote;
    let index = start + delimiter.length;
    while (index < end) {
      if (this.source[index] === "\\") {
        index += 2;
        continue;
      }
      if (this.source.startsWith(delimiter, index)) {
        return index + delimiter.length;
      }
      index += 1;
    }
    return end;
  }

  private lineAt(index: number): number {
    let line = this.token.line;
    for (let i = this.token.start; i < index; i += 1) {
      if (this.source[i] === "\n") line += 1;
    }
    return line;
  }

  private parseExpression(start: number, end: number): NodeId {
    const chars = new CharStream(this.source, this.store.file, {
      start,
      end,
      line: this.lineAt(start),
    });
    const tokens = new Lexer(chars, { implicitJoin: true }).tokenize();
    return new Parser(this.store, tokens).parseStandaloneExpression();
  }

  private fail(message: string): never {
    throw new ParserSyntaxError(message, this.token.location);
  }
}

export const parseModule = (source: string, file: string): NodeStore => {
  const store = new NodeStore({ file, source });
  const tokens = new Lexer(new CharStream(source, file)).tokenize();
  new Parser(store, tokens).parseFile();
  return store;
};
