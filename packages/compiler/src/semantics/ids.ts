/**
 * Identifier aliases shared by the catalog, resolver and merge phases. Scope
 * and symbol ids index into one module's symbol table; they are only
 * meaningful next to the module id that owns them.
 */
export type { NodeId } from "../parser/ast.js";
export type ScopeId = number;
export type SymbolId = number;

export type ModuleId = string;

/** Names one symbol anywhere in the program. */
export interface SymbolRef {
  moduleId: ModuleId;
  symbol: SymbolId;
}

export const symbolRefKey = (ref: SymbolRef): string =>
  `${ref.moduleId}#${ref.symbol}`;

export const sameSymbolRef = (left: SymbolRef, right: SymbolRef): boolean =>
  left.moduleId === right.moduleId && left.symbol === right.symbol;

export type { SourceSpan } from "../diagnostics/index.js";
