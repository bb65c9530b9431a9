import type { TextSpan } from "../../parser/ast.js";
import type { NodeId, ScopeId, SymbolId } from "../ids.js";

export type ScopeKind = "module" | "class" | "function" | "comprehension";

export type SymbolKind =
  | "function"
  | "class"
  | "variable"
  | "import"
  | "parameter";

/**
 * `definition` bindings come from a definition statement written directly in
 * the scope body. Everything else (loop targets, `with`/`except` names,
 * augmented assignment, walrus targets, bindings nested in compound
 * statements) is a `statement` binding and only rebinds the name.
 */
export type BindingRole = "definition" | "statement";

export type DeclarationKind = "global" | "nonlocal";

export interface ScopeInfo {
  id: ScopeId;
  parent: ScopeId | null;
  kind: ScopeKind;
  owner: NodeId;
  /** Class or function name; `<module>`, `<lambda>` or `<comprehension>`. */
  name: string;
}

export interface ImportBinding {
  form: "import" | "from";
  /** Module path as written, without the leading dots of a relative import. */
  module: string;
  level: number;
  /** Imported name of a `from` import. */
  name?: string;
  asname?: string;
}

export interface SymbolRecord {
  id: SymbolId;
  name: string;
  kind: SymbolKind;
  scope: ScopeId;
  /** def/class node, name node, param node, handler or import statement. */
  declaredAt: NodeId;
  /** Module-level statement that contains the binding. */
  topLevel: NodeId;
  role: BindingRole;
  line: number;
  span: TextSpan;
  import?: ImportBinding;
  /** Right-hand side of a plain `name = value` binding. */
  value?: NodeId;
  /** `@overload` variants and property accessors never count as duplicates. */
  exempt?: boolean;
}

export interface SymbolTableInit {
  /** Node that owns the root scope, the module node. */
  rootOwner: NodeId;
}
