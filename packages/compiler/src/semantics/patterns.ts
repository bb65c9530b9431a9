import type { NodeId, NodeStore } from "../parser/index.js";

const ACCESSOR_DECORATORS = new Set(["setter", "getter", "deleter"]);

/** `@overload`, `@typing.overload` and `@prop.setter` style decorators. */
export const isExemptDecorator = (store: NodeStore, id: NodeId): boolean => {
  const node = store.get(id);
  if (node.kind === "name") return node.id === "overload";
  if (node.kind !== "attribute") return false;
  if (node.attr === "overload") return true;
  return (
    ACCESSOR_DECORATORS.has(node.attr) && store.get(node.value).kind === "name"
  );
};

const isStringConstant = (store: NodeStore, id: NodeId, text?: string) => {
  const node = store.get(id);
  return (
    node.kind === "constant" &&
    node.constKind === "string" &&
    (text === undefined || node.text === text)
  );
};

const isNameNode = (store: NodeStore, id: NodeId, name: string) => {
  const node = store.get(id);
  return node.kind === "name" && node.id === name;
};

/** `if __name__ == "__main__":`, either operand order. */
export const isEntryBlock = (store: NodeStore, id: NodeId): boolean => {
  const node = store.get(id);
  if (node.kind !== "if") return false;
  const test = store.get(node.test);
  if (test.kind !== "compare" || test.ops.length !== 1 || test.ops[0] !== "==") {
    return false;
  }
  const right = test.comparators[0];
  if (right === undefined) return false;
  return (
    (isNameNode(store, test.left, "__name__") &&
      isStringConstant(store, right, "__main__")) ||
    (isStringConstant(store, test.left, "__main__") &&
      isNameNode(store, right, "__name__"))
  );
};

/** A string expression statement opening the module body. */
export const isModuleDocstring = (store: NodeStore, id: NodeId): boolean => {
  if (store.body[0] !== id) return false;
  const node = store.get(id);
  return node.kind === "expr-stmt" && isStringConstant(store, node.value);
};

export const isFutureImport = (store: NodeStore, id: NodeId): boolean => {
  const node = store.get(id);
  return (
    node.kind === "import-from" && node.level === 0 && node.module === "__future__"
  );
};

export const isDunder = (name: string): boolean =>
  name.length > 4 && name.startsWith("__") && name.endsWith("__");

/** A string annotation that spells a dotted name, such as `"models.User"`. */
export interface StringAnnotation {
  node: NodeId;
  segments: readonly string[];
  /** Source offset of the first segment, inside the quotes. */
  start: number;
}

const DOTTED_NAME = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const STRING_OPENER = /^[rRuU]?(?:"""|'''|"|')$/;

const annotationsOf = (store: NodeStore, id: NodeId): NodeId[] => {
  const node = store.get(id);
  switch (node.kind) {
    case "function-def":
      return node.returns === undefined ? [] : [node.returns];
    case "param":
    case "ann-assign":
      return node.annotation === undefined ? [] : [node.annotation];
    default:
      return [];
  }
};

/** Forward references written as strings anywhere in a statement. */
export const stringAnnotations = (store: NodeStore, statement: NodeId): StringAnnotation[] =>
  Array.from(store.descendants(statement))
    .flatMap((id) => annotationsOf(store, id))
    .flatMap((id): StringAnnotation[] => {
      const node = store.get(id);
      if (node.kind !== "constant" || node.constKind !== "string") return [];
      const { raw, text } = node;
      if (text === undefined || !DOTTED_NAME.test(text)) return [];
      const closing = raw.endsWith('"""') || raw.endsWith("'''") ? 3 : 1;
      const offset = raw.length - closing - text.length;
      if (offset < 0 || !STRING_OPENER.test(raw.slice(0, offset))) return [];
      return [{ node: id, segments: text.split("."), start: node.span.start + offset }];
    });
