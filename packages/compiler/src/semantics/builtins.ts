import builtinData from "./builtins.json" with { type: "json" };

/** Names every module sees without binding them. */
const BUILTINS = new Set<string>([
  ...builtinData.functions,
  ...builtinData.types,
  ...builtinData.exceptions,
  ...builtinData.constants,
  ...builtinData.moduleAttributes,
  ...builtinData.implicit,
]);

export const isBuiltin = (name: string): boolean => BUILTINS.has(name);
