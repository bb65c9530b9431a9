export * from "./types.js";
export { SymbolTable } from "./symbol-table.js";
