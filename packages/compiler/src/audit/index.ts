export { Auditor, auditSource } from "./auditor.js";
export {
  auditRecord,
  defaultPatternChecks,
  dynamicImports,
  guardedImports,
  multipleEntryBlocks,
  relativeImports,
} from "./checks.js";
export { formatAuditRecord, formatAuditReport } from "./format.js";
export type {
  AuditContext,
  AuditFindingKind,
  AuditRecord,
  AuditReport,
  PatternCheck,
} from "./types.js";
