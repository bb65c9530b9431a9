import type { AuditRecord, AuditReport } from "./types.js";

const formatLines = (lines: readonly number[]) =>
  lines.length === 1 ? `line ${lines[0]}` : `lines ${lines.join(", ")}`;

export const formatAuditRecord = (record: AuditRecord): string => {
  const marker = record.severity === "error" ? "✗" : "⚠";
  return `${marker} ${record.code} ${record.message} (${formatLines(record.lines)})`;
};

export const formatAuditReport = (report: AuditReport): string => {
  if (report.errors.length === 0 && report.warnings.length === 0) {
    return "✓ Audit passed: no issues found";
  }

  const sections: string[] = [];
  if (report.errors.length > 0) {
    sections.push(["=== Errors ===", ...report.errors.map(formatAuditRecord)].join("\n"));
  }
  if (report.warnings.length > 0) {
    sections.push(
      ["=== Warnings ===", ...report.warnings.map(formatAuditRecord)].join("\n"),
    );
  }
  return sections.join("\n\n");
};
