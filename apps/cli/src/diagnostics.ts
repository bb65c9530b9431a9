import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@pyfuse/compiler";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  path: string;
  start: Position;
  end: Position;
  lineText?: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

export type SourceReader = (path: string) => string | undefined;

export type FormatCliDiagnosticOptions = {
  color?: boolean;
  /** Directory that relative span files are resolved against. */
  root?: string;
  readSource?: SourceReader;
};

const readFromDisk: SourceReader = (path) => {
  try {
    return readFileSync(path, "utf8");
  } catch {
    return undefined;
  }
};

const clampIndex = (value: number, max: number): number => {
  if (value < 0) return 0;
  if (value > max) return max;
  return value;
};

const createLineStarts = (source: string): number[] => {
  const starts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
};

const positionAt = (starts: readonly number[], index: number): Position => {
  let line = 0;
  starts.forEach((start, candidate) => {
    if (start <= index) line = candidate;
  });
  const lineStart = starts[line] ?? 0;
  return { index, line: line + 1, column: index - lineStart };
};

const spanPath = (span: SourceSpan, root?: string) =>
  isAbsolute(span.file) ? span.file : resolve(root ?? ".", span.file);

const resolveSpanContext = ({
  span,
  root,
  readSource,
}: {
  span: SourceSpan;
  root?: string;
  readSource: SourceReader;
}): SpanContext | undefined => {
  const path = spanPath(span, root);
  const source = readSource(path);
  if (source === undefined) return undefined;

  const lineStarts = createLineStarts(source);
  const boundedStart = clampIndex(span.start, source.length);
  const boundedEnd = clampIndex(span.end, source.length);
  const start = positionAt(lineStarts, boundedStart);
  const end = positionAt(lineStarts, Math.max(boundedEnd, boundedStart));
  const lineText = source.split("\n")[start.line - 1];

  return { path, start, end, lineText };
};

const colorForSeverity = (
  severity: DiagnosticSeverity,
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    pointer: (severity, text) => colorForSeverity(severity)(text),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

const formatSnippet = ({
  diagnostic,
  span,
  color,
}: {
  diagnostic: Diagnostic;
  span: SpanContext;
  color: Colorizer;
}): string | undefined => {
  if (span.lineText === undefined) return undefined;

  const { lineText, start, end } = span;
  const lineStartIndex = start.index - start.column;
  const lineEndIndex = lineStartIndex + lineText.length;
  const highlightEnd = Math.min(Math.max(end.index, start.index + 1), lineEndIndex);
  const pointerLength = Math.max(1, highlightEnd - start.index);
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength),
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

const formatLocation = ({
  span,
  context,
  root,
}: {
  span: SourceSpan;
  context?: SpanContext;
  root?: string;
}): string => {
  if (context) {
    return `${context.path}:${context.start.line}:${context.start.column + 1}`;
  }
  const path = spanPath(span, root);
  return span.line === undefined ? `${path}:${span.start}-${span.end}` : `${path}:${span.line}`;
};

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: FormatCliDiagnosticOptions = {},
): string => {
  const color = createColorizer(options.color ?? true);
  const readSource = options.readSource ?? readFromDisk;
  const context = resolveSpanContext({
    span: diagnostic.span,
    root: options.root,
    readSource,
  });
  const location = formatLocation({ span: diagnostic.span, context, root: options.root });
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(
    diagnostic.severity,
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const snippet = context ? formatSnippet({ diagnostic, span: context, color }) : undefined;
  const related = (diagnostic.related ?? []).map((note) =>
    formatCliDiagnostic(note, options),
  );
  const hints = (diagnostic.hints ?? []).map((hint) => color.muted(`hint: ${hint.message}`));

  return [header, snippet, ...related, ...hints]
    .filter((part): part is string => Boolean(part))
    .join("\n");
};
