import type { Diagnostic, DiagnosticSeverity, SourceSpan } from "@tessera/compiler";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  start: Position;
  end: Position;
  lineText: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

export type SourceLookup = (file: string) => string | undefined;

const clampIndex = (value: number, max: number): number => Math.min(Math.max(value, 0), max);

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
  for (let i = 1; i < starts.length; i += 1) {
    if ((starts[i] ?? 0) > index) break;
    line = i;
  }
  return { index, line: line + 1, column: index - (starts[line] ?? 0) };
};

const resolveSpanContext = (span: SourceSpan, sourceOf: SourceLookup): SpanContext | undefined => {
  const source = sourceOf(span.file);
  if (source === undefined) return undefined;

  const lineStarts = createLineStarts(source);
  const boundedStart = clampIndex(span.start, source.length);
  const boundedEnd = clampIndex(span.end, source.length);
  const start = positionAt(lineStarts, boundedStart);
  const end = positionAt(lineStarts, Math.max(boundedEnd, boundedStart));
  const lineText = source.split("\n")[start.line - 1] ?? "";

  return { start, end, lineText };
};

const colorForSeverity = (severity: DiagnosticSeverity): ((text: string) => string) => {
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
    severityLabel: (severity) => bold(colorForSeverity(severity)(severity.toUpperCase())),
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
}): string => {
  const { lineText, start, end } = span;
  const lineStartIndex = start.index - start.column;
  const lineEndIndex = lineStartIndex + lineText.length;
  // Multi-line spans are underlined to the end of their first line.
  const highlightEnd = Math.min(Math.max(end.index, start.index + 1), lineEndIndex);
  const pointerLength = Math.max(1, highlightEnd - start.index);
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(pointerLength)
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

const formatOne = ({
  diagnostic,
  sourceOf,
  color,
}: {
  diagnostic: Diagnostic;
  sourceOf: SourceLookup;
  color: Colorizer;
}): string => {
  const context = resolveSpanContext(diagnostic.span, sourceOf);
  const { file, start, end } = diagnostic.span;
  const location = context
    ? `${file}:${context.start.line}:${context.start.column + 1}`
    : `${file}:${start}-${end}`;
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${location} ${color.severityLabel(diagnostic.severity)}${phase} ${color.accent(
    diagnostic.code
  )}: ${diagnostic.message}`;
  const snippet = context ? formatSnippet({ diagnostic, span: context, color }) : undefined;

  return [header, snippet].filter((part) => part !== undefined).join("\n");
};

/** A diagnostic with its source line, followed by its related notes */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  { sourceOf, color = true }: { sourceOf: SourceLookup; color?: boolean }
): string => {
  const colorizer = createColorizer(color);
  return [diagnostic, ...(diagnostic.related ?? [])]
    .map((entry) => formatOne({ diagnostic: entry, sourceOf, color: colorizer }))
    .join("\n");
};
