import type { Diagnostic as CompilerDiagnostic } from "@tessera/compiler";
import {
  DiagnosticSeverity,
  type Diagnostic,
  type DiagnosticRelatedInformation,
} from "vscode-languageserver/lib/node/main.js";
import { toFileUri } from "./files.js";
import { spanRange, type LineIndex } from "./text.js";

const diagnosticSeverity = (severity: CompilerDiagnostic["severity"]): DiagnosticSeverity => {
  switch (severity) {
    case "error":
      return DiagnosticSeverity.Error;
    case "warning":
      return DiagnosticSeverity.Warning;
    default:
      return DiagnosticSeverity.Information;
  }
};

/**
 * Protocol diagnostics for `file`. Diagnostics located in other files of the
 * include closure are left to those files; related notes keep their file.
 */
export const toProtocolDiagnostics = ({
  file,
  diagnostics,
  lineIndexOf,
}: {
  file: string;
  diagnostics: readonly CompilerDiagnostic[];
  lineIndexOf: (file: string) => LineIndex | undefined;
}): Diagnostic[] => {
  const lineIndex = lineIndexOf(file);
  return diagnostics.flatMap((diagnostic) => {
    if (diagnostic.span.file !== file) return [];
    const range = spanRange({ span: diagnostic.span, lineIndex });
    if (!range) return [];

    const relatedInformation = (diagnostic.related ?? []).flatMap(
      (note): DiagnosticRelatedInformation[] => {
        const noteRange = spanRange({ span: note.span, lineIndex: lineIndexOf(note.span.file) });
        return noteRange
          ? [{ location: { uri: toFileUri(note.span.file), range: noteRange }, message: note.message }]
          : [];
      }
    );

    return [
      {
        range,
        code: diagnostic.code,
        source: "tessera",
        message: diagnostic.message,
        severity: diagnosticSeverity(diagnostic.severity),
        ...(relatedInformation.length > 0 ? { relatedInformation } : {}),
      },
    ];
  });
};
