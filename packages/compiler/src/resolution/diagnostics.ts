import { diagnosticFromCode, type Diagnostic } from "../diagnostics/index.js";
import { getNode, type HirFragment } from "../hir/graph.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { CandidateOutcome, Resolution } from "./types.js";

const candidateNote = (
  outcome: CandidateOutcome,
  fragmentOf: (file: FileId) => HirFragment | undefined,
  build: (span: Diagnostic["span"]) => Diagnostic
): Diagnostic[] => {
  const declaration = fragmentOf(outcome.file)?.nodes.get(outcome.declaration);
  if (!declaration) return [];
  return [build({ file: outcome.file, ...declaration.span })];
};

/**
 * Diagnostics for the failed resolutions of a file. Spans come from the
 * current fragments, so records cached across edits report current text.
 */
export const resolutionDiagnostics = ({
  fragment,
  resolutions,
  fragmentOf,
}: {
  fragment: HirFragment;
  resolutions: ReadonlyMap<NodeId, Resolution>;
  fragmentOf: (file: FileId) => HirFragment | undefined;
}): Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  resolutions.forEach((resolution) => {
    const failure = resolution.failure;
    if (!failure) return;
    const span = { file: fragment.file, ...getNode(fragment, resolution.node).span };

    switch (failure.code) {
      case "RS0003": {
        const related = resolution.candidates.flatMap((outcome) => {
          if (outcome.accepted) return [];
          const { signature, reason } = outcome;
          return candidateNote(outcome, fragmentOf, (candidateSpan) =>
            diagnosticFromCode({
              code: "RS0003",
              params: { kind: "candidate", signature, reason },
              span: candidateSpan,
              severity: "note",
            })
          );
        });
        diagnostics.push(diagnosticFromCode({ code: failure.code, params: failure.params, span, related }));
        return;
      }
      case "RS0004": {
        const tied = new Set(failure.tied);
        const related = resolution.candidates.flatMap((outcome) =>
          tied.has(outcome.declaration)
            ? candidateNote(outcome, fragmentOf, (candidateSpan) =>
                diagnosticFromCode({
                  code: "RS0004",
                  params: { kind: "candidate", signature: outcome.signature },
                  span: candidateSpan,
                  severity: "note",
                })
              )
            : []
        );
        diagnostics.push(diagnosticFromCode({ code: failure.code, params: failure.params, span, related }));
        return;
      }
      case "RS0001":
        diagnostics.push(diagnosticFromCode({ code: failure.code, params: failure.params, span }));
        return;
      case "RS0002":
        diagnostics.push(diagnosticFromCode({ code: failure.code, params: failure.params, span }));
        return;
      case "RS0005":
        diagnostics.push(diagnosticFromCode({ code: failure.code, params: failure.params, span }));
        return;
    }
  });

  return diagnostics;
};
