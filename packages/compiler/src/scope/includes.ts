import { diagnosticFromCode, type Diagnostic } from "../diagnostics/index.js";
import { getItem, type HirFragment } from "../hir/graph.js";
import type { FileId, NodeId, TextSpan } from "../hir/ids.js";

/** Injected lookup for `include "path"` items */
export type IncludeResolver = (fromFile: FileId, includePath: string) => FileId | undefined;

export type IncludeEdge = {
  item: NodeId;
  path: string;
  span: TextSpan;
  /** Absent when the include could not be resolved */
  target?: FileId;
};

export type FileIncludes = {
  file: FileId;
  edges: readonly IncludeEdge[];
  diagnostics: readonly Diagnostic[];
};

export const resolveIncludes = ({
  fragment,
  resolveInclude,
  isKnown,
}: {
  fragment: HirFragment;
  resolveInclude: IncludeResolver;
  /** Whether the workspace holds text for a resolved file */
  isKnown: (file: FileId) => boolean;
}): FileIncludes => {
  const edges: IncludeEdge[] = [];
  const diagnostics: Diagnostic[] = [];

  fragment.roots.forEach((root) => {
    const item = getItem(fragment, root);
    if (item.itemKind !== "include") return;
    const resolved = resolveInclude(fragment.file, item.path);
    const target = resolved !== undefined && isKnown(resolved) ? resolved : undefined;
    edges.push({ item: item.id, path: item.path, span: item.span, target });
    if (target === undefined) {
      diagnostics.push(
        diagnosticFromCode({
          code: "SC0002",
          params: { kind: "unresolved-include", path: item.path },
          span: { file: fragment.file, ...item.span },
        })
      );
    }
  });

  return { file: fragment.file, edges, diagnostics };
};

/**
 * Files whose top-level declarations are visible from `entry`: the prelude,
 * then a depth-first pre-order walk of the include graph. Every file appears
 * once, so cycles and repeated includes contribute nothing extra.
 */
export const includeClosure = ({
  entry,
  prelude,
  includesOf,
}: {
  entry: FileId;
  prelude?: FileId;
  includesOf: (file: FileId) => readonly IncludeEdge[];
}): FileId[] => {
  const order: FileId[] = [];
  const seen = new Set<FileId>();
  const visit = (file: FileId): void => {
    if (seen.has(file)) return;
    seen.add(file);
    order.push(file);
    includesOf(file).forEach((edge) => {
      if (edge.target !== undefined) visit(edge.target);
    });
  };

  if (prelude !== undefined) visit(prelude);
  visit(entry);
  return order;
};
