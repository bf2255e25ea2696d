import type { Diagnostic } from "../diagnostics/index.js";
import type { HirFragment } from "../hir/graph.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { SyntaxTree } from "../syntax/cst.js";
import { LoweringContext } from "./context.js";
import type { IdentityStats, IdentityTable, NodeIdAllocator } from "./identity.js";
import { lowerItem } from "./items.js";
import type { SourceMap } from "./source-map.js";

export type LoweredFile = {
  fragment: HirFragment;
  sourceMap: SourceMap;
  /** Feed back as `previous` on the next lowering of the same file */
  identities: IdentityTable;
  diagnostics: readonly Diagnostic[];
  stats: IdentityStats;
};

/**
 * Lowers a CST into an HIR fragment. Never throws on malformed input: each
 * ERROR item becomes an `error` item, each ERROR body a `missing`
 * expression, and every parser record an SX0001 diagnostic.
 */
export const lowerFile = ({
  file,
  tree,
  allocator,
  previous,
}: {
  file: FileId;
  tree: SyntaxTree;
  allocator: NodeIdAllocator;
  previous?: IdentityTable;
}): LoweredFile => {
  const ctx = new LoweringContext({ file, allocator, previous });
  const pending = [...tree.errors];
  const roots: NodeId[] = [];

  tree.root.children.forEach((child) => {
    if (!child.named) return;
    if (!child.isError) {
      roots.push(lowerItem(ctx, child));
      return;
    }

    // The failing token may sit just past the recovered region (EOF, or the
    // next item keyword), so fall back to the first record after its start.
    const contained = pending.findIndex(
      (record) =>
        record.span.start >= child.span.start && record.span.start <= child.span.end
    );
    const following = pending.findIndex((record) => record.span.start >= child.span.start);
    const index = contained >= 0 ? contained : Math.max(following, 0);
    const record = pending.length > 0 ? pending.splice(index, 1)[0] : undefined;
    const diagnostic = record ? ctx.reportRecord(record) : undefined;
    roots.push(lowerItem(ctx, child, diagnostic));
  });

  pending.forEach((record) => ctx.reportRecord(record));

  return {
    fragment: ctx.fragment(roots),
    sourceMap: ctx.sourceMap,
    identities: ctx.identities(),
    diagnostics: ctx.diagnostics,
    stats: ctx.stats(),
  };
};
