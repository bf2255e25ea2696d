import { getDeclaration, type HirFragment } from "../hir/graph.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { GlobalScope } from "./global-scope.js";
import type { FileScopes } from "./lexical-scopes.js";
import { declarationSummary } from "./signature.js";

export type VisibleName = {
  name: string;
  summary: string;
  declaration: NodeId;
  file: FileId;
  scope: "lexical" | "global";
};

/**
 * Names visible at a node, innermost scope first. A name hidden by an inner
 * scope is listed once; overloads of one scope are listed together.
 */
export const visibleNames = ({
  fragment,
  scopes,
  global,
  at,
  fragmentOf,
  hiddenFiles = new Set<FileId>(),
}: {
  fragment: HirFragment;
  scopes: FileScopes;
  global: GlobalScope;
  /** Innermost node at the queried position */
  at?: NodeId;
  fragmentOf: (file: FileId) => HirFragment | undefined;
  /** Files whose global declarations are left out, such as the prelude */
  hiddenFiles?: ReadonlySet<FileId>;
}): VisibleName[] => {
  const visible: VisibleName[] = [];
  const hidden = new Set<string>();

  const lexical = at === undefined ? undefined : scopes.enclosing.get(at);
  if (lexical) {
    scopes.arena.chain(lexical).forEach((scope) => {
      const names = scopes.arena.names(scope).filter((name) => !hidden.has(name));
      names.forEach((name) => {
        scopes.arena.lookup(scope, name).forEach((id) => {
          visible.push({
            name,
            summary: declarationSummary(fragment, getDeclaration(fragment, id)),
            declaration: id,
            file: fragment.file,
            scope: "lexical",
          });
        });
      });
      names.forEach((name) => hidden.add(name));
    });
  }

  global.bindings.forEach((bindings, name) => {
    if (hidden.has(name)) return;
    bindings.forEach((binding) => {
      if (hiddenFiles.has(binding.file)) return;
      const owner = fragmentOf(binding.file);
      if (!owner) return;
      visible.push({
        name,
        summary: declarationSummary(owner, binding.declaration),
        declaration: binding.declaration.id,
        file: binding.file,
        scope: "global",
      });
    });
  });

  return visible;
};
