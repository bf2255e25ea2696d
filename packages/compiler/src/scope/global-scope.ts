import {
  DiagnosticEmitter,
  type Diagnostic,
  type DiagnosticParams,
} from "../diagnostics/index.js";
import { topLevelDeclarations, type HirFragment } from "../hir/graph.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { DeclKind, HirDeclaration } from "../hir/nodes.js";
import { walkHir } from "../hir/walk.js";
import { describeDeclKind, relatedNote } from "./lexical-scopes.js";
import { declarationSummary, parameterSignature } from "./signature.js";

export type GlobalBinding = {
  file: FileId;
  declaration: HirDeclaration;
};

/** A declaration that could not join the namespace */
export type GlobalConflict = {
  binding: GlobalBinding;
  previous: GlobalBinding;
  params: DiagnosticParams<"SC0001">;
};

/** Top-level namespace of one entry file and everything it includes */
export interface GlobalScope {
  entry: FileId;
  closure: readonly FileId[];
  bindings: ReadonlyMap<string, readonly GlobalBinding[]>;
  conflicts: readonly GlobalConflict[];
  /** Type aliases that expand back to themselves */
  cycles: readonly GlobalBinding[];
  diagnostics: readonly Diagnostic[];
}

const overloadable: ReadonlySet<DeclKind> = new Set<DeclKind>([
  "function",
  "predicate",
  "test",
  "annotation",
]);

export const isOverloadable = (declaration: HirDeclaration): boolean =>
  overloadable.has(declaration.declKind);

const scopeDiagnostics = (
  conflicts: readonly GlobalConflict[],
  cycles: readonly GlobalBinding[]
): Diagnostic[] => {
  const diagnostics = new DiagnosticEmitter();
  conflicts.forEach(({ binding, previous, params }) => {
    diagnostics.reportCode({
      code: "SC0001",
      params,
      span: { file: binding.file, ...binding.declaration.span },
      related: [relatedNote(previous.file, previous.declaration.span)],
    });
  });
  cycles.forEach(({ file, declaration }) => {
    diagnostics.reportCode({
      code: "SC0003",
      params: { kind: "cyclic-alias", name: declaration.name ?? "_" },
      span: { file, ...declaration.span },
    });
  });
  return [...diagnostics.diagnostics];
};

const aliasTargets = (fragment: HirFragment, alias: HirDeclaration): string[] => {
  if (alias.aliased === undefined) return [];
  const names: string[] = [];
  walkHir({
    fragment,
    roots: [alias.aliased],
    enter: (node) => {
      if (node.kind === "expression" && node.exprKind === "identifier") names.push(node.name);
    },
  });
  return names;
};

const cyclicAliases = (
  bindings: ReadonlyMap<string, readonly GlobalBinding[]>,
  fragmentOf: (file: FileId) => HirFragment | undefined
): GlobalBinding[] => {
  const aliasNamed = (name: string): GlobalBinding[] => {
    const found = bindings.get(name) ?? [];
    const [only] = found;
    return found.length === 1 && only?.declaration.declKind === "type-alias" ? [only] : [];
  };

  const aliases: GlobalBinding[] = [];
  const edges = new Map<NodeId, GlobalBinding[]>();
  bindings.forEach((list) =>
    list.forEach((binding) => {
      if (binding.declaration.declKind !== "type-alias") return;
      const fragment = fragmentOf(binding.file);
      aliases.push(binding);
      edges.set(
        binding.declaration.id,
        fragment ? aliasTargets(fragment, binding.declaration).flatMap(aliasNamed) : []
      );
    })
  );

  return aliases.filter((alias) => {
    const seen = new Set<NodeId>();
    const pending = [...(edges.get(alias.declaration.id) ?? [])];
    while (pending.length > 0) {
      const next = pending.pop();
      if (!next) break;
      const id = next.declaration.id;
      if (id === alias.declaration.id) return true;
      if (seen.has(id)) continue;
      seen.add(id);
      pending.push(...(edges.get(id) ?? []));
    }
    return false;
  });
};

export const buildGlobalScope = ({
  entry,
  closure,
  fragmentOf,
}: {
  entry: FileId;
  closure: readonly FileId[];
  fragmentOf: (file: FileId) => HirFragment | undefined;
}): GlobalScope => {
  const bindings = new Map<string, GlobalBinding[]>();
  const conflicts: GlobalConflict[] = [];

  closure.forEach((file) => {
    const fragment = fragmentOf(file);
    if (!fragment) return;

    topLevelDeclarations(fragment).forEach((declaration) => {
      const name = declaration.name;
      if (name === undefined || name === "") return;
      const binding: GlobalBinding = { file, declaration };
      const existing = bindings.get(name);
      if (!existing) {
        bindings.set(name, [binding]);
        return;
      }

      const first = existing[0];
      if (
        first &&
        (!isOverloadable(declaration) || !isOverloadable(first.declaration))
      ) {
        conflicts.push({
          binding,
          previous: first,
          params: {
            kind: "duplicate-declaration",
            name,
            previousKind: describeDeclKind(first.declaration),
          },
        });
        return;
      }

      const signature = parameterSignature(fragment, declaration);
      const clash = existing.find((other) => {
        const otherFragment = fragmentOf(other.file);
        return (
          otherFragment !== undefined &&
          other.declaration.body !== undefined &&
          declaration.body !== undefined &&
          other.declaration.declKind === declaration.declKind &&
          parameterSignature(otherFragment, other.declaration) === signature
        );
      });
      if (clash) {
        conflicts.push({
          binding,
          previous: clash,
          params: {
            kind: "duplicate-overload",
            name,
            signature: declarationSummary(fragment, declaration),
          },
        });
        return;
      }
      existing.push(binding);
    });
  });

  const cycles = cyclicAliases(bindings, fragmentOf);
  return {
    entry,
    closure,
    bindings,
    conflicts,
    cycles,
    diagnostics: scopeDiagnostics(conflicts, cycles),
  };
};

/**
 * The same namespace over the current declaration nodes, for a closure
 * whose declarations kept their ids and signatures but moved.
 */
export const rebindGlobalScope = (
  scope: GlobalScope,
  fragmentOf: (file: FileId) => HirFragment | undefined
): GlobalScope => {
  const current = (binding: GlobalBinding): GlobalBinding => {
    const node = fragmentOf(binding.file)?.nodes.get(binding.declaration.id);
    return node?.kind === "declaration" ? { file: binding.file, declaration: node } : binding;
  };
  const bindings = new Map<string, readonly GlobalBinding[]>();
  scope.bindings.forEach((list, name) => bindings.set(name, list.map(current)));
  const conflicts = scope.conflicts.map((conflict) => ({
    ...conflict,
    binding: current(conflict.binding),
    previous: current(conflict.previous),
  }));
  const cycles = scope.cycles.map(current);
  return {
    entry: scope.entry,
    closure: scope.closure,
    bindings,
    conflicts,
    cycles,
    diagnostics: scopeDiagnostics(conflicts, cycles),
  };
};
