import {
  DiagnosticEmitter,
  diagnosticFromCode,
  type Diagnostic,
} from "../diagnostics/index.js";
import {
  getDeclaration,
  getNode,
  getPattern,
  type HirFragment,
} from "../hir/graph.js";
import type { FileId, NodeId, TextSpan } from "../hir/ids.js";
import type { HirDeclaration, HirExpression } from "../hir/nodes.js";
import { childrenOf } from "../hir/walk.js";
import { ScopeArena, type LexicalScopeKind, type ScopeId } from "./scope-arena.js";

export interface FileScopes {
  file: FileId;
  arena: ScopeArena;
  /** Innermost lexical scope around each node; absent means only the global scope */
  enclosing: ReadonlyMap<NodeId, ScopeId>;
  byOwner: ReadonlyMap<string, ScopeId>;
  diagnostics: readonly Diagnostic[];
}

const callableKinds = new Set(["function", "predicate", "test", "annotation"]);

class LexicalScopeBuilder {
  readonly #fragment: HirFragment;
  readonly #arena = new ScopeArena();
  readonly #enclosing = new Map<NodeId, ScopeId>();
  readonly #byOwner = new Map<string, ScopeId>();
  readonly #diagnostics = new DiagnosticEmitter();

  constructor(fragment: HirFragment) {
    this.#fragment = fragment;
  }

  build(): FileScopes {
    this.#fragment.roots.forEach((root) => this.#visit(root, undefined));
    return {
      file: this.#fragment.file,
      arena: this.#arena,
      enclosing: this.#enclosing,
      byOwner: this.#byOwner,
      diagnostics: this.#diagnostics.diagnostics,
    };
  }

  #visit(id: NodeId, scope: ScopeId | undefined): void {
    if (scope) this.#enclosing.set(id, scope);
    const node = getNode(this.#fragment, id);

    if (node.kind === "declaration" && callableKinds.has(node.declKind)) {
      this.#visitCallable(node, scope);
      return;
    }
    if (node.kind === "expression" && node.exprKind === "let") {
      this.#visitLet(node, scope);
      return;
    }
    if (node.kind === "expression" && node.exprKind === "comprehension") {
      this.#visitComprehension(node, scope);
      return;
    }
    childrenOf(node).forEach((child) => this.#visit(child, scope));
  }

  /** Parameters are visible in the body only */
  #visitCallable(declaration: HirDeclaration, scope: ScopeId | undefined): void {
    childrenOf(declaration)
      .filter((child) => child !== declaration.body)
      .forEach((child) => this.#visit(child, scope));
    if (declaration.body === undefined) return;

    const inner = this.#open({
      kind: "parameters",
      owner: `${declaration.id}`,
      parent: scope,
      span: declaration.span,
      declarations: declaration.parameters,
    });
    this.#visit(declaration.body, inner);
  }

  #visitLet(
    expression: Extract<HirExpression, { exprKind: "let" }>,
    scope: ScopeId | undefined
  ): void {
    const declarations = expression.items.filter(
      (item) => getNode(this.#fragment, item).kind === "declaration"
    );
    const inner = this.#open({
      kind: "let",
      owner: `${expression.id}`,
      parent: scope,
      span: expression.span,
      declarations,
    });
    expression.items.forEach((item) => this.#visit(item, inner));
    this.#visit(expression.body, inner);
  }

  /**
   * Generator n sees generators before it. Its collection is evaluated in
   * the scope of generator n - 1, its where clause in its own scope.
   */
  #visitComprehension(
    expression: Extract<HirExpression, { exprKind: "comprehension" }>,
    scope: ScopeId | undefined
  ): void {
    let current = scope;
    expression.generators.forEach((generator, index) => {
      const source = generator.kind === "iterator" ? generator.collection : generator.value;
      this.#visit(source, current);

      const patterns =
        generator.kind === "iterator" ? generator.patterns : [generator.pattern];
      const declarations = patterns.flatMap((id) => {
        const pattern = getPattern(this.#fragment, id);
        return pattern.patternKind === "identifier" ? [pattern.declaration] : [];
      });
      current = this.#open({
        kind: "generator",
        owner: `${expression.id}:${index}`,
        parent: current,
        span: expression.span,
        declarations,
      });
      patterns.forEach((id) => this.#visit(id, current));
      if (generator.where !== undefined) this.#visit(generator.where, current);
    });
    this.#visit(expression.template, current);
  }

  #open({
    kind,
    owner,
    parent,
    span,
    declarations,
  }: {
    kind: LexicalScopeKind;
    owner: string;
    parent: ScopeId | undefined;
    span: TextSpan;
    declarations: readonly NodeId[];
  }): ScopeId {
    const scope = this.#arena.create({ kind, owner, parent, span });
    this.#byOwner.set(owner, scope);
    declarations.forEach((id) => {
      const declaration = getDeclaration(this.#fragment, id);
      if (declaration.name === undefined) return;
      const previous = this.#arena.declare(scope, declaration.name, id);
      if (previous !== undefined) this.#reportDuplicate(declaration, previous);
    });
    return scope;
  }

  #reportDuplicate(declaration: HirDeclaration, previousId: NodeId): void {
    const previous = getDeclaration(this.#fragment, previousId);
    const file = this.#fragment.file;
    this.#diagnostics.reportCode({
      code: "SC0001",
      params: {
        kind: "duplicate-declaration",
        name: declaration.name ?? "_",
        previousKind: describeDeclKind(previous),
      },
      span: { file, ...declaration.span },
      related: [relatedNote(file, previous.span)],
    });
  }
}

export const relatedNote = (file: FileId, span: TextSpan): Diagnostic =>
  diagnosticFromCode({
    code: "SC0001",
    params: { kind: "previous-declaration" },
    span: { file, ...span },
    severity: "note",
  });

export const describeDeclKind = (declaration: HirDeclaration): string => {
  switch (declaration.origin) {
    case "parameter":
      return "parameter";
    case "generator":
      return "generator variable";
    case "enum-case":
      return "enum case";
    case "let":
      return "local variable";
    case "item":
      return declaration.declKind === "type-alias" ? "type alias" : declaration.declKind;
  }
};

export const buildLexicalScopes = (fragment: HirFragment): FileScopes =>
  new LexicalScopeBuilder(fragment).build();
