import {
  DiagnosticEmitter,
  type Diagnostic,
  type DiagnosticParams,
} from "../diagnostics/index.js";
import type { FileId, NodeId, TextSpan } from "../hir/ids.js";
import type { HirFragment } from "../hir/graph.js";
import type {
  DeclKind,
  HirDeclaration,
  HirDeclarationData,
  HirExpression,
  HirExpressionData,
  HirItem,
  HirItemData,
  HirNode,
  HirPattern,
  HirPatternData,
  HirTypeInst,
  HirTypeInstData,
} from "../hir/nodes.js";
import { childrenOf } from "../hir/walk.js";
import type { SyntaxErrorRecord } from "../syntax/cst.js";
import {
  IdentityClaims,
  contentKey,
  declarationKey,
  type IdentityStats,
  type IdentityTable,
  type NodeIdAllocator,
} from "./identity.js";
import { SourceMap } from "./source-map.js";

/**
 * Mutable state of one lowering pass. Nodes are registered bottom-up, so
 * a node's key can include the ids of its already lowered children.
 */
export class LoweringContext {
  readonly file: FileId;
  readonly sourceMap = new SourceMap();
  readonly #nodes = new Map<NodeId, HirNode>();
  readonly #parents = new Map<NodeId, NodeId>();
  readonly #diagnostics = new DiagnosticEmitter();
  readonly #claims: IdentityClaims;
  readonly #ordinals = new Map<string, number>();

  constructor({
    file,
    allocator,
    previous,
  }: {
    file: FileId;
    allocator: NodeIdAllocator;
    previous?: IdentityTable;
  }) {
    this.file = file;
    this.#claims = new IdentityClaims({ allocator, previous });
  }

  item(data: HirItemData, span: TextSpan, identity?: string): NodeId {
    const id = this.#claims.claim(identity ?? contentKey("item", data));
    const node: HirItem = { ...data, kind: "item", id, span };
    return this.#register(node);
  }

  declaration(data: HirDeclarationData, span: TextSpan, identity?: string): NodeId {
    const id = this.#claims.claim(identity ?? contentKey("declaration", data));
    const node: HirDeclaration = { ...data, kind: "declaration", id, span };
    return this.#register(node);
  }

  typeInst(data: HirTypeInstData, span: TextSpan): NodeId {
    const id = this.#claims.claim(contentKey("type-inst", data));
    const node: HirTypeInst = { ...data, kind: "type-inst", id, span };
    return this.#register(node);
  }

  expression(data: HirExpressionData, span: TextSpan): NodeId {
    const id = this.#claims.claim(contentKey("expression", data));
    const node: HirExpression = { ...data, kind: "expression", id, span };
    return this.#register(node);
  }

  pattern(data: HirPatternData, span: TextSpan): NodeId {
    const id = this.#claims.claim(contentKey("pattern", data));
    const node: HirPattern = { ...data, kind: "pattern", id, span };
    return this.#register(node);
  }

  /** Identity key of the next top-level declaration named `name` */
  nextDeclarationIdentity(declKind: DeclKind, name: string): {
    declaration: string;
    item: string;
  } {
    const slot = `${declKind}:${name}`;
    const ordinal = this.#ordinals.get(slot) ?? 0;
    this.#ordinals.set(slot, ordinal + 1);
    return {
      declaration: declarationKey({ tag: "declaration", declKind, name, ordinal }),
      item: declarationKey({ tag: "declaration-item", declKind, name, ordinal }),
    };
  }

  get(id: NodeId): HirNode | undefined {
    return this.#nodes.get(id);
  }

  syntaxError(span: TextSpan, params: DiagnosticParams<"SX0001">): Diagnostic {
    return this.#diagnostics.reportCode({
      code: "SX0001",
      params,
      span: { file: this.file, ...span },
    });
  }

  reportRecord(record: SyntaxErrorRecord): Diagnostic {
    return this.syntaxError(record.span, syntaxErrorParams(record));
  }

  fragment(roots: readonly NodeId[]): HirFragment {
    return {
      file: this.file,
      roots,
      nodes: this.#nodes,
      parents: this.#parents,
    };
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics.diagnostics;
  }

  identities(): IdentityTable {
    return this.#claims.table();
  }

  stats(): IdentityStats {
    return this.#claims.stats();
  }

  #register(node: HirNode): NodeId {
    this.#nodes.set(node.id, node);
    this.sourceMap.record(node.id, node.span);
    childrenOf(node).forEach((child) => {
      const owner = this.#parents.get(child);
      if (owner !== undefined && owner !== node.id) {
        throw new Error(`HirNode ${child} already owned by ${owner}`);
      }
      this.#parents.set(child, node.id);
    });
    return node.id;
  }
}

export const syntaxErrorParams = (
  record: SyntaxErrorRecord
): DiagnosticParams<"SX0001"> => {
  const problem = record.problem;
  if (problem === undefined) {
    return { kind: "unexpected-token", expected: record.expected, found: record.found };
  }
  if (problem.startsWith("unterminated ")) {
    return { kind: "unterminated", what: problem.slice("unterminated ".length) };
  }
  return { kind: "invalid-token", text: record.found };
};
