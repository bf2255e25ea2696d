export interface TextSpan {
  start: number;
  end: number;
}

/**
 * Read-only view of a concrete syntax tree node. Lowering only depends on
 * this interface, so any parser producing it can be adapted.
 */
export interface SyntaxNode {
  readonly kind: string;
  readonly span: TextSpan;
  /** Name of the parent field this node fills, if any */
  readonly field?: string;
  /** Anonymous nodes are keyword and punctuation leaves */
  readonly named: boolean;
  readonly children: readonly SyntaxNode[];
  readonly isError: boolean;
  text(): string;
}

export type SyntaxErrorRecord = {
  span: TextSpan;
  expected: string;
  found: string;
  problem?: string;
};

export type SyntaxTree = {
  file: string;
  text: string;
  root: SyntaxNode;
  errors: readonly SyntaxErrorRecord[];
};

export const ERROR_KIND = "ERROR";

export class CstNode implements SyntaxNode {
  readonly kind: string;
  readonly span: TextSpan;
  readonly field?: string;
  readonly named: boolean;
  readonly children: readonly CstNode[];
  readonly #source: string;

  constructor(opts: {
    kind: string;
    span: TextSpan;
    source: string;
    field?: string;
    named?: boolean;
    children?: readonly CstNode[];
  }) {
    this.kind = opts.kind;
    this.span = opts.span;
    this.field = opts.field;
    this.named = opts.named ?? true;
    this.children = opts.children ?? [];
    this.#source = opts.source;
  }

  get isError(): boolean {
    return this.kind === ERROR_KIND;
  }

  text(): string {
    return this.#source.slice(this.span.start, this.span.end);
  }

  withField(field: string): CstNode {
    return new CstNode({
      kind: this.kind,
      span: this.span,
      source: this.#source,
      field,
      named: this.named,
      children: this.children,
    });
  }
}

export const childByField = (
  node: SyntaxNode,
  field: string
): SyntaxNode | undefined => node.children.find((child) => child.field === field);

export const childrenByField = (
  node: SyntaxNode,
  field: string
): SyntaxNode[] => node.children.filter((child) => child.field === field);

export const namedChildren = (node: SyntaxNode): SyntaxNode[] =>
  node.children.filter((child) => child.named);

/** Deepest named node whose span contains `offset`. */
export const descendantAt = (
  node: SyntaxNode,
  offset: number
): SyntaxNode | undefined => {
  if (offset < node.span.start || offset > node.span.end) return undefined;
  for (const child of node.children) {
    if (!child.named) continue;
    const hit = descendantAt(child, offset);
    if (hit) return hit;
  }
  return node;
};

export const dumpCst = (tree: SyntaxTree): string => {
  const lines: string[] = [];
  const visit = (node: SyntaxNode, depth: number): void => {
    const field = node.field ? `${node.field}: ` : "";
    const named = node.children.filter((child) => child.named);
    const leaf =
      named.length === 0 && node.kind !== tree.root.kind
        ? ` ${JSON.stringify(node.text())}`
        : "";
    lines.push(
      `${"  ".repeat(depth)}${field}${node.kind} [${node.span.start}..${node.span.end}]${leaf}`
    );
    named.forEach((child) => visit(child, depth + 1));
  };
  visit(tree.root, 0);
  return lines.join("\n");
};
