import type { NodeId, TextSpan } from "../hir/ids.js";

const spanKey = (span: TextSpan): string => `${span.start}:${span.end}`;

/**
 * Two-way map between CST spans and HIR nodes. One span can lower to
 * several nodes (desugared generator calls, declaration items).
 */
export class SourceMap {
  readonly #spans = new Map<NodeId, TextSpan>();
  readonly #nodesBySpan = new Map<string, NodeId[]>();

  record(id: NodeId, span: TextSpan): void {
    this.#spans.set(id, span);
    const key = spanKey(span);
    const nodes = this.#nodesBySpan.get(key);
    if (nodes) {
      nodes.push(id);
    } else {
      this.#nodesBySpan.set(key, [id]);
    }
  }

  spanOf(id: NodeId): TextSpan | undefined {
    return this.#spans.get(id);
  }

  nodesForSpan(span: TextSpan): readonly NodeId[] {
    return this.#nodesBySpan.get(spanKey(span)) ?? [];
  }

  /** Nodes whose span contains `offset`, narrowest first */
  nodesAt(offset: number): NodeId[] {
    const hits: { id: NodeId; width: number }[] = [];
    this.#spans.forEach((span, id) => {
      if (span.start <= offset && offset <= span.end) {
        hits.push({ id, width: span.end - span.start });
      }
    });
    return hits
      .sort((left, right) => left.width - right.width || right.id - left.id)
      .map((hit) => hit.id);
  }

  get size(): number {
    return this.#spans.size;
  }
}
