import type { NodeId, TextSpan } from "../hir/ids.js";

/**
 * Arena slot plus the generation of the arena that issued it. An id is only
 * honoured by the arena it came from.
 */
export type ScopeId = {
  readonly index: number;
  readonly generation: number;
};

export type LexicalScopeKind = "parameters" | "let" | "generator";

export interface ScopeInfo {
  id: ScopeId;
  kind: LexicalScopeKind;
  /** Stable key of the owning HIR node: `${id}`, or `${id}:${n}` per generator */
  owner: string;
  parent?: ScopeId;
  span: TextSpan;
}

interface ScopeBucket {
  info: ScopeInfo;
  locals: NodeId[];
  nameIndex: Map<string, NodeId[]>;
}

export const scopeIdKey = (id: ScopeId): string => `${id.generation}.${id.index}`;

let nextGeneration = 0;

export class ScopeArena {
  readonly generation: number;
  readonly #buckets: ScopeBucket[] = [];

  constructor() {
    nextGeneration += 1;
    this.generation = nextGeneration;
  }

  create(info: Omit<ScopeInfo, "id">): ScopeId {
    if (info.parent) this.#bucket(info.parent);
    const id: ScopeId = { index: this.#buckets.length, generation: this.generation };
    this.#buckets.push({ info: { ...info, id }, locals: [], nameIndex: new Map() });
    return id;
  }

  /** Adds a binding. Returns the earlier same-name binding of this scope, if any. */
  declare(scope: ScopeId, name: string, declaration: NodeId): NodeId | undefined {
    const bucket = this.#bucket(scope);
    bucket.locals.push(declaration);
    const hits = bucket.nameIndex.get(name);
    if (hits) {
      hits.push(declaration);
      return hits[0];
    }
    bucket.nameIndex.set(name, [declaration]);
    return undefined;
  }

  owns(id: ScopeId): boolean {
    return id.generation === this.generation && id.index < this.#buckets.length;
  }

  info(id: ScopeId): Readonly<ScopeInfo> {
    return this.#bucket(id).info;
  }

  parent(id: ScopeId): ScopeId | undefined {
    return this.#bucket(id).info.parent;
  }

  lookup(scope: ScopeId, name: string): readonly NodeId[] {
    return this.#bucket(scope).nameIndex.get(name) ?? [];
  }

  locals(scope: ScopeId): readonly NodeId[] {
    return this.#bucket(scope).locals;
  }

  names(scope: ScopeId): string[] {
    return [...this.#bucket(scope).nameIndex.keys()];
  }

  /** `scope` and its ancestors, innermost first */
  chain(scope: ScopeId): ScopeId[] {
    const chain: ScopeId[] = [];
    let current: ScopeId | undefined = scope;
    while (current) {
      chain.push(current);
      current = this.#bucket(current).info.parent;
    }
    return chain;
  }

  all(): ScopeId[] {
    return this.#buckets.map((bucket) => bucket.info.id);
  }

  #bucket(id: ScopeId): ScopeBucket {
    if (id.generation !== this.generation) {
      throw new Error(
        `stale scope id ${scopeIdKey(id)} used with arena generation ${this.generation}`
      );
    }
    const bucket = this.#buckets[id.index];
    if (!bucket) {
      throw new Error(`scope ${scopeIdKey(id)} does not exist`);
    }
    return bucket;
  }
}
