import { fingerprint } from "@tessera/lib";
import type { NodeId } from "../hir/ids.js";

/**
 * Monotonic NodeId source. One allocator per workspace; only lowering mints.
 */
export class NodeIdAllocator {
  #next: NodeId = 0;

  mint(): NodeId {
    const id = this.#next;
    this.#next += 1;
    return id;
  }

  get issued(): number {
    return this.#next;
  }
}

/** Content key → NodeIds handed out for that key, in claim order */
export type IdentityTable = ReadonlyMap<string, readonly NodeId[]>;

export type IdentityStats = {
  reused: number;
  minted: number;
};

/**
 * Hands out NodeIds for one lowering pass. A key seen in the previous pass
 * of the same file gets that pass's id back, so unchanged subtrees keep
 * their identity; anything else is minted fresh.
 */
export class IdentityClaims {
  readonly #allocator: NodeIdAllocator;
  readonly #previous: Map<string, NodeId[]>;
  readonly #claimed = new Map<string, NodeId[]>();
  readonly #taken = new Set<NodeId>();
  #reused = 0;
  #minted = 0;

  constructor({
    allocator,
    previous,
  }: {
    allocator: NodeIdAllocator;
    previous?: IdentityTable;
  }) {
    this.#allocator = allocator;
    this.#previous = new Map(
      Array.from(previous ?? [], ([key, ids]) => [key, [...ids]])
    );
  }

  claim(key: string): NodeId {
    const candidates = this.#previous.get(key);
    let id = candidates?.shift();
    if (id !== undefined && this.#taken.has(id)) {
      id = undefined;
    }
    if (id === undefined) {
      id = this.#allocator.mint();
      this.#minted += 1;
    } else {
      this.#reused += 1;
    }

    this.#taken.add(id);
    const claimed = this.#claimed.get(key);
    if (claimed) {
      claimed.push(id);
    } else {
      this.#claimed.set(key, [id]);
    }
    return id;
  }

  table(): IdentityTable {
    return new Map(this.#claimed);
  }

  stats(): IdentityStats {
    return { reused: this.#reused, minted: this.#minted };
  }
}

/** Key for content-addressed nodes: tag plus payload with child ids */
export const contentKey = (tag: string, payload: unknown): string =>
  fingerprint([tag, JSON.stringify(payload)]);

/**
 * Key for top-level declarations: kind, name and ordinal among same-kind
 * same-name declarations of the file. Body edits keep the key.
 */
export const declarationKey = ({
  tag,
  declKind,
  name,
  ordinal,
}: {
  tag: string;
  declKind: string;
  name: string;
  ordinal: number;
}): string => fingerprint([tag, declKind, name, ordinal]);
