import type { FileId, NodeId } from "../hir/ids.js";
import type { CachedResolution, ResolutionCache } from "../resolution/types.js";
import { includeClosure } from "../scope/includes.js";
import type { FileRecord } from "./file-record.js";

/** What an edit changed, as seen by cached resolutions */
export type ChangeSet = {
  declarations: ReadonlySet<NodeId>;
  names: ReadonlySet<string>;
  scopes: ReadonlySet<string>;
};

const changedKeys = <K>(
  before: ReadonlyMap<K, string> | undefined,
  after: ReadonlyMap<K, string> | undefined
): Set<K> => {
  const changed = new Set<K>();
  before?.forEach((value, key) => {
    if (after?.get(key) !== value) changed.add(key);
  });
  after?.forEach((value, key) => {
    if (before?.get(key) !== value) changed.add(key);
  });
  return changed;
};

/**
 * Diffs two versions of a file. Declarations match by NodeId, which
 * lowering keeps for a declaration that stays in place.
 */
export const diffRecords = (
  before: FileRecord | undefined,
  after: FileRecord | undefined
): ChangeSet => {
  const names = new Set<string>();
  const ids = new Set<NodeId>([...(before?.topLevel.keys() ?? []), ...(after?.topLevel.keys() ?? [])]);
  ids.forEach((id) => {
    const old = before?.topLevel.get(id);
    const next = after?.topLevel.get(id);
    if (old?.name === next?.name && old?.signature === next?.signature) return;
    if (old) names.add(old.name);
    if (next) names.add(next.name);
  });

  return {
    declarations: changedKeys(before?.signatures, after?.signatures),
    names,
    scopes: changedKeys(before?.scopeKeys, after?.scopeKeys),
  };
};

const readsChange = (entry: CachedResolution, changes: ChangeSet): boolean => {
  for (const name of entry.deps.globals.keys()) {
    if (changes.names.has(name)) return true;
  }
  for (const id of entry.deps.declarations.keys()) {
    if (changes.declarations.has(id)) return true;
  }
  return false;
};

const passesChangedScope = (
  id: NodeId,
  record: FileRecord,
  changes: ChangeSet
): boolean => {
  if (!record.lowered.fragment.nodes.has(id)) return true;
  const scope = record.scopes.enclosing.get(id);
  if (!scope) return false;
  return record.scopes.arena
    .chain(scope)
    .some((link) => changes.scopes.has(record.scopes.arena.info(link).owner));
};

/**
 * Copy of `cache` without the entries an edit made stale. `edited` is the
 * new record of the changed file when `cache` belongs to that file.
 */
export const pruneCache = ({
  cache,
  changes,
  edited,
}: {
  cache: ResolutionCache;
  changes: ChangeSet;
  edited?: FileRecord;
}): { cache: ResolutionCache; dropped: number } => {
  const kept = new Map<NodeId, CachedResolution>();
  cache.forEach((entry, id) => {
    if (readsChange(entry, changes)) return;
    if (edited && passesChangedScope(id, edited, changes)) return;
    kept.set(id, entry);
  });
  return { cache: kept, dropped: cache.size - kept.size };
};

export const closureOf = ({
  entry,
  files,
  prelude,
}: {
  entry: FileId;
  files: ReadonlyMap<FileId, FileRecord>;
  prelude?: FileId;
}): FileId[] =>
  includeClosure({
    entry,
    prelude,
    includesOf: (file) => files.get(file)?.includes.edges ?? [],
  });
