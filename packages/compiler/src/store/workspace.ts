import type { FileId } from "../hir/ids.js";
import { NodeIdAllocator, type IdentityStats } from "../lowering/identity.js";
import { PerfCounters } from "../perf.js";
import { PRELUDE_FILE, preludeText } from "../prelude/index.js";
import type { ResolutionCache, ResolutionStats } from "../resolution/types.js";
import type { IncludeResolver } from "../scope/includes.js";
import { buildFileRecord, withResolvedIncludes, type FileRecord } from "./file-record.js";
import { closureOf, diffRecords, pruneCache } from "./invalidation.js";
import {
  Snapshot,
  type GlobalEntry,
  type SnapshotHost,
  type WorkspaceState,
} from "./snapshot.js";
import type {
  QueryKey,
  QueryName,
  UpdateResult,
  WorkspaceOptions,
  WorkspaceStats,
} from "./types.js";

const FILE_QUERIES: readonly QueryName[] = [
  "cst",
  "ast",
  "hir",
  "scope",
  "prettyPrint",
  "resolution",
  "diagnostics",
];

const DEPENDENT_QUERIES: readonly QueryName[] = ["hir", "scope", "resolution", "diagnostics"];

const noIncludes: IncludeResolver = () => undefined;

/**
 * Owner of every file version and derived cache. Updates are synchronous
 * and each one publishes a new immutable state; snapshots taken earlier
 * keep reading the state they were taken from.
 */
export class Workspace {
  readonly #allocator = new NodeIdAllocator();
  readonly #resolveInclude: IncludeResolver;
  readonly #prelude?: FileId;
  readonly #perf: PerfCounters;
  readonly #host: SnapshotHost;
  #state: WorkspaceState;
  #snapshot?: Snapshot;
  #lowering: IdentityStats = { reused: 0, minted: 0 };
  #resolution: ResolutionStats = { reused: 0, computed: 0 };
  #globalScopes = { reused: 0, built: 0 };

  constructor({ resolveInclude = noIncludes, prelude, perf }: WorkspaceOptions = {}) {
    this.#resolveInclude = resolveInclude;
    this.#perf = new PerfCounters(perf);
    this.#state = { revision: 0, files: new Map(), caches: new Map(), globals: new Map() };

    const source = prelude ?? { file: PRELUDE_FILE, text: preludeText() };
    if (source) {
      this.#prelude = source.file;
      const record = this.#build(source.file, 1, source.text, new Map());
      this.#state = { ...this.#state, files: new Map([[source.file, record]]) };
    }

    this.#host = {
      currentRevision: () => this.#state.revision,
      versionOf: (file) => this.#state.files.get(file)?.version,
      commit: (revision, file, derived) => this.#commit(revision, file, derived),
    };
  }

  get revision(): number {
    return this.#state.revision;
  }

  get preludeFile(): FileId | undefined {
    return this.#prelude;
  }

  /** Replaces the text of `file`, adding it when it is new */
  update(file: FileId, text: string, version?: number): UpdateResult {
    const startedAt = performance.now();
    const counters = this.#perf.snapshot();
    const before = this.#state.files.get(file);
    const nextVersion = version ?? (before?.version ?? 0) + 1;

    const files = new Map(this.#state.files);
    files.set(file, this.#build(file, nextVersion, text, files, before));
    const resolved = before ? files : this.#reresolveIncludes(files);
    const after = resolved.get(file);
    return this.#publish({
      file,
      before,
      after,
      files: resolved,
      version: nextVersion,
      startedAt,
      counters,
    });
  }

  /** Forgets `file`. Files that include it now report an unresolved include. */
  remove(file: FileId): UpdateResult | undefined {
    const before = this.#state.files.get(file);
    if (!before || file === this.#prelude) return undefined;
    const startedAt = performance.now();
    const counters = this.#perf.snapshot();
    const files = new Map(this.#state.files);
    files.delete(file);
    return this.#publish({
      file,
      before,
      after: undefined,
      files: this.#reresolveIncludes(files),
      version: before.version,
      startedAt,
      counters,
    });
  }

  /**
   * The current revision. With `requireCurrent`, queries on the snapshot
   * fail with ST0001 once a later update lands.
   */
  snapshot({ requireCurrent = false }: { requireCurrent?: boolean } = {}): Snapshot {
    if (requireCurrent) {
      return new Snapshot({
        state: this.#state,
        host: this.#host,
        prelude: this.#prelude,
        requireCurrent,
      });
    }
    if (this.#snapshot?.revision !== this.#state.revision) {
      this.#snapshot = new Snapshot({ state: this.#state, host: this.#host, prelude: this.#prelude });
    }
    return this.#snapshot;
  }

  stats(): WorkspaceStats {
    let cachedResolutions = 0;
    this.#state.caches.forEach((cache) => {
      cachedResolutions += cache.size;
    });
    return {
      revision: this.#state.revision,
      files: [...this.#state.files.keys()].filter((file) => file !== this.#prelude).length,
      nodeIds: this.#allocator.issued,
      lowering: this.#lowering,
      resolution: this.#resolution,
      globalScopes: this.#globalScopes,
      cachedResolutions,
    };
  }

  #build(
    file: FileId,
    version: number,
    text: string,
    files: ReadonlyMap<FileId, FileRecord>,
    previous?: FileRecord
  ): FileRecord {
    const record = buildFileRecord({
      file,
      version,
      text,
      allocator: this.#allocator,
      previous,
      resolveInclude: this.#resolveInclude,
      isKnown: (id) => id === file || files.has(id),
    });
    this.#lowering = record.lowered.stats;
    this.#perf.increment("lowering.files");
    this.#perf.increment("lowering.reused", record.lowered.stats.reused);
    this.#perf.increment("lowering.minted", record.lowered.stats.minted);
    return record;
  }

  #reresolveIncludes(files: ReadonlyMap<FileId, FileRecord>): Map<FileId, FileRecord> {
    const isKnown = (id: FileId) => files.has(id);
    const next = new Map<FileId, FileRecord>();
    files.forEach((record, file) =>
      next.set(file, withResolvedIncludes(record, this.#resolveInclude, isKnown))
    );
    return next;
  }

  #publish({
    file,
    before,
    after,
    files,
    version,
    startedAt,
    counters,
  }: {
    file: FileId;
    before?: FileRecord;
    after?: FileRecord;
    files: ReadonlyMap<FileId, FileRecord>;
    version: number;
    startedAt: number;
    counters: ReadonlyMap<string, number>;
  }): UpdateResult {
    const lowered = performance.now();
    const changes = diffRecords(before, after);
    const previous = this.#state;
    const caches = new Map<FileId, ResolutionCache>();
    const invalidated: QueryKey[] = FILE_QUERIES.map((query) => ({ query, file }));

    files.forEach((_record, entry) => {
      if (entry === this.#prelude) return;
      const oldClosure = previous.files.has(entry)
        ? closureOf({ entry, files: previous.files, prelude: this.#prelude })
        : [];
      const newClosure = closureOf({ entry, files, prelude: this.#prelude });
      const closureChanged = oldClosure.join("\n") !== newClosure.join("\n");
      const cache = previous.caches.get(entry);

      let dropped = 0;
      if (cache && !closureChanged) {
        const pruned = pruneCache({
          cache,
          changes,
          edited: entry === file ? after : undefined,
        });
        dropped = pruned.dropped;
        caches.set(entry, pruned.cache);
      } else if (cache) {
        dropped = cache.size;
      }
      this.#perf.increment("cache.dropped", dropped);

      if (entry === file) return;
      const dependent = newClosure.includes(file) || oldClosure.includes(file);
      if (closureChanged || dropped > 0 || (dependent && changes.names.size > 0)) {
        DEPENDENT_QUERIES.forEach((query) => invalidated.push({ query, file: entry }));
      } else if (dependent) {
        invalidated.push({ query: "diagnostics", file: entry });
      }
    });

    const globals = new Map(previous.globals);
    globals.delete(file);
    this.#state = { revision: previous.revision + 1, files, caches, globals };

    const finishedAt = performance.now();
    this.#perf.log({
      file,
      revision: this.#state.revision,
      phasesMs: { lower: lowered - startedAt, invalidate: finishedAt - lowered },
      counters: this.#perf.diff({ before: counters, after: this.#perf.snapshot() }),
      diagnostics: after?.lowered.diagnostics.length ?? 0,
    });

    return { revision: this.#state.revision, version, invalidated };
  }

  #commit(
    revision: number,
    file: FileId,
    derived: { global: GlobalEntry; resolution: { cache: ResolutionCache; stats: ResolutionStats } }
  ): void {
    this.#resolution = {
      reused: this.#resolution.reused + derived.resolution.stats.reused,
      computed: this.#resolution.computed + derived.resolution.stats.computed,
    };
    this.#perf.increment("resolution.reused", derived.resolution.stats.reused);
    this.#perf.increment("resolution.computed", derived.resolution.stats.computed);
    const reused = this.#state.globals.get(file)?.key === derived.global.key;
    this.#globalScopes = {
      reused: this.#globalScopes.reused + (reused ? 1 : 0),
      built: this.#globalScopes.built + (reused ? 0 : 1),
    };
    this.#perf.increment(reused ? "global.reused" : "global.built");
    if (revision !== this.#state.revision) return;

    const caches = new Map(this.#state.caches).set(file, derived.resolution.cache);
    const globals = new Map(this.#state.globals).set(file, derived.global);
    this.#state = { ...this.#state, caches, globals };
  }
}

export const createWorkspace = (options?: WorkspaceOptions): Workspace => new Workspace(options);
