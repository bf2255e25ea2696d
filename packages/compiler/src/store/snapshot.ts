import { fingerprint } from "@tessera/lib";
import {
  dedupeDiagnostics,
  diagnosticFromCode,
  type Diagnostic,
} from "../diagnostics/index.js";
import { dumpHir } from "../hir/dump.js";
import type { HirFragment } from "../hir/graph.js";
import type { FileId, NodeId } from "../hir/ids.js";
import { printFragment } from "../hir/print.js";
import { resolutionDiagnostics } from "../resolution/diagnostics.js";
import { resolveFile, type FileResolution } from "../resolution/resolver.js";
import type { Resolution, ResolutionCache } from "../resolution/types.js";
import {
  buildGlobalScope,
  rebindGlobalScope,
  type GlobalScope,
} from "../scope/global-scope.js";
import type { IncludeEdge } from "../scope/includes.js";
import { visibleNames } from "../scope/visible.js";
import { dumpCst } from "../syntax/cst.js";
import type { FileRecord } from "./file-record.js";
import { closureOf } from "./invalidation.js";
import type { QueryOptions, QueryResult } from "./types.js";

export type GlobalEntry = { key: string; scope: GlobalScope };

/** Immutable workspace contents at one revision */
export type WorkspaceState = {
  revision: number;
  files: ReadonlyMap<FileId, FileRecord>;
  caches: ReadonlyMap<FileId, ResolutionCache>;
  globals: ReadonlyMap<FileId, GlobalEntry>;
};

/** What a snapshot needs from the workspace that produced it */
export interface SnapshotHost {
  currentRevision(): number;
  versionOf(file: FileId): number | undefined;
  /** Stores derived data computed for `revision`; ignored once superseded */
  commit(
    revision: number,
    file: FileId,
    derived: { global: GlobalEntry; resolution: FileResolution }
  ): void;
}

export type EntryAnalysis = {
  closure: readonly FileId[];
  global: GlobalScope;
  resolution: FileResolution;
};

export type ScopeEntry = {
  name: string;
  summary: string;
  declaration: NodeId;
};

/**
 * Read-only view of one revision. Derived data is computed on first use
 * and memoized for the life of the snapshot.
 */
export class Snapshot {
  readonly revision: number;
  readonly prelude?: FileId;
  readonly #state: WorkspaceState;
  readonly #host: SnapshotHost;
  readonly #requireCurrent: boolean;
  readonly #analyses = new Map<FileId, EntryAnalysis>();
  #signatures?: Map<NodeId, string>;

  constructor({
    state,
    host,
    prelude,
    requireCurrent = false,
  }: {
    state: WorkspaceState;
    host: SnapshotHost;
    prelude?: FileId;
    requireCurrent?: boolean;
  }) {
    this.revision = state.revision;
    this.#state = state;
    this.#host = host;
    this.prelude = prelude;
    this.#requireCurrent = requireCurrent;
  }

  /** Files added through `update`, in insertion order */
  files(): FileId[] {
    return [...this.#state.files.keys()].filter((file) => file !== this.prelude);
  }

  version(file: FileId): number | undefined {
    return this.#state.files.get(file)?.version;
  }

  source(file: FileId): string | undefined {
    return this.#state.files.get(file)?.text;
  }

  includes(file: FileId): readonly IncludeEdge[] {
    return this.#state.files.get(file)?.includes.edges ?? [];
  }

  fragment(file: FileId): HirFragment | undefined {
    return this.#state.files.get(file)?.lowered.fragment;
  }

  /** Closure, global scope and resolutions with `file` as the entry */
  analysis(file: FileId): EntryAnalysis | undefined {
    const known = this.#analyses.get(file);
    if (known) return known;
    const record = this.#state.files.get(file);
    if (!record) return undefined;

    const closure = closureOf({ entry: file, files: this.#state.files, prelude: this.prelude });
    const global = this.#globalFor(file, closure);
    const fragmentOf = (id: FileId) => this.fragment(id);
    const resolution = resolveFile({
      fragment: record.lowered.fragment,
      scopes: record.scopes,
      global: global.scope,
      environment: {
        fragmentOf,
        signatureOf: (id) => this.#signatureOf(id),
      },
      previous: this.#state.caches.get(file),
    });

    this.#host.commit(this.revision, file, { global, resolution });
    const analysis = { closure, global: global.scope, resolution };
    this.#analyses.set(file, analysis);
    return analysis;
  }

  getCst(file: FileId, options?: QueryOptions): QueryResult<string> {
    return this.#query(file, options, (record) => dumpCst(record.tree));
  }

  getAst(file: FileId, options?: QueryOptions): QueryResult<string> {
    return this.#query(file, options, (record) => dumpHir(record.lowered.fragment));
  }

  getHir(file: FileId, options?: QueryOptions): QueryResult<string> {
    return this.#query(file, options, (record, analysis) =>
      dumpHir(record.lowered.fragment, {
        ids: true,
        resolutionOf: (id) => analysis.resolution.resolutions.get(id),
      })
    );
  }

  /** Names visible at `offset`, innermost scope first; the prelude is left out */
  getScope(file: FileId, offset: number, options?: QueryOptions): QueryResult<ScopeEntry[]> {
    return this.#query(file, options, (record, analysis) => {
      const [at] = record.lowered.sourceMap.nodesAt(offset);
      return visibleNames({
        fragment: record.lowered.fragment,
        scopes: record.scopes,
        global: analysis.global,
        at,
        fragmentOf: (id) => this.fragment(id),
        hiddenFiles: new Set(this.prelude === undefined ? [] : [this.prelude]),
      }).map(({ name, summary, declaration }) => ({ name, summary, declaration }));
    });
  }

  prettyPrint(file: FileId, options?: QueryOptions): QueryResult<string> {
    return this.#query(file, options, (record) => printFragment(record.lowered.fragment));
  }

  getResolution(
    file: FileId,
    node: NodeId,
    options?: QueryOptions
  ): QueryResult<Resolution | undefined> {
    const record = this.#state.files.get(file);
    if (record && !record.lowered.fragment.nodes.has(node)) {
      return this.#failure(
        diagnosticFromCode({
          code: "ST0002",
          params: { kind: "unknown-node", file, node },
          span: { file, start: 0, end: 0 },
        })
      );
    }
    return this.#query(file, options, (_record, analysis) =>
      analysis.resolution.resolutions.get(node)
    );
  }

  /**
   * Syntax, include and scope diagnostics of every file in the closure,
   * then the entry's resolution diagnostics. Prelude spans are left out.
   */
  diagnostics(file: FileId, options?: QueryOptions): QueryResult<Diagnostic[]> {
    return this.#query(file, options, (_record, analysis) => {
      const perFile = analysis.closure.flatMap((id) => {
        const record = this.#state.files.get(id);
        if (!record) return [];
        return [
          ...record.lowered.diagnostics,
          ...record.includes.diagnostics,
          ...record.scopes.diagnostics,
        ];
      });
      const record = this.#state.files.get(file);
      const resolved = record
        ? resolutionDiagnostics({
            fragment: record.lowered.fragment,
            resolutions: analysis.resolution.resolutions,
            fragmentOf: (id) => this.fragment(id),
          })
        : [];
      return dedupeDiagnostics(
        [...perFile, ...analysis.global.diagnostics, ...resolved].filter(
          (diagnostic) => diagnostic.span.file !== this.prelude
        )
      );
    });
  }

  #query<T>(
    file: FileId,
    options: QueryOptions | undefined,
    read: (record: FileRecord, analysis: EntryAnalysis) => T
  ): QueryResult<T> {
    const record = this.#state.files.get(file);
    if (!record) {
      return this.#failure(
        diagnosticFromCode({
          code: "ST0002",
          params: { kind: "unknown-file", file },
          span: { file, start: 0, end: 0 },
        })
      );
    }

    const current = this.#host.versionOf(file);
    const superseded = this.#requireCurrent && this.#host.currentRevision() !== this.revision;
    const requested = options?.version ?? record.version;
    if (superseded || requested !== record.version) {
      return this.#failure(
        diagnosticFromCode({
          code: "ST0001",
          params: {
            kind: "stale-version",
            file,
            requested,
            current: superseded ? (current ?? record.version) : record.version,
          },
          span: { file, start: 0, end: 0 },
        })
      );
    }

    const analysis = this.analysis(file);
    if (!analysis) {
      throw new Error(`no analysis for ${file} at revision ${this.revision}`);
    }
    return { ok: true, value: read(record, analysis), revision: this.revision };
  }

  #failure<T>(diagnostic: Diagnostic): QueryResult<T> {
    return { ok: false, diagnostics: [diagnostic] };
  }

  /** Spans stay out of the key: moved declarations are only rebound */
  #globalFor(file: FileId, closure: readonly FileId[]): GlobalEntry {
    const key = fingerprint(
      closure.flatMap((id) => {
        const topLevel = this.#state.files.get(id)?.topLevel;
        if (!topLevel) return [id];
        return [
          id,
          ...[...topLevel.entries()].map(
            ([declaration, entry]) => `${declaration}|${entry.signature}`
          ),
        ];
      })
    );
    const fragmentOf = (id: FileId) => this.fragment(id);
    const known = this.#state.globals.get(file);
    if (known?.key === key) {
      return { key, scope: rebindGlobalScope(known.scope, fragmentOf) };
    }
    return { key, scope: buildGlobalScope({ entry: file, closure, fragmentOf }) };
  }

  #signatureOf(id: NodeId): string | undefined {
    if (!this.#signatures) {
      const signatures = new Map<NodeId, string>();
      this.#state.files.forEach((record) =>
        record.signatures.forEach((signature, declaration) =>
          signatures.set(declaration, signature)
        )
      );
      this.#signatures = signatures;
    }
    return this.#signatures.get(id);
  }
}
