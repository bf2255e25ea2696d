import {
  createWorkspace,
  formatDiagnostic,
  includeCandidates,
  readSourceFromDisk,
  type Diagnostic as CompilerDiagnostic,
  type QueryKey,
  type QueryResult,
  type ReadSource,
  type Snapshot,
  type Workspace,
} from "@tessera/compiler";
import type {
  Diagnostic,
  DidChangeWatchedFilesParams,
  Position,
} from "vscode-languageserver/lib/node/main.js";
import { FileChangeType } from "vscode-languageserver/lib/node/main.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { toProtocolDiagnostics } from "../project/diagnostics.js";
import { toFilePath } from "../project/files.js";
import { LineIndex } from "../project/text.js";

export type ViewKind = "cst" | "ast" | "hir" | "scope" | "prettyPrint";

export type CoordinatorOptions = {
  includeDirs?: readonly string[];
  /** Load the bundled builtins. Defaults to true. */
  prelude?: boolean;
  readSource?: ReadSource;
};

type DiagnosticsCacheEntry = {
  revision: number;
  diagnostics: Diagnostic[];
};

const MODEL_EXTENSIONS = [".mzn", ".dzn"];

const isModelFile = (filePath: string): boolean =>
  MODEL_EXTENSIONS.some((extension) => filePath.endsWith(extension));

/**
 * Owns the workspace for one editor session. Updates run one at a time,
 * including the disk reads that load included files; reads wait for the
 * queue to drain and retry when the revision moved underneath them.
 */
export class AnalysisCoordinator {
  readonly openDocuments = new Map<string, string>();
  readonly #workspace: Workspace;
  readonly #includeDirs: readonly string[];
  readonly #readSource: ReadSource;
  readonly #loaded = new Set<string>();
  readonly #diagnosticsCache = new Map<string, DiagnosticsCacheEntry>();
  readonly #lineIndexes = new Map<string, { text: string; index: LineIndex }>();
  #queue: Promise<void> = Promise.resolve();
  #pending = 0;

  constructor({
    includeDirs = [],
    prelude = true,
    readSource = readSourceFromDisk,
  }: CoordinatorOptions = {}) {
    this.#includeDirs = includeDirs;
    this.#readSource = readSource;
    this.#workspace = createWorkspace({
      prelude: prelude ? undefined : false,
      resolveInclude: (fromFile, includePath) =>
        includeCandidates({ fromFile, includePath, includeDirs: this.#includeDirs }).find(
          (candidate) => this.#loaded.has(candidate)
        ),
    });
  }

  get revision(): number {
    return this.#workspace.revision;
  }

  /** Applies an open document's text. Resolves to the invalidated queries. */
  updateDocument(document: TextDocument): Promise<QueryKey[]> {
    const filePath = toFilePath(document.uri);
    const source = document.getText();
    this.openDocuments.set(filePath, source);
    return this.#enqueue(async () => {
      const keys = [...this.#apply(filePath, source)];
      keys.push(...(await this.#loadIncludes([filePath])));
      return keys;
    });
  }

  /** Falls back to the file on disk, or forgets it when there is none */
  removeDocument(document: TextDocument): Promise<readonly QueryKey[]> {
    const filePath = toFilePath(document.uri);
    this.openDocuments.delete(filePath);
    return this.#enqueue(() => this.#reload(filePath));
  }

  async handleWatchedFileChanges(
    changes: DidChangeWatchedFilesParams["changes"],
  ): Promise<QueryKey[]> {
    const filePaths = changes
      .map((change) => ({ filePath: toFilePath(change.uri), type: change.type }))
      .filter(({ filePath }) => isModelFile(filePath) && !this.openDocuments.has(filePath));

    if (filePaths.length === 0) {
      return [];
    }

    return this.#enqueue(async () => {
      const keys: QueryKey[] = [];
      for (const { filePath, type } of filePaths) {
        if (type === FileChangeType.Deleted) {
          keys.push(...this.#forget(filePath));
        } else if (this.#loaded.has(filePath)) {
          keys.push(...(await this.#reload(filePath)));
        }
      }
      // A new file may satisfy an include that failed before.
      keys.push(...(await this.#loadIncludes([...this.openDocuments.keys()])));
      return keys;
    });
  }

  async snapshot(): Promise<Snapshot> {
    await this.#settled();
    return this.#workspace.snapshot();
  }

  async diagnosticsForUri(uri: string): Promise<Diagnostic[]> {
    const filePath = toFilePath(uri);
    while (true) {
      await this.#settled();
      const runRevision = this.#workspace.revision;
      const cached = this.#diagnosticsCache.get(filePath);
      if (cached && cached.revision === runRevision) {
        return cached.diagnostics;
      }

      const snapshot = this.#workspace.snapshot();
      const result = snapshot.diagnostics(filePath);
      const diagnostics = toProtocolDiagnostics({
        file: filePath,
        diagnostics: result.ok ? result.value : result.diagnostics,
        lineIndexOf: (file) => this.#lineIndex(snapshot, file),
      });
      if (runRevision === this.#workspace.revision) {
        this.#diagnosticsCache.set(filePath, { revision: runRevision, diagnostics });
        return diagnostics;
      }
    }
  }

  /** Text of one of the `tessera/view*` requests */
  async view({
    uri,
    kind,
    position,
  }: {
    uri: string;
    kind: ViewKind;
    position?: Position;
  }): Promise<string> {
    const filePath = toFilePath(uri);
    while (true) {
      const snapshot = await this.snapshot();
      const text = AnalysisCoordinator.#render({
        snapshot,
        filePath,
        kind,
        offset: position ? this.#lineIndex(snapshot, filePath)?.offsetAt(position) ?? 0 : 0,
      });
      if (snapshot.revision === this.#workspace.revision) {
        return text;
      }
    }
  }

  static #render({
    snapshot,
    filePath,
    kind,
    offset,
  }: {
    snapshot: Snapshot;
    filePath: string;
    kind: ViewKind;
    offset: number;
  }): string {
    const textOf = (result: QueryResult<string>): string =>
      result.ok ? result.value : AnalysisCoordinator.#failure(result.diagnostics);

    switch (kind) {
      case "cst":
        return textOf(snapshot.getCst(filePath));
      case "ast":
        return textOf(snapshot.getAst(filePath));
      case "hir":
        return textOf(snapshot.getHir(filePath));
      case "prettyPrint":
        return textOf(snapshot.prettyPrint(filePath));
      case "scope": {
        const result = snapshot.getScope(filePath, offset);
        return result.ok
          ? result.value.map((entry) => `${entry.name}\t${entry.summary}`).join("\n")
          : AnalysisCoordinator.#failure(result.diagnostics);
      }
    }
  }

  static #failure(diagnostics: readonly CompilerDiagnostic[]): string {
    return diagnostics.map(formatDiagnostic).join("\n");
  }

  #enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.#pending += 1;
    const run = this.#queue.then(task).finally(() => {
      this.#pending -= 1;
    });
    // The queue only orders tasks; each caller sees its own failure.
    this.#queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async #settled(): Promise<void> {
    while (this.#pending > 0) {
      await this.#queue;
    }
  }

  #apply(filePath: string, text: string): readonly QueryKey[] {
    this.#loaded.add(filePath);
    return this.#workspace.update(filePath, text).invalidated;
  }

  #forget(filePath: string): readonly QueryKey[] {
    this.#loaded.delete(filePath);
    this.#lineIndexes.delete(filePath);
    return this.#workspace.remove(filePath)?.invalidated ?? [];
  }

  async #reload(filePath: string): Promise<readonly QueryKey[]> {
    const text = await this.#readSource(filePath);
    return text === undefined ? this.#forget(filePath) : this.#apply(filePath, text);
  }

  /** Loads unresolved includes reachable from `roots`, open documents first */
  async #loadIncludes(roots: readonly string[]): Promise<QueryKey[]> {
    const keys: QueryKey[] = [];
    const visited = new Set<string>();
    const queue = [...roots];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);

      for (const edge of this.#workspace.snapshot().includes(current)) {
        if (edge.target !== undefined) {
          queue.push(edge.target);
          continue;
        }
        const candidates = includeCandidates({
          fromFile: current,
          includePath: edge.path,
          includeDirs: this.#includeDirs,
        });
        for (const candidate of candidates) {
          const text = this.openDocuments.get(candidate) ?? (await this.#readSource(candidate));
          if (text === undefined) continue;
          keys.push(...this.#apply(candidate, text));
          queue.push(candidate);
          break;
        }
      }
    }

    return keys;
  }

  #lineIndex(snapshot: Snapshot, filePath: string): LineIndex | undefined {
    const text = snapshot.source(filePath);
    if (text === undefined) return undefined;
    const cached = this.#lineIndexes.get(filePath);
    if (cached?.text === text) return cached.index;
    const index = new LineIndex(text);
    this.#lineIndexes.set(filePath, { text, index });
    return index;
  }
}

/** Open documents whose diagnostics `keys` invalidated, by the client's uri */
export const openDocumentUris = ({
  keys,
  openUris,
}: {
  keys: readonly QueryKey[];
  openUris: Iterable<string>;
}): string[] => {
  const touched = new Set(
    keys.filter((key) => key.query === "diagnostics").map((key) => key.file),
  );
  return [...openUris].filter((uri) => touched.has(toFilePath(uri)));
};
