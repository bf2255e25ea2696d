import type { Diagnostic } from "../diagnostics/index.js";
import type { FileId } from "../hir/ids.js";
import type { IdentityStats } from "../lowering/identity.js";
import type { ResolutionStats } from "../resolution/types.js";
import type { IncludeResolver } from "../scope/includes.js";

export type QueryName =
  | "cst"
  | "ast"
  | "hir"
  | "scope"
  | "prettyPrint"
  | "resolution"
  | "diagnostics";

export type QueryKey = { query: QueryName; file: FileId };

export type UpdateResult = {
  revision: number;
  version: number;
  /** Queries whose answers may differ from the previous revision */
  invalidated: readonly QueryKey[];
};

export type PreludeSource = { file: FileId; text: string };

export type WorkspaceOptions = {
  /** Maps `include "path"` in `fromFile` to a workspace file. Unresolved by default. */
  resolveInclude?: IncludeResolver;
  /** Declarations visible everywhere. Defaults to the bundled builtins. */
  prelude?: PreludeSource | false;
  /** Overrides the TESSERA_PERF switch */
  perf?: boolean;
};

export type WorkspaceStats = {
  revision: number;
  files: number;
  nodeIds: number;
  /** Identity reuse of the most recent lowering */
  lowering: IdentityStats;
  /** Resolution cache hits and misses since the workspace was created */
  resolution: ResolutionStats;
  /** Global scopes reused from the previous revision or built afresh */
  globalScopes: { reused: number; built: number };
  cachedResolutions: number;
};

export type QueryOptions = {
  /** Version the caller believes is current; a mismatch yields ST0001 */
  version?: number;
};

export type QueryResult<T> =
  | { ok: true; value: T; revision: number }
  | { ok: false; diagnostics: readonly Diagnostic[] };
