import type { Diagnostic } from "../diagnostics/index.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { Resolution } from "../resolution/types.js";
import type { ScopeEntry } from "../store/snapshot.js";
import type { QueryOptions, QueryResult } from "../store/types.js";
import type { Workspace } from "../store/workspace.js";

/** Read-only operations for editor front ends */
export interface QueryFacade {
  getCst(file: FileId, options?: QueryOptions): QueryResult<string>;
  getAst(file: FileId, options?: QueryOptions): QueryResult<string>;
  getHir(file: FileId, options?: QueryOptions): QueryResult<string>;
  getScope(file: FileId, offset: number, options?: QueryOptions): QueryResult<ScopeEntry[]>;
  prettyPrint(file: FileId, options?: QueryOptions): QueryResult<string>;
  getResolution(
    file: FileId,
    node: NodeId,
    options?: QueryOptions
  ): QueryResult<Resolution | undefined>;
  diagnostics(file: FileId, options?: QueryOptions): QueryResult<Diagnostic[]>;
}

/** Every call reads the workspace's current snapshot */
export const createQueryFacade = (workspace: Workspace): QueryFacade => ({
  getCst: (file, options) => workspace.snapshot().getCst(file, options),
  getAst: (file, options) => workspace.snapshot().getAst(file, options),
  getHir: (file, options) => workspace.snapshot().getHir(file, options),
  getScope: (file, offset, options) => workspace.snapshot().getScope(file, offset, options),
  prettyPrint: (file, options) => workspace.snapshot().prettyPrint(file, options),
  getResolution: (file, node, options) => workspace.snapshot().getResolution(file, node, options),
  diagnostics: (file, options) => workspace.snapshot().diagnostics(file, options),
});
