export { Workspace, createWorkspace } from "./workspace.js";
export {
  Snapshot,
  type EntryAnalysis,
  type ScopeEntry,
} from "./snapshot.js";
export type { FileRecord } from "./file-record.js";
export type {
  PreludeSource,
  QueryKey,
  QueryName,
  QueryOptions,
  QueryResult,
  UpdateResult,
  WorkspaceOptions,
  WorkspaceStats,
} from "./types.js";
