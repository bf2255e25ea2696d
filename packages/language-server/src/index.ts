export {
  AnalysisCoordinator,
  openDocumentUris,
  type CoordinatorOptions,
  type ViewKind,
} from "./server/analysis-coordinator.js";
export { DiagnosticsScheduler, type DiagnosticsRun } from "./server/diagnostics-scheduler.js";
export { toProtocolDiagnostics } from "./project/diagnostics.js";
export { toFilePath, toFileUri } from "./project/files.js";
export { LineIndex, spanRange } from "./project/text.js";
