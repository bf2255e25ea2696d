export * from "./diagnostics/index.js";
export * from "./syntax/index.js";
export * from "./hir/index.js";
export * from "./lowering/index.js";
export * from "./scope/index.js";
export * from "./resolution/index.js";
export * from "./store/index.js";
export * from "./query/index.js";
export * from "./host/index.js";
export { PRELUDE_FILE, preludeText } from "./prelude/index.js";
export { PerfCounters, isPerfEnvEnabled } from "./perf.js";
