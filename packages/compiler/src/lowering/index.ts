export { lowerFile, type LoweredFile } from "./lowering.js";
export {
  NodeIdAllocator,
  type IdentityStats,
  type IdentityTable,
} from "./identity.js";
export { SourceMap } from "./source-map.js";
export {
  escapeString,
  identifierName,
  operatorFunctionName,
  unescapeString,
} from "./literals.js";
