export { resolveFile, type FileResolution, type ResolverEnvironment } from "./resolver.js";
export * from "./types.js";
export * from "./type-inst.js";
export {
  applySubstitution,
  compareScores,
  emptySubstitution,
  formatSubstitution,
  matchArguments,
  type MatchResult,
  type MatchScore,
  type Substitution,
} from "./unify.js";
export { resolutionDiagnostics } from "./diagnostics.js";
