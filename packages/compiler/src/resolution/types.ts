import type { DiagnosticParams } from "../diagnostics/index.js";
import type { FileId, NodeId } from "../hir/ids.js";
import type { HirDeclaration } from "../hir/nodes.js";
import type { TypeInst } from "./type-inst.js";
import type { MatchScore, Substitution } from "./unify.js";

export type DeclarationRef = {
  file: FileId;
  declaration: HirDeclaration;
};

export type CandidateOutcome = {
  declaration: NodeId;
  file: FileId;
  signature: string;
} & (
  | { accepted: true; score: MatchScore; substitution: Substitution }
  | { accepted: false; reason: string }
);

export type ResolutionFailure =
  | { code: "RS0001"; params: DiagnosticParams<"RS0001"> }
  | { code: "RS0002"; params: DiagnosticParams<"RS0002"> }
  | {
      code: "RS0003";
      params: Extract<DiagnosticParams<"RS0003">, { kind: "no-overload" }>;
    }
  | {
      code: "RS0004";
      params: Extract<DiagnosticParams<"RS0004">, { kind: "ambiguous-overload" }>;
      tied: readonly NodeId[];
    }
  | { code: "RS0005"; params: DiagnosticParams<"RS0005"> };

/**
 * What an identifier use or call denotes. Records carry no spans, so they
 * survive edits that only move text.
 */
export type Resolution = {
  node: NodeId;
  name: string;
  kind: "identifier" | "call";
  /** Declarations visible under `name` in the innermost scope that has it */
  declarations: readonly NodeId[];
  chosen?: NodeId;
  substitution: Substitution;
  candidates: readonly CandidateOutcome[];
  failure?: ResolutionFailure;
};

/** Inputs a cached resolution was computed from, with their fingerprints */
export type ResolutionDeps = {
  /** Global name to the fingerprint of its bindings */
  globals: ReadonlyMap<string, string>;
  /** Consulted declaration to its signature fingerprint */
  declarations: ReadonlyMap<NodeId, string>;
};

export type CachedResolution = {
  resolution: Resolution;
  type: TypeInst;
  deps: ResolutionDeps;
  /** Fingerprint of the lexical scope chain around the use */
  chain: string;
};

export type ResolutionCache = ReadonlyMap<NodeId, CachedResolution>;

export type ResolutionStats = {
  reused: number;
  computed: number;
};
