export type EmitKind = "cst" | "ast" | "hir" | "scope" | "prettyPrint";

export type TesseraConfig = {
  /** Entry model file */
  index: string;
  /** Views to print, in flag order */
  emit: EmitKind[];
  /** Offset `--emit-scope` reports on */
  scopeOffset?: number;
  includeDirs: string[];
  prelude: boolean;
  color: boolean;
};
