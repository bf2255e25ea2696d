/**
 * Identifier aliases shared by lowering, scopes and resolution. NodeIds are
 * minted per workspace and never reused for a different subtree.
 */
export type NodeId = number;

/** Path or URI naming a source file */
export type FileId = string;

export type { TextSpan } from "../syntax/cst.js";
