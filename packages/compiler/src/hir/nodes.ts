import type { NodeId, TextSpan } from "./ids.js";

export type Inst = "par" | "var";
export type Optionality = "plain" | "opt";

export interface HirNodeBase {
  id: NodeId;
  /** Back-reference to the CST region this node was lowered from */
  span: TextSpan;
}

export type HirItemData =
  | { itemKind: "include"; path: string }
  | { itemKind: "declaration"; declaration: NodeId }
  | { itemKind: "constraint"; expression: NodeId }
  | {
      itemKind: "solve";
      goal: "satisfy" | "minimize" | "maximize";
      objective?: NodeId;
      annotations: readonly NodeId[];
    }
  | { itemKind: "output"; expression: NodeId; annotations: readonly NodeId[] }
  | { itemKind: "assignment"; target: NodeId; value: NodeId }
  | { itemKind: "error"; message: string; text: string };

export type HirItem = HirNodeBase & { kind: "item" } & HirItemData;

export type DeclKind =
  | "function"
  | "predicate"
  | "test"
  | "annotation"
  | "variable"
  | "type-alias"
  | "enum";

export type DeclOrigin = "item" | "parameter" | "let" | "generator" | "enum-case";

export interface HirDeclarationData {
  declKind: DeclKind;
  origin: DeclOrigin;
  /** Absent for unnamed parameters */
  name?: string;
  parameters: readonly NodeId[];
  /** Functions and annotations */
  returnType?: NodeId;
  /** Variables and parameters */
  typeInst?: NodeId;
  /** Type aliases */
  aliased?: NodeId;
  /** Enumerations */
  cases: readonly NodeId[];
  /** Function body, variable definition or non-literal enum definition */
  body?: NodeId;
  annotations: readonly NodeId[];
  varCapable: boolean;
}

export type HirDeclaration = HirNodeBase & { kind: "declaration" } & HirDeclarationData;

export type HirTypeBase =
  | { kind: "primitive"; name: "bool" | "int" | "float" | "string" | "ann" }
  | { kind: "type-var"; name: string; enumVar: boolean }
  | { kind: "domain"; expression: NodeId }
  | { kind: "set"; element: NodeId }
  | { kind: "array"; dimensions: readonly NodeId[]; element: NodeId }
  | { kind: "tuple"; fields: readonly NodeId[] }
  | { kind: "missing" };

export interface HirTypeInstData {
  inst: Inst;
  opt: Optionality;
  base: HirTypeBase;
}

export type HirTypeInst = HirNodeBase & { kind: "type-inst" } & HirTypeInstData;

export type HirLiteral =
  | { type: "int"; value: string }
  | { type: "float"; value: string }
  | { type: "bool"; value: boolean }
  | { type: "string"; value: string };

export type CallSyntax =
  | { style: "call" }
  | { style: "infix"; operator: string }
  | { style: "prefix"; operator: string }
  | { style: "generator-call" };

export type HirGenerator =
  | {
      kind: "iterator";
      patterns: readonly NodeId[];
      collection: NodeId;
      where?: NodeId;
    }
  | { kind: "assignment"; pattern: NodeId; value: NodeId; where?: NodeId };

export type InterpolationPart = { text: string } | { expression: NodeId };

export type HirExpressionData =
  | { exprKind: "literal"; literal: HirLiteral }
  | { exprKind: "absent" }
  | { exprKind: "infinity" }
  | { exprKind: "anonymous" }
  | { exprKind: "identifier"; name: string }
  | { exprKind: "call"; callee: NodeId; args: readonly NodeId[]; syntax: CallSyntax }
  | { exprKind: "set-literal"; members: readonly NodeId[] }
  | { exprKind: "array-literal"; members: readonly NodeId[] }
  | { exprKind: "array-literal-2d"; rows: readonly (readonly NodeId[])[] }
  | { exprKind: "tuple-literal"; members: readonly NodeId[] }
  | { exprKind: "array-access"; collection: NodeId; indices: readonly NodeId[] }
  | { exprKind: "tuple-access"; tuple: NodeId; field: number }
  | {
      exprKind: "comprehension";
      comprehensionKind: "array" | "set";
      template: NodeId;
      generators: readonly HirGenerator[];
    }
  | {
      exprKind: "if-then-else";
      branches: readonly { condition: NodeId; result: NodeId }[];
      otherwise?: NodeId;
    }
  | { exprKind: "let"; items: readonly NodeId[]; body: NodeId }
  | { exprKind: "string-interpolation"; parts: readonly InterpolationPart[] }
  | { exprKind: "annotated"; expression: NodeId; annotations: readonly NodeId[] }
  | { exprKind: "missing" };

export type HirExpression = HirNodeBase & { kind: "expression" } & HirExpressionData;

export type HirPatternData =
  | { patternKind: "identifier"; declaration: NodeId }
  | { patternKind: "anonymous" };

export type HirPattern = HirNodeBase & { kind: "pattern" } & HirPatternData;

export type HirNode =
  | HirItem
  | HirDeclaration
  | HirTypeInst
  | HirExpression
  | HirPattern;

export type HirNodeKind = HirNode["kind"];

export type HirCall = Extract<HirExpression, { exprKind: "call" }>;
export type HirIdentifier = Extract<HirExpression, { exprKind: "identifier" }>;
