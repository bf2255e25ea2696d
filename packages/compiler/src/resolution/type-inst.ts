import type { Inst, Optionality } from "../hir/nodes.js";

export type TypeBase =
  | { kind: "bool" }
  | { kind: "int" }
  | { kind: "float" }
  | { kind: "string" }
  | { kind: "ann" }
  | { kind: "enum"; name: string }
  | { kind: "set"; element: TypeInst }
  | { kind: "array"; dimensions: readonly TypeInst[]; element: TypeInst }
  | { kind: "tuple"; fields: readonly TypeInst[] }
  /** `$T` */
  | { kind: "type-var"; name: string }
  /** `$$E`: binds to int or an enum only */
  | { kind: "set-var"; name: string }
  /** Type of `<>`, `_` and the elements of empty literals */
  | { kind: "bottom" }
  | { kind: "error" };

export interface TypeInst {
  readonly inst: Inst;
  readonly opt: Optionality;
  readonly base: TypeBase;
}

export type PrimitiveKind = "bool" | "int" | "float" | "string" | "ann";

export const typeInst = (
  base: TypeBase,
  { inst = "par", opt = "plain" }: { inst?: Inst; opt?: Optionality } = {}
): TypeInst => ({ inst, opt, base });

export const primitive = (kind: PrimitiveKind, inst: Inst = "par"): TypeInst =>
  typeInst({ kind }, { inst });

export const errorType: TypeInst = typeInst({ kind: "error" });
export const bottomType: TypeInst = typeInst({ kind: "bottom" });

export const isError = (type: TypeInst): boolean => type.base.kind === "error";

/** Whether any part of the value can be a decision variable */
export const containsVar = (type: TypeInst): boolean => {
  if (type.inst === "var") return true;
  switch (type.base.kind) {
    case "array":
    case "set":
      return containsVar(type.base.element);
    case "tuple":
      return type.base.fields.some(containsVar);
    default:
      return false;
  }
};

export const withInst = (type: TypeInst, inst: Inst): TypeInst =>
  type.inst === inst ? type : { ...type, inst };

export const maxInst = (left: Inst, right: Inst): Inst =>
  left === "var" || right === "var" ? "var" : "par";

export const maxOpt = (left: Optionality, right: Optionality): Optionality =>
  left === "opt" || right === "opt" ? "opt" : "plain";

export const sameBase = (left: TypeBase, right: TypeBase): boolean => {
  switch (left.kind) {
    case "enum":
      return right.kind === "enum" && right.name === left.name;
    case "set":
      return right.kind === "set" && sameType(left.element, right.element);
    case "array":
      return (
        right.kind === "array" &&
        right.dimensions.length === left.dimensions.length &&
        left.dimensions.every((dimension, index) => {
          const other = right.dimensions[index];
          return other !== undefined && sameType(dimension, other);
        }) &&
        sameType(left.element, right.element)
      );
    case "tuple":
      return (
        right.kind === "tuple" &&
        right.fields.length === left.fields.length &&
        left.fields.every((field, index) => {
          const other = right.fields[index];
          return other !== undefined && sameType(field, other);
        })
      );
    case "type-var":
    case "set-var":
      return right.kind === left.kind && right.name === left.name;
    default:
      return right.kind === left.kind;
  }
};

export const sameType = (left: TypeInst, right: TypeInst): boolean =>
  left.inst === right.inst && left.opt === right.opt && sameBase(left.base, right.base);

/** Least upper bound used for literal members and branches */
export const join = (left: TypeInst, right: TypeInst): TypeInst => {
  const inst = maxInst(left.inst, right.inst);
  const opt = maxOpt(left.opt, right.opt);
  const base = joinBase(left.base, right.base);
  return { inst, opt, base };
};

const joinBase = (left: TypeBase, right: TypeBase): TypeBase => {
  if (left.kind === "error" || right.kind === "error") return { kind: "error" };
  if (left.kind === "bottom") return right;
  if (right.kind === "bottom") return left;
  if (sameBase(left, right)) return left;

  const numeric = (base: TypeBase) =>
    base.kind === "int" || base.kind === "float" || base.kind === "enum";
  if (numeric(left) && numeric(right)) {
    return left.kind === "float" || right.kind === "float"
      ? { kind: "float" }
      : { kind: "int" };
  }
  if (left.kind === "set" && right.kind === "set") {
    return { kind: "set", element: join(left.element, right.element) };
  }
  if (
    left.kind === "array" &&
    right.kind === "array" &&
    left.dimensions.length === right.dimensions.length
  ) {
    return {
      kind: "array",
      dimensions: left.dimensions,
      element: join(left.element, right.element),
    };
  }
  if (
    left.kind === "tuple" &&
    right.kind === "tuple" &&
    left.fields.length === right.fields.length
  ) {
    return {
      kind: "tuple",
      fields: left.fields.map((field, index) => {
        const other = right.fields[index];
        return other === undefined ? field : join(field, other);
      }),
    };
  }
  return { kind: "error" };
};

export const formatBase = (base: TypeBase): string => {
  switch (base.kind) {
    case "enum":
    case "type-var":
    case "set-var":
      return base.name;
    case "set":
      return `set of ${formatTypeInst(base.element)}`;
    case "array":
      return `array[${base.dimensions.map(formatTypeInst).join(", ")}] of ${formatTypeInst(base.element)}`;
    case "tuple":
      return `tuple(${base.fields.map(formatTypeInst).join(", ")})`;
    case "bottom":
      return "_";
    case "error":
      return "<error>";
    default:
      return base.kind;
  }
};

export const formatTypeInst = (type: TypeInst): string =>
  `${type.inst === "var" ? "var " : ""}${type.opt === "opt" ? "opt " : ""}${formatBase(type.base)}`;
