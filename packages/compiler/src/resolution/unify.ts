import {
  formatBase,
  formatTypeInst,
  sameBase,
  type TypeBase,
  type TypeInst,
} from "./type-inst.js";

/** Generic variable name (`$T`, `$$E`, `$U`) to the base it is bound to */
export type Substitution = ReadonlyMap<string, TypeBase>;

export const emptySubstitution: Substitution = new Map();

/**
 * Coercions a candidate needed; lower is more specific. Promotions count
 * par to var and plain to opt lifts.
 */
export type MatchScore = {
  widenings: number;
  generics: number;
  promotions: number;
};

export type MatchResult =
  | { ok: true; substitution: Substitution; score: MatchScore }
  | { ok: false; reason: string };

type UnifyState = {
  substitution: Substitution;
  widenings: number;
  generics: number;
  promotions: number;
};

const mismatch = (param: TypeInst, arg: TypeInst): string =>
  `expected ${formatTypeInst(param)}, found ${formatTypeInst(arg)}`;

const bind = (state: UnifyState, name: string, base: TypeBase): string | undefined => {
  state.generics += 1;
  const bound = state.substitution.get(name);
  if (bound) {
    return sameBase(bound, base)
      ? undefined
      : `${name} cannot be both ${formatBase(bound)} and ${formatBase(base)}`;
  }
  state.substitution = new Map(state.substitution).set(name, base);
  return undefined;
};

const unifyAll = (
  params: readonly TypeInst[],
  args: readonly TypeInst[],
  state: UnifyState
): string | undefined => {
  for (let index = 0; index < params.length; index += 1) {
    const param = params[index];
    const arg = args[index];
    if (param === undefined || arg === undefined) return "shape mismatch";
    const failure = unifyType(param, arg, state);
    if (failure) return failure;
  }
  return undefined;
};

const unifyType = (
  param: TypeInst,
  arg: TypeInst,
  state: UnifyState
): string | undefined => {
  if (arg.base.kind === "error" || param.base.kind === "error") return undefined;

  if (arg.inst === "var" && param.inst === "par") return mismatch(param, arg);
  if (arg.inst === "par" && param.inst === "var") state.promotions += 1;
  if (arg.opt === "opt" && param.opt === "plain") return mismatch(param, arg);
  if (arg.opt === "plain" && param.opt === "opt") state.promotions += 1;

  return unifyBase(param, arg, state);
};

const unifyBase = (
  param: TypeInst,
  arg: TypeInst,
  state: UnifyState
): string | undefined => {
  const expected = param.base;
  const found = arg.base;

  if (expected.kind === "type-var") {
    return found.kind === "bottom" ? undefined : bind(state, expected.name, found);
  }
  if (expected.kind === "set-var") {
    if (found.kind === "bottom") return undefined;
    if (found.kind !== "int" && found.kind !== "enum") {
      return `${expected.name} only binds to int or an enum, found ${formatBase(found)}`;
    }
    return bind(state, expected.name, found);
  }
  if (found.kind === "bottom" || expected.kind === "bottom") return undefined;

  switch (expected.kind) {
    case "error":
      return undefined;
    case "int":
      if (found.kind === "int") return undefined;
      if (found.kind === "enum") {
        state.widenings += 1;
        return undefined;
      }
      return mismatch(param, arg);
    case "float":
      if (found.kind === "float") return undefined;
      if (found.kind === "int") {
        state.widenings += 1;
        return undefined;
      }
      if (found.kind === "enum") {
        state.widenings += 2;
        return undefined;
      }
      return mismatch(param, arg);
    case "bool":
    case "string":
    case "ann":
      return found.kind === expected.kind ? undefined : mismatch(param, arg);
    case "enum":
      return found.kind === "enum" && found.name === expected.name
        ? undefined
        : mismatch(param, arg);
    case "set":
      return found.kind === "set"
        ? unifyType(expected.element, found.element, state)
        : mismatch(param, arg);
    case "tuple":
      return found.kind === "tuple" && found.fields.length === expected.fields.length
        ? unifyAll(expected.fields, found.fields, state)
        : mismatch(param, arg);
    case "array": {
      if (found.kind !== "array") return mismatch(param, arg);
      const [only] = expected.dimensions;
      if (
        expected.dimensions.length === 1 &&
        only?.base.kind === "type-var" &&
        found.dimensions.length > 1
      ) {
        const shape: TypeBase = { kind: "tuple", fields: found.dimensions };
        const failure = bind(state, only.base.name, shape);
        return failure ?? unifyType(expected.element, found.element, state);
      }
      if (expected.dimensions.length !== found.dimensions.length) {
        return `expected ${expected.dimensions.length} array dimension(s), found ${found.dimensions.length}`;
      }
      return (
        unifyAll(expected.dimensions, found.dimensions, state) ??
        unifyType(expected.element, found.element, state)
      );
    }
  }
};

/** Checks arguments against a candidate's parameter type-insts */
export const matchArguments = (
  params: readonly TypeInst[],
  args: readonly TypeInst[]
): MatchResult => {
  if (params.length !== args.length) {
    return {
      ok: false,
      reason: `expects ${params.length} argument(s), found ${args.length}`,
    };
  }
  const state: UnifyState = {
    substitution: emptySubstitution,
    widenings: 0,
    generics: 0,
    promotions: 0,
  };
  for (let index = 0; index < params.length; index += 1) {
    const param = params[index];
    const arg = args[index];
    if (param === undefined || arg === undefined) continue;
    const failure = unifyType(param, arg, state);
    if (failure) return { ok: false, reason: `argument ${index + 1}: ${failure}` };
  }
  return {
    ok: true,
    substitution: state.substitution,
    score: {
      widenings: state.widenings,
      generics: state.generics,
      promotions: state.promotions,
    },
  };
};

export const compareScores = (left: MatchScore, right: MatchScore): number =>
  left.widenings - right.widenings ||
  left.generics - right.generics ||
  left.promotions - right.promotions;

export const applySubstitution = (
  type: TypeInst,
  substitution: Substitution
): TypeInst => {
  const base = type.base;
  switch (base.kind) {
    case "type-var":
    case "set-var": {
      const bound = substitution.get(base.name);
      return bound ? { ...type, base: bound } : type;
    }
    case "set":
      return { ...type, base: { kind: "set", element: applySubstitution(base.element, substitution) } };
    case "tuple":
      return {
        ...type,
        base: {
          kind: "tuple",
          fields: base.fields.map((field) => applySubstitution(field, substitution)),
        },
      };
    case "array": {
      const [only] = base.dimensions;
      const shape =
        base.dimensions.length === 1 && only?.base.kind === "type-var"
          ? substitution.get(only.base.name)
          : undefined;
      const dimensions =
        shape?.kind === "tuple"
          ? shape.fields
          : base.dimensions.map((dimension) => applySubstitution(dimension, substitution));
      return {
        ...type,
        base: {
          kind: "array",
          dimensions,
          element: applySubstitution(base.element, substitution),
        },
      };
    }
    default:
      return type;
  }
};

export const formatSubstitution = (substitution: Substitution): string =>
  [...substitution.entries()]
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([name, base]) => `${name}=${formatBase(base)}`)
    .join(", ");
