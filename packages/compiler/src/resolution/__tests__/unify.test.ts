import { describe, expect, it } from "vitest";
import {
  containsVar,
  formatTypeInst,
  join,
  primitive,
  typeInst,
  type TypeInst,
} from "../type-inst.js";
import {
  applySubstitution,
  compareScores,
  formatSubstitution,
  matchArguments,
} from "../unify.js";

const int = primitive("int");
const varInt = primitive("int", "var");
const float = primitive("float");
const color = typeInst({ kind: "enum", name: "Color" });
const typeVar = (name: string): TypeInst => typeInst({ kind: "type-var", name });
const setVar = (name: string): TypeInst => typeInst({ kind: "set-var", name });
const arrayOf = (dimensions: TypeInst[], element: TypeInst): TypeInst =>
  typeInst({ kind: "array", dimensions, element });

describe("matchArguments", () => {
  it("rejects a different number of arguments", () => {
    expect(matchArguments([int], [])).toEqual({
      ok: false,
      reason: "expects 1 argument(s), found 0",
    });
  });

  it("never demotes var to par", () => {
    expect(matchArguments([int], [varInt])).toEqual({
      ok: false,
      reason: "argument 1: expected int, found var int",
    });
  });

  it("counts promotions and widenings separately", () => {
    const result = matchArguments([primitive("float", "var"), float], [int, color]);
    expect(result).toEqual({
      ok: true,
      substitution: new Map(),
      score: { widenings: 3, generics: 0, promotions: 1 },
    });
  });

  it("treats lifting to opt as a promotion", () => {
    const optInt = typeInst({ kind: "int" }, { opt: "opt" });
    const result = matchArguments([optInt], [int]);
    expect(result.ok && result.score).toEqual({ widenings: 0, generics: 0, promotions: 1 });
    expect(matchArguments([int], [optInt])).toEqual({
      ok: false,
      reason: "argument 1: expected int, found opt int",
    });
  });

  it("binds enum type-inst variables to int or enums only", () => {
    expect(matchArguments([setVar("$$E")], [color]).ok).toBe(true);
    expect(matchArguments([setVar("$$E")], [float])).toEqual({
      ok: false,
      reason: "argument 1: $$E only binds to int or an enum, found float",
    });
  });

  it("binds a single index variable to the whole shape of a multi-dimensional array", () => {
    const param = arrayOf([typeVar("$X")], typeVar("$T"));
    const result = matchArguments([param], [arrayOf([int, int], int)]);
    if (!result.ok) throw new Error(result.reason);

    expect(formatSubstitution(result.substitution)).toBe("$T=int, $X=tuple(int, int)");
    expect(formatTypeInst(applySubstitution(param, result.substitution))).toBe(
      "array[int, int] of int"
    );
  });
});

describe("scores and joins", () => {
  it("orders widenings before generics before promotions", () => {
    const exact = { widenings: 0, generics: 2, promotions: 2 };
    const widened = { widenings: 1, generics: 0, promotions: 0 };
    expect(compareScores(exact, widened)).toBeLessThan(0);
    expect(
      compareScores(
        { widenings: 0, generics: 1, promotions: 3 },
        { widenings: 0, generics: 2, promotions: 0 }
      )
    ).toBeLessThan(0);
  });

  it("joins numeric types and keeps var and opt", () => {
    expect(formatTypeInst(join(int, float))).toBe("float");
    expect(
      formatTypeInst(join(varInt, typeInst({ kind: "int" }, { opt: "opt" })))
    ).toBe("var opt int");
    expect(join(int, primitive("string")).base.kind).toBe("error");
  });

  it("finds var inside arrays", () => {
    expect(containsVar(arrayOf([int], varInt))).toBe(true);
    expect(containsVar(arrayOf([int], int))).toBe(false);
  });
});
