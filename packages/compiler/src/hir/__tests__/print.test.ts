import { describe, expect, it } from "vitest";
import { NodeIdAllocator } from "../../lowering/identity.js";
import { lowerFile } from "../../lowering/lowering.js";
import type { Resolution } from "../../resolution/types.js";
import { parse } from "../../syntax/parser.js";
import { dumpHir } from "../dump.js";
import { printFragment, printName } from "../print.js";

const lower = (text: string) =>
  lowerFile({
    file: "model.mzn",
    tree: parse(text, "model.mzn"),
    allocator: new NodeIdAllocator(),
  }).fragment;

describe("printFragment", () => {
  it("prints one normalized item per line", () => {
    const fragment = lower(
      [
        "array[1..3] of var 0..9:q;",
        "constraint forall(i in 1..3 where i>1)(q[i]>=(1+2)*3);",
        "solve::int_search(q,first_fail,indomain_min)satisfy;",
      ].join("\n")
    );
    expect(printFragment(fragment)).toBe(
      [
        "array[1 .. 3] of var 0 .. 9: q;",
        "constraint forall (i in 1 .. 3 where i > 1) (q[i] >= (1 + 2) * 3);",
        "solve :: int_search(q, first_fail, indomain_min) satisfy;",
        "",
      ].join("\n")
    );
  });

  it("keeps the parentheses associativity needs", () => {
    const fragment = lower("constraint (a - b) - c = a - (b - c);");
    expect(printFragment(fragment)).toBe("constraint a - b - c = a - (b - c);\n");
  });
});

describe("printName", () => {
  it("quotes operators, keywords and names outside the plain alphabet", () => {
    expect(["x", "+", "in", "_x", "my_var2"].map(printName)).toEqual([
      "x",
      "'+'",
      "'in'",
      "'_x'",
      "my_var2",
    ]);
  });
});

describe("dumpHir", () => {
  it("marks failed resolutions with their code", () => {
    const fragment = lower("constraint z;");
    const [root] = fragment.roots;
    const item = root === undefined ? undefined : fragment.nodes.get(root);
    if (item?.kind !== "item" || item.itemKind !== "constraint") {
      throw new Error("expected a constraint item");
    }
    const use = item.expression;
    const failed: Resolution = {
      node: use,
      name: "z",
      kind: "identifier",
      declarations: [],
      substitution: new Map(),
      candidates: [],
      failure: { code: "RS0001", params: { kind: "unknown-identifier", name: "z", callee: false } },
    };

    expect(
      dumpHir(fragment, {
        ids: true,
        resolutionOf: (id) => (id === use ? failed : undefined),
      })
    ).toBe([`Item constraint #${item.id}`, `  Identifier z #${use} -> !RS0001`].join("\n"));
  });
});
