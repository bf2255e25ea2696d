import { describe, expect, it } from "vitest";
import {
  getDeclaration,
  getExpression,
  getItem,
  getPattern,
  topLevelDeclarations,
} from "../../hir/graph.js";
import { parse } from "../../syntax/parser.js";
import { NodeIdAllocator, type IdentityTable } from "../identity.js";
import { lowerFile } from "../lowering.js";

const lower = (
  text: string,
  {
    allocator = new NodeIdAllocator(),
    previous,
  }: { allocator?: NodeIdAllocator; previous?: IdentityTable } = {}
) =>
  lowerFile({
    file: "model.mzn",
    tree: parse(text, "model.mzn"),
    allocator,
    previous,
  });

const firstDeclaration = (text: string) => {
  const { fragment } = lower(text);
  return getDeclaration(fragment, topLevelDeclarations(fragment)[0].id);
};

describe("lowering", () => {
  it("keeps valid items around a broken one", () => {
    const { fragment, diagnostics } = lower(
      "int: a = 1;\nint b = 2;\nint: c = 3;\n"
    );

    const items = fragment.roots.map((root) => getItem(fragment, root));
    expect(items.map((item) => item.itemKind)).toEqual([
      "declaration",
      "error",
      "declaration",
    ]);
    expect(topLevelDeclarations(fragment).map((decl) => decl.name)).toEqual([
      "a",
      "c",
    ]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.code).toBe("SX0001");
    expect(diagnostics[0]?.message).toBe(
      "syntax error: expected ':', found 'b'"
    );

    const broken = items[1];
    if (broken?.itemKind !== "error") throw new Error("expected an error item");
    expect(broken.text).toBe("int b = 2;");
    expect(broken.message).toBe(diagnostics[0]?.message);
  });

  it("lowers a broken definition to a missing expression", () => {
    const { fragment, diagnostics } = lower("int: a = 1;\nint: b = ;\nint: c = 3;\n");

    expect(fragment.roots.map((root) => getItem(fragment, root).itemKind)).toEqual([
      "declaration",
      "declaration",
      "declaration",
    ]);
    const b = topLevelDeclarations(fragment)[1];
    expect(b?.name).toBe("b");
    if (b?.body === undefined) throw new Error("expected a definition");
    expect(getExpression(fragment, b.body).exprKind).toBe("missing");
    expect(diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "syntax error: expected an expression, found ';'",
    ]);
  });

  it("keeps the items after an unclosed bracket", () => {
    const { fragment, diagnostics } = lower(
      "int: a = (1;\nint: b = 2;\nint: c = 3;\nconstraint b < c;"
    );

    expect(topLevelDeclarations(fragment).map((decl) => decl.name)).toEqual([
      "a",
      "b",
      "c",
    ]);
    expect(fragment.roots.map((root) => getItem(fragment, root).itemKind)).toEqual([
      "declaration",
      "declaration",
      "declaration",
      "constraint",
    ]);
    expect(diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "syntax error: expected ')', found ';'",
    ]);
  });

  it("gives every non-root node exactly one parent", () => {
    const { fragment } = lower(
      "function int: f(int: x) = let { int: y = x * 2 } in y + 1;\nconstraint forall (i in 1..3) (f(i) > 0);\n"
    );

    const roots = new Set(fragment.roots);
    fragment.nodes.forEach((node) => {
      if (roots.has(node.id)) {
        expect(fragment.parents.has(node.id)).toBe(false);
      } else {
        expect(fragment.parents.has(node.id)).toBe(true);
      }
    });
  });

  it("desugars operators into calls of the operator function", () => {
    const { fragment } = lower("constraint a == b;");
    const item = getItem(fragment, fragment.roots[0]);
    if (item.itemKind !== "constraint") throw new Error("expected a constraint");

    const call = getExpression(fragment, item.expression);
    if (call.exprKind !== "call") throw new Error("expected a call");
    expect(call.syntax).toEqual({ style: "infix", operator: "==" });
    expect(getExpression(fragment, call.callee)).toMatchObject({
      exprKind: "identifier",
      name: "=",
    });
    expect(call.args.map((arg) => getExpression(fragment, arg))).toMatchObject([
      { exprKind: "identifier", name: "a" },
      { exprKind: "identifier", name: "b" },
    ]);
  });

  it("lowers generator calls to a call over an array comprehension", () => {
    const { fragment } = lower("constraint forall (i in 1..3) (i > 0);");
    const item = getItem(fragment, fragment.roots[0]);
    if (item.itemKind !== "constraint") throw new Error("expected a constraint");

    const call = getExpression(fragment, item.expression);
    if (call.exprKind !== "call") throw new Error("expected a call");
    expect(call.syntax).toEqual({ style: "generator-call" });
    expect(call.args).toHaveLength(1);

    const comprehension = getExpression(fragment, call.args[0]);
    if (comprehension.exprKind !== "comprehension") {
      throw new Error("expected a comprehension");
    }
    expect(comprehension.comprehensionKind).toBe("array");
    const generator = comprehension.generators[0];
    if (generator?.kind !== "iterator") throw new Error("expected an iterator");

    const pattern = getPattern(fragment, generator.patterns[0]);
    if (pattern.patternKind !== "identifier") throw new Error("expected a name");
    expect(getDeclaration(fragment, pattern.declaration)).toMatchObject({
      name: "i",
      origin: "generator",
      declKind: "variable",
    });
  });

  it("normalises integer literals and unquotes identifiers", () => {
    const { fragment } = lower("int: h = 0x1F;\nfunction int: '+'(int: a) = a;");
    const [h, plus] = topLevelDeclarations(fragment);
    expect(plus?.name).toBe("+");
    if (h?.body === undefined) throw new Error("expected a definition");
    expect(getExpression(fragment, h.body)).toMatchObject({
      exprKind: "literal",
      literal: { type: "int", value: "31" },
    });
  });

  it("declares enum cases beside their enum", () => {
    const { fragment } = lower("enum Colour = {Red, Green};");
    expect(
      topLevelDeclarations(fragment).map((decl) => [decl.name, decl.origin])
    ).toEqual([
      ["Colour", "item"],
      ["Red", "enum-case"],
      ["Green", "enum-case"],
    ]);
  });

  it("marks which declarations can be decision variables", () => {
    expect(firstDeclaration("var int: v;").varCapable).toBe(true);
    expect(firstDeclaration("int: n = 3;").varCapable).toBe(false);
    expect(firstDeclaration("array[1..3] of var int: xs;").varCapable).toBe(true);
    expect(firstDeclaration("predicate p(var int: x);").varCapable).toBe(true);
    expect(firstDeclaration("test t(int: x) = true;").varCapable).toBe(false);
    expect(firstDeclaration("function var int: g(var int: x);").varCapable).toBe(true);
    expect(firstDeclaration("function int: h(int: x) = x;").varCapable).toBe(false);
  });
});

describe("node identity", () => {
  const source = "function int: f(int: x) = x + 1;\nint: y = f(1);\n";

  it("reuses every id after a whitespace and comment edit", () => {
    const allocator = new NodeIdAllocator();
    const before = lower(source, { allocator });
    const after = lower(
      "% helper\nfunction int: f(int: x) =\n  x + 1;\n\nint: y = f( 1 );\n",
      { allocator, previous: before.identities }
    );

    expect([...after.fragment.nodes.keys()]).toEqual([
      ...before.fragment.nodes.keys(),
    ]);
    expect(after.fragment.roots).toEqual(before.fragment.roots);
    expect(after.stats).toEqual({
      reused: before.fragment.nodes.size,
      minted: 0,
    });
    expect(allocator.issued).toBe(before.fragment.nodes.size);
  });

  it("keeps a declaration's id when only its body changes", () => {
    const allocator = new NodeIdAllocator();
    const before = lower("int: y = 1;", { allocator });
    const after = lower("int: y = 2;", { allocator, previous: before.identities });

    const [oldY] = topLevelDeclarations(before.fragment);
    const [newY] = topLevelDeclarations(after.fragment);
    expect(newY?.id).toBe(oldY?.id);
    expect(newY?.typeInst).toBe(oldY?.typeInst);
    expect(newY?.body).not.toBe(oldY?.body);
    expect(after.stats).toEqual({ reused: 3, minted: 1 });
  });

  it("mints fresh ids without a previous lowering", () => {
    const allocator = new NodeIdAllocator();
    const first = lower(source, { allocator });
    const second = lower(source, { allocator });
    const firstIds = new Set(first.fragment.nodes.keys());
    expect([...second.fragment.nodes.keys()].some((id) => firstIds.has(id))).toBe(
      false
    );
  });

  it("maps offsets back to the innermost node", () => {
    const { fragment, sourceMap } = lower("int: y = 1;");
    const [y] = topLevelDeclarations(fragment);
    const innermost = sourceMap.nodesAt(9)[0];
    expect(innermost).toBe(y?.body);
    expect(sourceMap.spanOf(innermost ?? -1)).toEqual({ start: 9, end: 10 });
  });
});
