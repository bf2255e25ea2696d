import { describe, expect, it } from "vitest";
import { getDeclaration, type HirFragment } from "../../hir/graph.js";
import type { FileId } from "../../hir/ids.js";
import type { HirExpression } from "../../hir/nodes.js";
import { walkHir } from "../../hir/walk.js";
import { NodeIdAllocator } from "../../lowering/identity.js";
import { lowerFile } from "../../lowering/lowering.js";
import { parse } from "../../syntax/parser.js";
import { buildGlobalScope } from "../global-scope.js";
import { includeClosure, type IncludeEdge } from "../includes.js";
import { buildLexicalScopes } from "../lexical-scopes.js";
import { ScopeArena } from "../scope-arena.js";

const allocator = new NodeIdAllocator();

const lower = (file: FileId, text: string): HirFragment =>
  lowerFile({ file, tree: parse(text, file), allocator }).fragment;

const findComprehension = (
  fragment: HirFragment
): Extract<HirExpression, { exprKind: "comprehension" }> => {
  const found: Extract<HirExpression, { exprKind: "comprehension" }>[] = [];
  walkHir({
    fragment,
    enter: (node) => {
      if (node.kind === "expression" && node.exprKind === "comprehension") {
        found.push(node);
        return { stop: true };
      }
      return undefined;
    },
  });
  const [first] = found;
  if (!first) throw new Error("no comprehension");
  return first;
};

const getLetId = (fragment: HirFragment): number => {
  const ids: number[] = [];
  walkHir({
    fragment,
    enter: (node) => {
      if (node.kind === "expression" && node.exprKind === "let") {
        ids.push(node.id);
        return { stop: true };
      }
      return undefined;
    },
  });
  const [id] = ids;
  if (id === undefined) throw new Error("no let");
  return id;
};

describe("lexical scopes", () => {
  const fragment = lower(
    "body.mzn",
    "function int: f(int: x) = let { int: y = x } in sum([y + i | i in 1..y, j in 1..i]);"
  );
  const scopes = buildLexicalScopes(fragment);
  const comprehension = findComprehension(fragment);

  it("opens parameter, let and generator scopes in order", () => {
    expect(scopes.arena.all().map((id) => scopes.arena.info(id).kind)).toEqual([
      "parameters",
      "let",
      "generator",
      "generator",
    ]);
  });

  it("chains each generator to the one before it", () => {
    const last = scopes.byOwner.get(`${comprehension.id}:1`);
    if (!last) throw new Error("missing generator scope");
    expect(scopes.arena.chain(last).map((id) => scopes.arena.names(id))).toEqual([
      ["j"],
      ["i"],
      ["y"],
      ["x"],
    ]);
    expect(scopes.enclosing.get(comprehension.template)).toEqual(last);
  });

  it("evaluates a generator's collection outside its own variables", () => {
    const [first, second] = comprehension.generators;
    if (first?.kind !== "iterator" || second?.kind !== "iterator") {
      throw new Error("expected iterators");
    }
    expect(scopes.enclosing.get(first.collection)).toEqual(
      scopes.byOwner.get(`${getLetId(fragment)}`)
    );
    expect(scopes.enclosing.get(second.collection)).toEqual(
      scopes.byOwner.get(`${comprehension.id}:0`)
    );
  });

  it("reports duplicates inside one let", () => {
    const local = buildLexicalScopes(
      lower("dup.mzn", "int: z = let { int: a = 1; int: a = 2 } in a;")
    );
    expect(local.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "a is already declared as a local variable",
    ]);
    expect(local.diagnostics[0]?.related?.[0]?.message).toBe(
      "previous declaration is here"
    );
  });

  it("lets a generator shadow a let binding without a diagnostic", () => {
    const local = buildLexicalScopes(
      lower("shadow.mzn", "int: z = let { int: i = 1 } in sum([i | i in 1..3]);")
    );
    expect(local.diagnostics).toEqual([]);
  });
});

describe("global scope", () => {
  it("groups overloads and rejects other name clashes", () => {
    const a = lower(
      "a.mzn",
      "function int: f(int: x) = x;\nfunction float: f(float: x) = x;\nint: v = 1;"
    );
    const b = lower("b.mzn", "int: v = 2;\npredicate f(bool: b);");
    const fragments = new Map([
      ["a.mzn", a],
      ["b.mzn", b],
    ]);
    const global = buildGlobalScope({
      entry: "b.mzn",
      closure: ["a.mzn", "b.mzn"],
      fragmentOf: (file) => fragments.get(file),
    });

    expect(global.bindings.get("f")?.map((binding) => binding.file)).toEqual([
      "a.mzn",
      "a.mzn",
      "b.mzn",
    ]);
    expect(global.bindings.get("v")?.map((binding) => binding.file)).toEqual([
      "a.mzn",
    ]);
    expect(global.diagnostics).toHaveLength(1);
    expect(global.diagnostics[0]).toMatchObject({
      code: "SC0001",
      message: "v is already declared as a variable",
      span: { file: "b.mzn", start: 0, end: 11 },
    });
  });

  it("flags identical overloads only when both have bodies", () => {
    const twice = lower(
      "twice.mzn",
      "function int: g(int: x) = x;\nfunction int: g(int: y) = y + 1;"
    );
    const withBodies = buildGlobalScope({
      entry: "twice.mzn",
      closure: ["twice.mzn"],
      fragmentOf: () => twice,
    });
    expect(withBodies.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "g already defines function int: g(int)",
    ]);

    const declared = lower(
      "declared.mzn",
      "function int: g(int: x);\nfunction int: g(int: x) = x;"
    );
    const withOneBody = buildGlobalScope({
      entry: "declared.mzn",
      closure: ["declared.mzn"],
      fragmentOf: () => declared,
    });
    expect(withOneBody.diagnostics).toEqual([]);
    expect(withOneBody.bindings.get("g")).toHaveLength(2);
  });

  it("reports type aliases that expand back to themselves", () => {
    const fragment = lower(
      "alias.mzn",
      "type A = B;\ntype B = A;\ntype C = set of A;\ntype D = int;"
    );
    const global = buildGlobalScope({
      entry: "alias.mzn",
      closure: ["alias.mzn"],
      fragmentOf: () => fragment,
    });

    expect(global.cycles.map((binding) => binding.declaration.name)).toEqual(["A", "B"]);
    expect(
      global.diagnostics.map(({ code, message, span }) => ({ code, message, span }))
    ).toEqual([
      {
        code: "SC0003",
        message: "type alias A is defined in terms of itself",
        span: { file: "alias.mzn", start: 0, end: 11 },
      },
      {
        code: "SC0003",
        message: "type alias B is defined in terms of itself",
        span: { file: "alias.mzn", start: 12, end: 23 },
      },
    ]);
  });

  it("declares enum cases globally", () => {
    const fragment = lower("enum.mzn", "enum Colour = {Red, Green};");
    const global = buildGlobalScope({
      entry: "enum.mzn",
      closure: ["enum.mzn"],
      fragmentOf: () => fragment,
    });
    const red = global.bindings.get("Red")?.[0];
    expect(red && getDeclaration(fragment, red.declaration.id).origin).toBe(
      "enum-case"
    );
  });
});

describe("include closure", () => {
  const edge = (target: FileId): IncludeEdge => ({
    item: 0,
    path: target,
    span: { start: 0, end: 0 },
    target,
  });

  it("visits the prelude first, then includes depth first, once each", () => {
    const graph = new Map<FileId, IncludeEdge[]>([
      ["entry", [edge("a"), edge("b")]],
      ["a", [edge("b")]],
      ["b", [edge("a"), edge("c")]],
    ]);
    expect(
      includeClosure({
        entry: "entry",
        prelude: "prelude",
        includesOf: (file) => graph.get(file) ?? [],
      })
    ).toEqual(["prelude", "entry", "a", "b", "c"]);
  });
});

describe("scope arena", () => {
  it("rejects ids issued by another arena", () => {
    const first = new ScopeArena();
    const second = new ScopeArena();
    const id = first.create({ kind: "let", owner: "1", span: { start: 0, end: 1 } });
    expect(first.owns(id)).toBe(true);
    expect(second.owns(id)).toBe(false);
    expect(() => second.info(id)).toThrow(/stale scope id/);
  });
});
