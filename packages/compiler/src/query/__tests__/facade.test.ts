import { describe, expect, it } from "vitest";
import type { HirFragment } from "../../hir/graph.js";
import type { NodeId } from "../../hir/ids.js";
import type { HirNode } from "../../hir/nodes.js";
import { createWorkspace } from "../../store/workspace.js";
import { createQueryFacade } from "../facade.js";

const MODEL = "int: x = 2;\nconstraint x > 1;";
const FUNCTION = "function int: f(int: x) = let { int: y = x } in y;";

const setup = (file: string, text: string) => {
  const workspace = createWorkspace();
  workspace.update(file, text);
  return { workspace, facade: createQueryFacade(workspace) };
};

const expectValue = <T>(result: { ok: true; value: T } | { ok: false }): T => {
  if (!result.ok) throw new Error("query failed");
  return result.value;
};

const findNode = (
  fragment: HirFragment | undefined,
  match: (node: HirNode) => boolean
): NodeId => {
  const node = [...(fragment?.nodes.values() ?? [])].find(match);
  if (!node) throw new Error("node not found");
  return node.id;
};

describe("query facade", () => {
  it("dumps the concrete tree with spans", () => {
    const { facade } = setup("m.mzn", MODEL);
    const cst = expectValue(facade.getCst("m.mzn"));
    expect(cst.split("\n")[0]).toBe("source_file [0..29]");
  });

  it("dumps the lowered tree without ids", () => {
    const { facade } = setup("m.mzn", MODEL);
    expect(expectValue(facade.getAst("m.mzn"))).toBe(
      [
        "Item declaration",
        "  Declaration variable x",
        "    TypeInst par int",
        '    Literal int "2"',
        "Item constraint",
        "  Call '>' (infix)",
        "    Identifier '>'",
        "    Identifier x",
        '    Literal int "1"',
      ].join("\n")
    );
  });

  it("annotates identifier uses with the declaration they bind to", () => {
    const { workspace, facade } = setup("f.mzn", FUNCTION);
    const fragment = workspace.snapshot().fragment("f.mzn");
    const use = findNode(
      fragment,
      (node) => node.kind === "expression" && node.exprKind === "identifier" && node.name === "y"
    );
    const declaration = findNode(
      fragment,
      (node) => node.kind === "declaration" && node.name === "y"
    );

    const lines = expectValue(facade.getHir("f.mzn")).split("\n");
    expect(lines.map((line) => line.trim())).toContain(
      `Identifier y #${use} -> decl#${declaration}`
    );
  });

  it("lists visible names innermost first without the prelude", () => {
    const { facade } = setup("f.mzn", FUNCTION);
    const offset = FUNCTION.lastIndexOf("y");
    const names = expectValue(facade.getScope("f.mzn", offset)).map(({ name, summary }) => ({
      name,
      summary,
    }));
    expect(names).toEqual([
      { name: "y", summary: "int: y" },
      { name: "x", summary: "int: x" },
      { name: "f", summary: "function int: f(int)" },
    ]);
  });

  it("pretty prints normalized source", () => {
    const { facade } = setup("m.mzn", "int:x=2;constraint x>1;");
    expect(expectValue(facade.prettyPrint("m.mzn"))).toBe("int: x = 2;\nconstraint x > 1;\n");
  });

  it("reads the latest revision on every call", () => {
    const { workspace, facade } = setup("m.mzn", MODEL);
    expect(expectValue(facade.diagnostics("m.mzn"))).toEqual([]);

    workspace.update("m.mzn", "constraint z > 1;");
    const diagnostics = expectValue(facade.diagnostics("m.mzn"));
    expect(diagnostics.map(({ code, message }) => ({ code, message }))).toEqual([
      { code: "RS0001", message: "unknown identifier z" },
    ]);
    expect(expectValue(facade.getAst("m.mzn", { version: 2 })).split("\n")[0]).toBe(
      "Item constraint"
    );
  });
});
