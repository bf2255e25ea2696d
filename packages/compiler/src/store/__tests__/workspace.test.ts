import { describe, expect, it } from "vitest";
import type { NodeId } from "../../hir/ids.js";
import { PRELUDE_FILE } from "../../prelude/index.js";
import type { Resolution } from "../../resolution/types.js";
import type { Snapshot } from "../snapshot.js";
import { createWorkspace, type Workspace } from "../workspace.js";

const LIB = "function int: f(int: x) = x + 1;";
const MODEL = 'include "A.mzn";\nint: y = f(1);';

const inMemory = () => createWorkspace({ resolveInclude: (_from, path) => path });

const callsNamed = (snapshot: Snapshot, file: string, name: string): Resolution[] => {
  const analysis = snapshot.analysis(file);
  if (!analysis) throw new Error(`${file} is not loaded`);
  return [...analysis.resolution.resolutions.values()].filter(
    (resolution) => resolution.name === name
  );
};

const topLevelId = (workspace: Workspace, file: string, name: string): NodeId => {
  const fragment = workspace.snapshot().fragment(file);
  const node = [...(fragment?.nodes.values() ?? [])].find(
    (candidate) =>
      candidate.kind === "declaration" &&
      candidate.origin === "item" &&
      candidate.name === name
  );
  if (!node) throw new Error(`${name} is not declared in ${file}`);
  return node.id;
};

describe("workspace", () => {
  it("numbers revisions and versions per update", () => {
    const workspace = inMemory();
    expect(workspace.update("A.mzn", LIB)).toMatchObject({ revision: 1, version: 1 });
    expect(workspace.update("A.mzn", LIB)).toMatchObject({ revision: 2, version: 2 });
    expect(workspace.update("B.mzn", MODEL, 7)).toMatchObject({ revision: 3, version: 7 });
    expect(workspace.stats()).toMatchObject({ revision: 3, files: 2 });
  });

  it("resolves calls across includes and follows signature edits", () => {
    const workspace = inMemory();
    workspace.update("A.mzn", LIB);
    workspace.update("B.mzn", MODEL);
    const f = topLevelId(workspace, "A.mzn", "f");

    const [call] = callsNamed(workspace.snapshot(), "B.mzn", "f");
    expect(call?.chosen).toBe(f);
    expect(call?.failure).toBeUndefined();
    expect(workspace.snapshot().diagnostics("B.mzn")).toEqual({
      ok: true,
      value: [],
      revision: 2,
    });

    const widened = workspace.update("A.mzn", "function int: f(float: x) = x + 1;");
    expect(widened.invalidated).toContainEqual({ query: "resolution", file: "B.mzn" });
    const [afterWidening] = callsNamed(workspace.snapshot(), "B.mzn", "f");
    expect(afterWidening?.chosen).toBe(f);
    expect(afterWidening?.candidates.map((candidate) => candidate.signature)).toEqual([
      "function int: f(float)",
    ]);

    workspace.update("A.mzn", "function int: f(bool: x) = x;");
    const result = workspace.snapshot().diagnostics("B.mzn");
    if (!result.ok) throw new Error("diagnostics query failed");
    expect(result.value.map((diagnostic) => diagnostic.code)).toEqual(["RS0003"]);
    const [error] = result.value;
    expect(error?.message).toBe("no overload of f accepts (int)");
    expect(error?.span.file).toBe("B.mzn");
    expect(MODEL.slice(error?.span.start, error?.span.end)).toBe("f(1)");
    expect(error?.related?.map((note) => note.message)).toEqual([
      "function int: f(bool): argument 1: expected bool, found int",
    ]);
  });

  it("includes a file once however many times it is reached", () => {
    const workspace = inMemory();
    workspace.update("base.mzn", "int: n = 3;");
    workspace.update("mid.mzn", 'include "base.mzn";');
    workspace.update(
      "top.mzn",
      'include "base.mzn";\ninclude "mid.mzn";\nconstraint n > 0;'
    );

    const analysis = workspace.snapshot().analysis("top.mzn");
    expect(analysis?.closure).toEqual([PRELUDE_FILE, "top.mzn", "base.mzn", "mid.mzn"]);
    expect(analysis?.global.bindings.get("n")).toHaveLength(1);
    expect(workspace.snapshot().diagnostics("top.mzn")).toMatchObject({ ok: true, value: [] });
  });

  it("keeps ids and cached resolutions across edits that only move text", () => {
    const workspace = inMemory();
    workspace.update("A.mzn", LIB);
    workspace.update("B.mzn", MODEL);
    const idsBefore = [...(workspace.snapshot().fragment("A.mzn")?.nodes.keys() ?? [])];
    const first = workspace.snapshot().analysis("B.mzn");
    expect(first?.resolution.stats).toEqual({ reused: 0, computed: 1 });

    const result = workspace.update("A.mzn", "% helper\nfunction int: f(int: x) =   x + 1;");
    expect(result.invalidated.filter((key) => key.file === "B.mzn")).toEqual([
      { query: "diagnostics", file: "B.mzn" },
    ]);
    expect([...(workspace.snapshot().fragment("A.mzn")?.nodes.keys() ?? [])]).toEqual(idsBefore);

    const second = workspace.snapshot().analysis("B.mzn");
    expect(second?.resolution.stats).toEqual({ reused: 1, computed: 0 });
    expect([...(second?.resolution.resolutions.entries() ?? [])]).toEqual([
      ...(first?.resolution.resolutions.entries() ?? []),
    ]);
  });

  it("rebinds the global scope when included declarations only move", () => {
    const workspace = inMemory();
    workspace.update("A.mzn", "int: v = 1;\nfunction int: f(int: x) = x + 1;");
    workspace.update("B.mzn", 'include "A.mzn";\nint: v = 2;\nint: y = f(1);');
    workspace.snapshot().diagnostics("B.mzn");
    const before = workspace.stats().globalScopes;

    workspace.update("A.mzn", "% moved\nint: v = 1;\nfunction int: f(int: x) = x + 1;");
    const result = workspace.snapshot().diagnostics("B.mzn");
    if (!result.ok) throw new Error("diagnostics query failed");

    expect(workspace.stats().globalScopes).toEqual({
      reused: before.reused + 1,
      built: before.built,
    });
    expect(result.value).toHaveLength(1);
    expect(result.value[0]).toMatchObject({
      code: "SC0001",
      message: "v is already declared as a variable",
      span: { file: "B.mzn", start: 17, end: 28 },
      related: [{ span: { file: "A.mzn", start: 8, end: 19 } }],
    });
  });

  it("rebuilds the global scope when an included signature changes", () => {
    const workspace = inMemory();
    workspace.update("A.mzn", LIB);
    workspace.update("B.mzn", MODEL);
    workspace.snapshot().diagnostics("B.mzn");
    const before = workspace.stats().globalScopes;

    workspace.update("A.mzn", "function int: f(float: x) = 1;");
    workspace.snapshot().diagnostics("B.mzn");
    expect(workspace.stats().globalScopes).toEqual({
      reused: before.reused,
      built: before.built + 1,
    });
  });

  it("answers queries on a file whose type aliases form a cycle", () => {
    const workspace = inMemory();
    workspace.update("C.mzn", "type A = B;\ntype B = A;\nA: x;\nconstraint x > 0;");
    const snapshot = workspace.snapshot();

    expect(snapshot.getHir("C.mzn").ok).toBe(true);
    const result = snapshot.diagnostics("C.mzn");
    if (!result.ok) throw new Error("diagnostics query failed");
    expect(result.value.map((diagnostic) => diagnostic.message)).toEqual([
      "type alias A is defined in terms of itself",
      "type alias B is defined in terms of itself",
    ]);
  });

  it("reports unresolved includes once a file is removed", () => {
    const workspace = inMemory();
    workspace.update("A.mzn", LIB);
    workspace.update("B.mzn", MODEL);

    expect(workspace.remove("missing.mzn")).toBeUndefined();
    expect(workspace.remove(PRELUDE_FILE)).toBeUndefined();
    const removed = workspace.remove("A.mzn");
    expect(removed?.revision).toBe(3);

    const result = workspace.snapshot().diagnostics("B.mzn");
    if (!result.ok) throw new Error("diagnostics query failed");
    expect(result.value.map((diagnostic) => diagnostic.message)).toEqual([
      'cannot resolve include "A.mzn"',
      "no function or predicate named f is in scope",
    ]);
  });

  it("leaves files out of the workspace when includes do not resolve", () => {
    const workspace = createWorkspace();
    workspace.update("A.mzn", LIB);
    workspace.update("B.mzn", MODEL);
    expect(workspace.snapshot().includes("B.mzn")).toEqual([
      expect.objectContaining({ path: "A.mzn", target: undefined }),
    ]);
  });

  it("rejects stale versions and unknown files", () => {
    const workspace = inMemory();
    workspace.update("m.mzn", "int: a = 1;");
    const pinned = workspace.snapshot({ requireCurrent: true });
    expect(pinned.getHir("m.mzn").ok).toBe(true);

    workspace.update("m.mzn", "int: a = 2;");
    const stale = pinned.getHir("m.mzn");
    expect(stale.ok ? [] : stale.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "m.mzn version 1 is stale (current version 2)",
    ]);

    const mismatch = workspace.snapshot().getAst("m.mzn", { version: 1 });
    expect(mismatch.ok ? [] : mismatch.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      "ST0001",
    ]);

    const unknown = workspace.snapshot().prettyPrint("nope.mzn");
    expect(unknown.ok ? [] : unknown.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "nope.mzn is not part of the workspace",
    ]);
  });

  it("answers node lookups only for nodes of the file", () => {
    const workspace = inMemory();
    workspace.update("A.mzn", LIB);
    workspace.update("B.mzn", MODEL);
    const f = topLevelId(workspace, "A.mzn", "f");
    const fragment = workspace.snapshot().fragment("B.mzn");
    const call = [...(fragment?.nodes.values() ?? [])].find(
      (node) => node.kind === "expression" && node.exprKind === "call"
    );
    if (!call) throw new Error("no call in B.mzn");

    const resolution = workspace.snapshot().getResolution("B.mzn", call.id);
    expect(resolution.ok && resolution.value?.chosen).toBe(f);

    const foreign = workspace.snapshot().getResolution("B.mzn", f);
    expect(foreign.ok ? [] : foreign.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      `B.mzn has no node #${f}`,
    ]);
  });
});
