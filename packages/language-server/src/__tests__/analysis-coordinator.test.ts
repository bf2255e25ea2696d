import { describe, expect, it } from "vitest";
import { FileChangeType } from "vscode-languageserver/lib/node/main.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import { toFileUri } from "../project/files.js";
import { AnalysisCoordinator, openDocumentUris } from "../server/analysis-coordinator.js";

const LIB = "function int: f(int: x) = x + 1;";
const MODEL = 'include "a.mzn";\nint: y = f(1);';

const memoryFiles = (files: Record<string, string>) => {
  const contents = new Map(Object.entries(files));
  const reads: string[] = [];
  return {
    contents,
    reads,
    readSource: async (filePath: string) => {
      reads.push(filePath);
      return contents.get(filePath);
    },
  };
};

const open = (filePath: string, text: string, version = 1) =>
  TextDocument.create(toFileUri(filePath), "minizinc", version, text);

const messages = async (coordinator: AnalysisCoordinator, filePath: string) =>
  (await coordinator.diagnosticsForUri(toFileUri(filePath))).map(({ message }) => message);

describe("analysis coordinator", () => {
  it("publishes protocol diagnostics for an open document", async () => {
    const coordinator = new AnalysisCoordinator({ readSource: memoryFiles({}).readSource });
    await coordinator.updateDocument(open("/work/m.mzn", "int: a = 1;\nint: x = z;"));

    expect(await coordinator.diagnosticsForUri(toFileUri("/work/m.mzn"))).toEqual([
      {
        range: { start: { line: 1, character: 9 }, end: { line: 1, character: 10 } },
        code: "RS0001",
        source: "tessera",
        message: "unknown identifier z",
        severity: 1,
      },
    ]);
  });

  it("loads includes beside the file, then from include directories", async () => {
    const disk = memoryFiles({ "/libs/a.mzn": LIB });
    const coordinator = new AnalysisCoordinator({
      includeDirs: ["/libs"],
      readSource: disk.readSource,
    });

    const keys = await coordinator.updateDocument(open("/work/b.mzn", MODEL));

    expect(disk.reads).toEqual(["/work/a.mzn", "/libs/a.mzn"]);
    expect(keys).toContainEqual({ query: "diagnostics", file: "/work/b.mzn" });
    expect(await messages(coordinator, "/work/b.mzn")).toEqual([]);
  });

  it("prefers open documents over the disk", async () => {
    const disk = memoryFiles({ "/work/a.mzn": "function int: f(bool: x) = 1;" });
    const coordinator = new AnalysisCoordinator({ readSource: disk.readSource });

    await coordinator.updateDocument(open("/work/a.mzn", LIB));
    await coordinator.updateDocument(open("/work/b.mzn", MODEL));

    expect(disk.reads).toEqual([]);
    expect(await messages(coordinator, "/work/b.mzn")).toEqual([]);
  });

  it("falls back to the disk when a document closes", async () => {
    const disk = memoryFiles({ "/work/a.mzn": LIB });
    const coordinator = new AnalysisCoordinator({ readSource: disk.readSource });
    const edited = open("/work/a.mzn", "function int: f(bool: x) = 1;");

    await coordinator.updateDocument(edited);
    await coordinator.updateDocument(open("/work/b.mzn", MODEL));
    expect(await messages(coordinator, "/work/b.mzn")).toEqual(["no overload of f accepts (int)"]);

    await coordinator.removeDocument(edited);
    expect(await messages(coordinator, "/work/b.mzn")).toEqual([]);
  });

  it("forgets closed documents that have no file on disk", async () => {
    const coordinator = new AnalysisCoordinator({ readSource: memoryFiles({}).readSource });
    const scratch = open("/work/a.mzn", LIB);

    await coordinator.updateDocument(scratch);
    await coordinator.updateDocument(open("/work/b.mzn", MODEL));
    const keys = await coordinator.removeDocument(scratch);

    expect(keys).toContainEqual({ query: "diagnostics", file: "/work/b.mzn" });
    expect(await messages(coordinator, "/work/b.mzn")).toEqual([
      'cannot resolve include "a.mzn"',
      "no function or predicate named f is in scope",
    ]);
  });

  it("picks up include targets created on disk", async () => {
    const disk = memoryFiles({});
    const coordinator = new AnalysisCoordinator({ readSource: disk.readSource });
    await coordinator.updateDocument(open("/work/b.mzn", MODEL));
    expect(await messages(coordinator, "/work/b.mzn")).toHaveLength(2);

    disk.contents.set("/work/a.mzn", LIB);
    const keys = await coordinator.handleWatchedFileChanges([
      { uri: toFileUri("/work/a.mzn"), type: FileChangeType.Created },
      { uri: toFileUri("/work/notes.txt"), type: FileChangeType.Created },
    ]);

    expect(keys).toContainEqual({ query: "diagnostics", file: "/work/b.mzn" });
    expect(await messages(coordinator, "/work/b.mzn")).toEqual([]);
  });

  it("ignores watched changes to open documents", async () => {
    const coordinator = new AnalysisCoordinator({ readSource: memoryFiles({}).readSource });
    await coordinator.updateDocument(open("/work/m.mzn", "int: x = 1;"));
    const revision = coordinator.revision;

    const keys = await coordinator.handleWatchedFileChanges([
      { uri: toFileUri("/work/m.mzn"), type: FileChangeType.Deleted },
    ]);

    expect(keys).toEqual([]);
    expect(coordinator.revision).toBe(revision);
  });

  it("reuses diagnostics until the revision moves", async () => {
    const coordinator = new AnalysisCoordinator({ readSource: memoryFiles({}).readSource });
    await coordinator.updateDocument(open("/work/m.mzn", "int: x = z;"));
    const uri = toFileUri("/work/m.mzn");

    const first = await coordinator.diagnosticsForUri(uri);
    expect(await coordinator.diagnosticsForUri(uri)).toBe(first);

    const pending = coordinator.updateDocument(open("/work/m.mzn", "int: x = 1;", 2));
    expect(await coordinator.diagnosticsForUri(uri)).toEqual([]);
    await pending;
  });

  it("answers view requests from the latest revision", async () => {
    const coordinator = new AnalysisCoordinator({ readSource: memoryFiles({}).readSource });
    const uri = toFileUri("/work/f.mzn");
    const source = "function int: f(int: x) = let { int: y = x } in y;";
    await coordinator.updateDocument(open("/work/f.mzn", "int: x = 2;\nconstraint x > 1;"));

    const cst = await coordinator.view({ uri, kind: "cst" });
    expect(cst.split("\n")[0]).toBe("source_file [0..29]");
    expect(await coordinator.view({ uri, kind: "prettyPrint" })).toBe(
      "int: x = 2;\nconstraint x > 1;\n"
    );

    await coordinator.updateDocument(open("/work/f.mzn", source, 2));
    expect(
      await coordinator.view({
        uri,
        kind: "scope",
        position: { line: 0, character: source.lastIndexOf("y") },
      })
    ).toBe("y\tint: y\nx\tint: x\nf\tfunction int: f(int)");
  });

  it("reports files outside the workspace in view output", async () => {
    const coordinator = new AnalysisCoordinator({ readSource: memoryFiles({}).readSource });
    expect(await coordinator.view({ uri: toFileUri("/work/none.mzn"), kind: "hir" })).toBe(
      "/work/none.mzn:0-0 ERROR [store] ST0002: /work/none.mzn is not part of the workspace"
    );
    expect(await coordinator.diagnosticsForUri(toFileUri("/work/none.mzn"))).toEqual([]);
  });
});

describe("openDocumentUris", () => {
  it("keeps open documents whose diagnostics were invalidated", () => {
    const a = toFileUri("/work/a.mzn");
    const b = toFileUri("/work/b.mzn");
    expect(
      openDocumentUris({
        keys: [
          { query: "resolution", file: "/work/a.mzn" },
          { query: "diagnostics", file: "/work/b.mzn" },
          { query: "diagnostics", file: "/work/c.mzn" },
        ],
        openUris: [a, b],
      })
    ).toEqual([b]);
  });
});
