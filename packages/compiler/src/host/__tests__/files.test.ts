import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { includeCandidates, readSourceFromDisk } from "../files.js";

describe("includeCandidates", () => {
  it("looks beside the including file, then in each include directory", () => {
    expect(
      includeCandidates({
        fromFile: "/work/models/b.mzn",
        includePath: "lib/a.mzn",
        includeDirs: ["/libs", "/work/models"],
      })
    ).toEqual(["/work/models/lib/a.mzn", "/libs/lib/a.mzn"]);
  });

  it("takes absolute include paths as they are", () => {
    expect(
      includeCandidates({ fromFile: "/work/b.mzn", includePath: "/shared/a.mzn", includeDirs: ["/libs"] })
    ).toEqual(["/shared/a.mzn"]);
  });
});

describe("readSourceFromDisk", () => {
  let root = "";

  beforeAll(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "tessera-files-"));
    await writeFile(path.join(root, "a.mzn"), "int: x = 1;");
    await mkdir(path.join(root, "dir.mzn"));
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads files and treats missing ones as absent", async () => {
    expect(await readSourceFromDisk(path.join(root, "a.mzn"))).toBe("int: x = 1;");
    expect(await readSourceFromDisk(path.join(root, "none.mzn"))).toBeUndefined();
    expect(await readSourceFromDisk(path.join(root, "dir.mzn"))).toBeUndefined();
    expect(await readSourceFromDisk(path.join(root, "a.mzn", "nested.mzn"))).toBeUndefined();
  });
});
