import { describe, expect, it } from "vitest";
import { exec } from "../exec.js";

const LIB = "function int: f(int: x) = x + 1;";
const MODEL = 'include "a.mzn";\nint: y = f(1);';

const run = async (argv: string[], files: Record<string, string>) => {
  const contents = new Map(Object.entries(files));
  const stdout: string[] = [];
  const stderr: string[] = [];
  const code = await exec(argv, {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    readSource: async (filePath) => contents.get(filePath),
  });
  return { code, stdout: stdout.join(""), stderr: stderr.join("") };
};

describe("tessera cli", () => {
  it("pretty prints a clean model", async () => {
    const result = await run(["/models/m.mzn", "--pretty-print"], {
      "/models/m.mzn": "int:x=2;constraint x>1;",
    });
    expect(result).toEqual({ code: 0, stdout: "int: x = 2;\nconstraint x > 1;\n", stderr: "" });
  });

  it("reports diagnostics with a snippet and fails", async () => {
    const result = await run(["/models/m.mzn", "--no-color"], {
      "/models/m.mzn": "int: a = 1;\nint: x = z;",
    });
    expect(result.code).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr).toBe(
      [
        "/models/m.mzn:2:10 ERROR [resolution] RS0001: unknown identifier z",
        "  |",
        "2 | int: x = z;",
        "  |          ^ unknown identifier z",
        "",
      ].join("\n")
    );
  });

  it("loads includes from include directories", async () => {
    const result = await run(["/models/b.mzn", "--include-dir", "/lib"], {
      "/models/b.mzn": MODEL,
      "/lib/a.mzn": LIB,
    });
    expect(result).toEqual({ code: 0, stdout: "", stderr: "" });
  });

  it("reports includes it cannot find", async () => {
    const result = await run(["/models/b.mzn", "--no-color"], { "/models/b.mzn": MODEL });
    const headers = result.stderr.split("\n").filter((line) => line.startsWith("/models/"));
    expect(result.code).toBe(1);
    expect(headers).toEqual([
      '/models/b.mzn:1:1 ERROR [scope] SC0002: cannot resolve include "a.mzn"',
      "/models/b.mzn:2:10 ERROR [resolution] RS0001: no function or predicate named f is in scope",
    ]);
  });

  it("prints the names visible at an offset", async () => {
    const source = "function int: f(int: x) = let { int: y = x } in y;";
    const result = await run(["/models/f.mzn", "--emit-scope", String(source.lastIndexOf("y"))], {
      "/models/f.mzn": source,
    });
    expect(result.stdout).toBe("y\tint: y\nx\tint: x\nf\tfunction int: f(int)\n");
    expect(result.code).toBe(0);
  });

  it("leaves builtins out with --no-prelude", async () => {
    const files = { "/models/m.mzn": "int: x = abs(1);" };
    expect((await run(["/models/m.mzn"], files)).code).toBe(0);

    const bare = await run(["/models/m.mzn", "--no-prelude", "--no-color"], files);
    expect(bare.code).toBe(1);
    expect(bare.stderr.split("\n")[0]).toBe(
      "/models/m.mzn:1:10 ERROR [resolution] RS0001: no function or predicate named abs is in scope"
    );
  });

  it("fails when the entry cannot be read", async () => {
    expect(await run(["/models/none.mzn"], {})).toEqual({
      code: 1,
      stdout: "",
      stderr: "tessera: cannot read /models/none.mzn\n",
    });
  });

  it("exits with the argument error code", async () => {
    const result = await run(["/models/m.mzn", "--emit-scope", "-"], {});
    expect(result.code).toBe(1);
    expect(result.stderr).toBe(
      "error: option '--emit-scope <offset>' argument '-' is invalid. expected a non-negative integer offset\n"
    );
  });
});
