import type { Diagnostic } from "@tessera/compiler";
import { describe, expect, it } from "vitest";
import { formatCliDiagnostic } from "../diagnostics.js";

const sources = new Map([
  ["m.mzn", "int: a = 1;\nint: x = z;"],
  ["lib.mzn", "function int: f(bool: x) = 1;"],
]);
const sourceOf = (file: string) => sources.get(file);

const unknownZ: Diagnostic = {
  code: "RS0001",
  message: "unknown identifier z",
  severity: "error",
  phase: "resolution",
  span: { file: "m.mzn", start: 21, end: 22 },
};

describe("formatCliDiagnostic", () => {
  it("renders the location and source snippet", () => {
    expect(formatCliDiagnostic(unknownZ, { sourceOf, color: false }).split("\n")).toEqual([
      "m.mzn:2:10 ERROR [resolution] RS0001: unknown identifier z",
      "  |",
      "2 | int: x = z;",
      "  |          ^ unknown identifier z",
    ]);
  });

  it("falls back to offsets when the source is unknown", () => {
    const diagnostic: Diagnostic = {
      code: "ST0002",
      message: "gone.mzn is not part of the workspace",
      severity: "error",
      phase: "store",
      span: { file: "gone.mzn", start: 3, end: 7 },
    };
    expect(formatCliDiagnostic(diagnostic, { sourceOf, color: false })).toBe(
      "gone.mzn:3-7 ERROR [store] ST0002: gone.mzn is not part of the workspace"
    );
  });

  it("appends related notes", () => {
    const diagnostic: Diagnostic = {
      ...unknownZ,
      code: "RS0003",
      message: "no overload of f accepts (int)",
      related: [
        {
          code: "RS0003",
          message: "function int: f(bool): argument 1: expected bool, found int",
          severity: "note",
          phase: "resolution",
          span: { file: "lib.mzn", start: 0, end: 29 },
        },
      ],
    };
    const lines = formatCliDiagnostic(diagnostic, { sourceOf, color: false }).split("\n");
    expect(lines[4]).toBe(
      "lib.mzn:1:1 NOTE [resolution] RS0003: function int: f(bool): argument 1: expected bool, found int"
    );
    expect(lines[7]).toBe(`  | ${"^".repeat(29)} function int: f(bool): argument 1: expected bool, found int`);
  });

  it("colours the severity, code and pointer", () => {
    const [header, , , marker] = formatCliDiagnostic(unknownZ, { sourceOf }).split("\n");
    expect(header).toBe(
      "m.mzn:2:10 \u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m [resolution] \u001B[35mRS0001\u001B[0m: unknown identifier z"
    );
    expect(marker).toBe(
      "  |          \u001B[31m^\u001B[0m \u001B[2munknown identifier z\u001B[0m"
    );
  });
});
