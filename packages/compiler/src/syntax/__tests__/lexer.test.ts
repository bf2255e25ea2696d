import { test } from "vitest";
import { tokenize } from "../lexer.js";

const summarize = (text: string) =>
  tokenize(text).map((token) => [token.kind, token.value]);

test("skips comments and classifies identifiers", (t) => {
  t.expect(summarize("x1 >= 2.5e3 % trailing\n'my name' $T $$E /* block */ var")).toEqual([
    ["identifier", "x1"],
    ["operator", ">="],
    ["float", "2.5e3"],
    ["quoted-identifier", "'my name'"],
    ["type-inst-var", "$T"],
    ["type-inst-enum-var", "$$E"],
    ["keyword", "var"],
    ["eof", ""],
  ]);
});

test("keeps tuple field numbers apart from floats", (t) => {
  t.expect(summarize("x.1.2")).toEqual([
    ["identifier", "x"],
    ["punctuation", "."],
    ["integer", "1"],
    ["punctuation", "."],
    ["integer", "2"],
    ["eof", ""],
  ]);
});

test("reads ranges and radix literals", (t) => {
  t.expect(summarize("1..0x1F")).toEqual([
    ["integer", "1"],
    ["operator", ".."],
    ["integer", "0x1F"],
    ["eof", ""],
  ]);
});

test("takes string interpolations as part of the literal", (t) => {
  const text = '"a\\(f("b"))c"';
  t.expect(summarize(text)).toEqual([
    ["string", text],
    ["eof", ""],
  ]);
});

test("turns malformed input into invalid tokens", (t) => {
  const problems = (text: string) =>
    tokenize(text)
      .filter((token) => token.kind === "invalid")
      .map((token) => token.problem);

  t.expect(problems('"open')).toEqual(["unterminated string literal"]);
  t.expect(problems("x /* open")).toEqual(["unterminated block comment"]);
  t.expect(problems("a # b")).toEqual(["unexpected character '#'"]);
  t.expect(problems("$1")).toEqual(["expected a type-inst variable name"]);
});
