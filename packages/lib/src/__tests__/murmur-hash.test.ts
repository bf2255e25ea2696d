import { describe, expect, test } from "vitest";
import { fingerprint, murmurHash3 } from "../murmur-hash.js";

describe("Murmur Hash", () => {
  test("should return correct hash for an empty string", () => {
    expect(murmurHash3("")).toBe(0);
  });

  test("should return correct hash for a short string", () => {
    expect(murmurHash3("abc")).toBe(3017643002);
  });

  test("should return correct hash for a longer string", () => {
    const hash = murmurHash3("The quick brown fox jumps over the lazy dog");
    expect(hash).toBe(776992547);
  });

  test("should return correct hash for string with special characters", () => {
    expect(murmurHash3("!@#$%^&*()")).toBe(3947575985);
  });

  test("should return correct hash for numeric string", () => {
    expect(murmurHash3("1234567890")).toBe(839148365);
  });

  test("should hash non-ascii characters by their encoded bytes", () => {
    expect(murmurHash3("Ā")).not.toBe(murmurHash3("ā"));
  });

  test("should return different hashes for different inputs", () => {
    expect(murmurHash3("input1")).not.toBe(murmurHash3("input2"));
  });
});

describe("fingerprint", () => {
  test("is stable for equal parts", () => {
    expect(fingerprint(["call", 3, "x"])).toBe(fingerprint(["call", 3, "x"]));
  });

  test("produces sixteen hex digits", () => {
    expect(fingerprint(["int"])).toMatch(/^[0-9a-f]{16}$/);
  });

  test("separates part boundaries", () => {
    expect(fingerprint(["ab", "c"])).not.toBe(fingerprint(["a", "bc"]));
  });

  test("distinguishes numbers from numeric strings", () => {
    expect(fingerprint([1])).not.toBe(fingerprint(["1"]));
  });
});
