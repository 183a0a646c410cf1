import { describe, it, expect } from "vitest";
import { isBlank, oxfordJoin, stripCitations } from "../../src/utils/text.js";
import { describeError } from "../../src/utils/errors.js";

describe("isBlank", () => {
  it("is true for absent and whitespace-only values", () => {
    expect(isBlank(undefined)).toBe(true);
    expect(isBlank(null)).toBe(true);
    expect(isBlank("")).toBe(true);
    expect(isBlank(" \t\n")).toBe(true);
  });

  it("is false for text", () => {
    expect(isBlank(" a ")).toBe(false);
  });
});

describe("stripCitations", () => {
  it("removes every citation marker", () => {
    expect(stripCitations("Ships in 3 days【4:0†faq.md】 and returns in 30【4:1†policy.md】.")).toBe(
      "Ships in 3 days and returns in 30.",
    );
  });

  it("leaves plain text alone", () => {
    expect(stripCitations("No markers [1] here")).toBe("No markers [1] here");
  });
});

describe("oxfordJoin", () => {
  it.each([
    [[], ""],
    [["alpha"], "alpha"],
    [["alpha", "beta"], "alpha and beta"],
    [["alpha", "beta", "gamma"], "alpha, beta, and gamma"],
  ])("joins %j as %j", (items, expected) => {
    expect(oxfordJoin(items)).toBe(expected);
  });

  it("takes another conjunction", () => {
    expect(oxfordJoin(["tea", "coffee", "juice"], "or")).toBe("tea, coffee, or juice");
  });
});

describe("describeError", () => {
  it("prefers the error message", () => {
    expect(describeError(new Error("disk full"))).toBe("disk full");
  });

  it("passes strings through and serialises other values", () => {
    expect(describeError("plain")).toBe("plain");
    expect(describeError({ code: 42 })).toBe('{"code":42}');
    expect(describeError(undefined)).toBe("undefined");
  });
});
