import { describe, expect, it, vi } from "vitest";
import { keywordArguments, positionalArguments, zipKeywordArgs } from "../arguments.js";

describe("zipKeywordArgs()", () => {
  it("pairs names with values in order", () => {
    expect(zipKeywordArgs(["a", "b", "c"], [1, 2, 3])).toEqual({ a: 1, b: 2, c: 3 });
  });

  it("stops at the shorter list", () => {
    expect(zipKeywordArgs(["a", "b", "c"], [1, 2])).toEqual({ a: 1, b: 2 });
    expect(zipKeywordArgs(["a"], [1, 2])).toEqual({ a: 1 });
  });

  it("keeps the later value for a repeated name", () => {
    expect(zipKeywordArgs(["session", "session"], ["first", "second"])).toEqual({ session: "second" });
  });
});

describe("argument mappings", () => {
  it("calls positionally with the accumulated arguments", () => {
    const fn = vi.fn((...args: unknown[]) => args.length);

    expect(positionalArguments.call(fn, ["a", "b"], [1, 2])).toBe(2);
    expect(fn).toHaveBeenCalledWith(1, 2);
  });

  it("calls with one keyword object", () => {
    const fn = vi.fn((kwargs: Readonly<Record<string, unknown>>) => kwargs["b"]);

    expect(keywordArguments.call(fn, ["a", "b"], [1, 2])).toBe(2);
    expect(fn).toHaveBeenCalledWith({ a: 1, b: 2 });
  });

  it("reports its mode", () => {
    expect(positionalArguments.mode).toBe("positional");
    expect(keywordArguments.mode).toBe("keyword");
  });
});
