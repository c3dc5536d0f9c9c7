import { describe, expect, it } from "vitest";
import { categoryOf, ErrorCode } from "../errors/codes.js";
import { HookChainError, isHookChainError } from "../errors/hookchain-error.js";

describe("ErrorCode", () => {
  it("groups codes by range", () => {
    expect(categoryOf(ErrorCode.CONFIG_INVALID)).toBe("config");
    expect(categoryOf(ErrorCode.UNKNOWN_EVENT)).toBe("catalog");
    expect(categoryOf(ErrorCode.CHAIN_STATE)).toBe("chain");
    expect(categoryOf(ErrorCode.HOOK_ARGUMENT_MISMATCH)).toBe("dispatch");
    expect(categoryOf(ErrorCode.MODEL_VALIDATION_FAILED)).toBe("lifecycle");
  });
});

describe("HookChainError", () => {
  it("carries code, context and cause", () => {
    const cause = new Error("root");
    const error = new HookChainError("wrapped", ErrorCode.CATALOG_LOAD_FAILED, {
      cause,
      context: { file: "hooks.json" },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("HookChainError");
    expect(error.code).toBe(2003);
    expect(error.category).toBe("catalog");
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ file: "hooks.json" });
  });

  it("serializes to JSON", () => {
    const error = new HookChainError("bad", ErrorCode.CHAIN_STATE, {
      cause: new Error("inner"),
    });

    expect(error.toJSON()).toEqual({
      name: "HookChainError",
      message: "bad",
      code: ErrorCode.CHAIN_STATE,
      category: "chain",
      context: undefined,
      cause: "inner",
    });
  });

  it("isHookChainError narrows by code", () => {
    const error = new HookChainError("x", ErrorCode.UNKNOWN_EVENT);

    expect(isHookChainError(error)).toBe(true);
    expect(isHookChainError(error, ErrorCode.UNKNOWN_EVENT)).toBe(true);
    expect(isHookChainError(error, ErrorCode.CHAIN_STATE)).toBe(false);
    expect(isHookChainError(new Error("plain"))).toBe(false);
  });
});
