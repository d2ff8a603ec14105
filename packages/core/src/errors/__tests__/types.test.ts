import { ErrorCode } from "@ali/shared";
import { describe, expect, it } from "vitest";
import { AliError, ErrorSeverity, errorMessage, inferSeverity, isFatalError } from "../types.js";

describe("inferSeverity", () => {
  it("should treat input and descriptor problems as user action", () => {
    expect(inferSeverity(ErrorCode.UNKNOWN_VERB)).toBe(ErrorSeverity.USER_ACTION);
    expect(inferSeverity(ErrorCode.PLUGIN_LOAD_FAILED)).toBe(ErrorSeverity.USER_ACTION);
    expect(inferSeverity(ErrorCode.TEMPLATE_CYCLE)).toBe(ErrorSeverity.USER_ACTION);
  });

  it("should treat internal errors as fatal", () => {
    expect(inferSeverity(ErrorCode.INTERNAL_ERROR)).toBe(ErrorSeverity.FATAL);
    expect(inferSeverity(ErrorCode.UNKNOWN)).toBe(ErrorSeverity.FATAL);
  });
});

describe("AliError", () => {
  it("should carry code, context and cause", () => {
    const cause = new Error("root");
    const error = new AliError("wrapped", ErrorCode.CONFIG_INVALID, {
      cause,
      context: { path: "ali.toml" },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("AliError");
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(error.cause).toBe(cause);
    expect(error.severity).toBe(ErrorSeverity.USER_ACTION);
  });

  it("should serialize to JSON", () => {
    const error = new AliError("wrapped", ErrorCode.CONFIG_INVALID, {
      cause: new Error("root"),
      context: { path: "ali.toml" },
    });

    expect(error.toJSON()).toEqual({
      name: "AliError",
      message: "wrapped",
      code: 2003,
      severity: "user_action",
      context: { path: "ali.toml" },
      cause: "root",
    });
  });

  it("should identify fatal errors", () => {
    expect(isFatalError(new AliError("x", ErrorCode.INTERNAL_ERROR))).toBe(true);
    expect(isFatalError(new AliError("x", ErrorCode.UNKNOWN_VERB))).toBe(false);
    expect(isFatalError(new Error("x"))).toBe(false);
  });
});

describe("errorMessage", () => {
  it("should read messages from errors and stringify anything else", () => {
    expect(errorMessage(new Error("msg"))).toBe("msg");
    expect(errorMessage(42)).toBe("42");
  });
});
