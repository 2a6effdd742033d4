import { describe, test, expect } from "vitest";
import {
  InvalidArgumentError,
  InvalidConfigError,
  IsaFlowError,
  PredecessorDeadlockError,
  UnknownItemError,
  isIsaFlowError,
  normalizeErrorMessage,
} from "../utils/errors";

describe("error classes", () => {
  test("carry a code, a name and detail", () => {
    const err = new InvalidArgumentError("bad width", { width: 0 });
    expect(err).toBeInstanceOf(IsaFlowError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe("InvalidArgument");
    expect(err.name).toBe("InvalidArgument");
    expect(err.detail).toEqual({ width: 0 });
  });

  test("deadlock lists the blocked animations", () => {
    const err = new PredecessorDeadlockError(2, [3, 4]);
    expect(err.message).toBe("Predecessor deadlock in section 2: animations 3, 4 never become ready");
    expect(err.section).toBe(2);
    expect(err.blocked).toEqual([3, 4]);
  });

  test("unknown item names the key", () => {
    expect(new UnknownItemError("v0").message).toBe("No placed item with key v0");
  });

  test("isIsaFlowError narrows library errors only", () => {
    expect(isIsaFlowError(new InvalidConfigError("x"))).toBe(true);
    expect(isIsaFlowError(new Error("x"))).toBe(false);
    expect(isIsaFlowError({ code: "InvalidArgument" })).toBe(false);
  });
});

describe("normalizeErrorMessage", () => {
  test("library errors show code, message and detail", () => {
    expect(normalizeErrorMessage(new InvalidArgumentError("bad width", { width: 0 }))).toBe(
      'InvalidArgument: bad width | {"width":0}',
    );
    expect(normalizeErrorMessage(new InvalidConfigError("nope"))).toBe("InvalidConfig: nope");
  });

  test("plain errors show name and message", () => {
    expect(normalizeErrorMessage(new TypeError("x is undefined"))).toBe("TypeError: x is undefined");
    expect(normalizeErrorMessage(new Error(""))).toBe("Error");
  });

  test("objects and primitives", () => {
    expect(normalizeErrorMessage({ detail: "missing key" })).toBe("missing key");
    expect(normalizeErrorMessage({ status: 3 })).toBe('{"status":3}');
    expect(normalizeErrorMessage("plain")).toBe("plain");
    expect(normalizeErrorMessage(42)).toBe("42");
    expect(normalizeErrorMessage(null)).toBe("");
    expect(normalizeErrorMessage(undefined)).toBe("");
  });
});
