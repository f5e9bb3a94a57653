import { describe, it, expect } from "vitest";
import { BridgeError, describeError, isBridgeError } from "./errors.js";

describe("BridgeError", () => {
  it("carries code, retryable flag, details and cause", () => {
    const cause = new Error("port closed");
    const err = new BridgeError({ code: "BUSY", message: "full", retryable: true, details: { limit: 1 }, cause });
    expect(err.name).toBe("BridgeError");
    expect(err.message).toBe("full");
    expect(err.code).toBe("BUSY");
    expect(err.retryable).toBe(true);
    expect(err.details).toEqual({ limit: 1 });
    expect(err.cause).toBe(cause);
  });

  it("is not retryable by default", () => {
    expect(new BridgeError({ code: "CLOSED", message: "closed" }).retryable).toBe(false);
  });
});

describe("isBridgeError", () => {
  it("narrows by code when given one", () => {
    const err = new BridgeError({ code: "CANCELLED", message: "stop" });
    expect(isBridgeError(err)).toBe(true);
    expect(isBridgeError(err, "CANCELLED")).toBe(true);
    expect(isBridgeError(err, "CLOSED")).toBe(false);
    expect(isBridgeError(new Error("stop"))).toBe(false);
  });
});

describe("describeError", () => {
  it("uses the message of an Error", () => {
    expect(describeError(new TypeError("bad input"))).toBe("bad input");
  });

  it("falls back to the name of an Error without message", () => {
    expect(describeError(new RangeError())).toBe("RangeError");
  });

  it("passes strings through and serializes other values", () => {
    expect(describeError("boom")).toBe("boom");
    expect(describeError({ reason: "x" })).toBe('{"reason":"x"}');
    expect(describeError(undefined)).toBe("undefined");
  });
});
