import { describe, it, expect } from "vitest";
import { DriverError, ErrorCodes, isDriverError, errorMessage } from "./errors.js";

describe("DriverError", () => {
  it("has correct code, message, and data", () => {
    const err = new DriverError("PORT_IN_USE", "port 9222 is taken", { port: 9222 });
    expect(err.code).toBe(ErrorCodes.PORT_IN_USE);
    expect(err.message).toBe("port 9222 is taken");
    expect(err.data).toEqual({ port: 9222 });
    expect(err.name).toBe("DriverError");
    expect(err instanceof Error).toBe(true);
  });

  it("works without data parameter", () => {
    const err = new DriverError("INVALID_CONFIG", "bad config");
    expect(err.code).toBe("INVALID_CONFIG");
    expect(err.data).toBeUndefined();
  });
});

describe("isDriverError", () => {
  it("matches any driver error without a code", () => {
    expect(isDriverError(new DriverError("OUT_OF_RETRIES", "x"))).toBe(true);
  });

  it("matches on code when given", () => {
    const err = new DriverError("OUT_OF_RETRIES", "x");
    expect(isDriverError(err, "OUT_OF_RETRIES")).toBe(true);
    expect(isDriverError(err, "PORT_IN_USE")).toBe(false);
  });

  it("rejects plain errors", () => {
    expect(isDriverError(new Error("x"))).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies everything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(42)).toBe("42");
  });
});
