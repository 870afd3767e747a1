import { describe, it, expect } from "vitest";
import {
  validateDriverConfigData,
  validateTargetListData,
  isDriverConfig,
  isTargetList,
} from "./validator.js";

const validConfig = () => ({
  port: 9222,
  host: "localhost",
  headless: true,
  killExistingInstances: true,
  killPattern: "chromium",
  extraArgs: [],
  waitAttempts: 10,
  waitDelayMs: 1000,
  actionAttempts: 3,
  actionDelayMs: 500,
  logLevel: "info",
});

describe("validateDriverConfigData", () => {
  it("accepts a complete config", () => {
    const result = validateDriverConfigData(validConfig());
    expect(result).toEqual({ valid: true, errors: [] });
    expect(isDriverConfig(validConfig())).toBe(true);
  });

  it("accepts optional executablePath and userDataDir", () => {
    const result = validateDriverConfigData({
      ...validConfig(),
      executablePath: "/usr/bin/chromium",
      userDataDir: "/tmp/profile",
    });
    expect(result.valid).toBe(true);
  });

  it("rejects a port out of range", () => {
    const result = validateDriverConfigData({ ...validConfig(), port: 70000 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/port: must be <= 65535"]);
  });

  it("rejects zero wait attempts", () => {
    const result = validateDriverConfigData({ ...validConfig(), waitAttempts: 0 });
    expect(result.errors).toEqual(["/waitAttempts: must be >= 1"]);
  });

  it("rejects an unknown log level", () => {
    const result = validateDriverConfigData({ ...validConfig(), logLevel: "loud" });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toBe("/logLevel: must be equal to one of the allowed values");
  });

  it("rejects unknown properties", () => {
    const result = validateDriverConfigData({ ...validConfig(), stealth: true });
    expect(result.errors).toEqual(["/: must NOT have additional properties"]);
  });

  it("reports every missing field", () => {
    const result = validateDriverConfigData({});
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(11);
  });
});

describe("validateTargetListData", () => {
  it("accepts a discovery listing", () => {
    const listing = [
      {
        id: "A1B2",
        type: "page",
        title: "New Tab",
        url: "about:blank",
        webSocketDebuggerUrl: "ws://localhost:9222/devtools/page/A1B2",
        devtoolsFrontendUrl: "/devtools/inspector.html?ws=localhost:9222/devtools/page/A1B2",
      },
    ];
    expect(validateTargetListData(listing)).toEqual({ valid: true, errors: [] });
    expect(isTargetList(listing)).toBe(true);
  });

  it("accepts an empty listing", () => {
    expect(isTargetList([])).toBe(true);
  });

  it("rejects entries without a websocket URL", () => {
    const result = validateTargetListData([{ id: "A1B2", type: "page" }]);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["/0: must have required property 'webSocketDebuggerUrl'"]);
  });

  it("rejects a non-array payload", () => {
    const result = validateTargetListData({ targets: [] });
    expect(result.errors).toEqual(["/: must be array"]);
  });
});
