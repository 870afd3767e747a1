export const DriverConfigSchema = {
  type: "object",
  required: [
    "port", "host", "headless", "killExistingInstances", "killPattern", "extraArgs",
    "waitAttempts", "waitDelayMs", "actionAttempts", "actionDelayMs", "logLevel",
  ],
  properties: {
    port: { type: "integer", minimum: 1, maximum: 65535 },
    host: { type: "string", minLength: 1 },
    headless: { type: "boolean" },
    executablePath: { type: "string", minLength: 1 },
    killExistingInstances: { type: "boolean" },
    killPattern: { type: "string", minLength: 1 },
    extraArgs: { type: "array", items: { type: "string" } },
    userDataDir: { type: "string", minLength: 1 },
    waitAttempts: { type: "integer", minimum: 1 },
    waitDelayMs: { type: "number", minimum: 0 },
    actionAttempts: { type: "integer", minimum: 1 },
    actionDelayMs: { type: "number", minimum: 0 },
    logLevel: { type: "string", enum: ["debug", "info", "warn", "error", "silent"] },
  },
  additionalProperties: false,
} as const;
