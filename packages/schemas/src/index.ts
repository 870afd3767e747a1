export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./timeout.js";
export * from "./validator.js";
export { DriverConfigSchema } from "./driver-config.schema.js";
export { DebugTargetListSchema } from "./discovery.schema.js";
