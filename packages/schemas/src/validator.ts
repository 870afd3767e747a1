import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { DriverConfigSchema } from "./driver-config.schema.js";
import { DebugTargetListSchema } from "./discovery.schema.js";
import type { DriverConfig, DebugTarget } from "./types.js";

// ajv is CommonJS; depending on the loader the default import is either the
// class or its module object.
type AjvClass = typeof Ajv.default;
const AjvCtor: AjvClass = (Ajv as unknown as { default?: AjvClass }).default ?? (Ajv as unknown as AjvClass);
const ajv = new AjvCtor({ allErrors: true, strict: false });
// Same for ajv-formats.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateDriverConfig = ajv.compile<DriverConfig>(DriverConfigSchema);
const validateTargetList = ajv.compile<DebugTarget[]>(DebugTargetListSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateDriverConfigData(data: unknown): ValidationResult {
  const valid = validateDriverConfig(data);
  return toResult(valid, validateDriverConfig.errors);
}

export function validateTargetListData(data: unknown): ValidationResult {
  const valid = validateTargetList(data);
  return toResult(valid, validateTargetList.errors);
}

export function isDriverConfig(data: unknown): data is DriverConfig {
  return validateDriverConfig(data);
}

export function isTargetList(data: unknown): data is DebugTarget[] {
  return validateTargetList(data);
}
