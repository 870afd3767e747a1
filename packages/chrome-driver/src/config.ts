import type { DriverConfig } from "@tabrunner/schemas";
import { DriverError, validateDriverConfigData, isDriverConfig } from "@tabrunner/schemas";
import { DEFAULT_KILL_PATTERN, DEFAULT_WAIT_POLICY } from "./driver/browser-driver.js";

export const DEFAULT_DRIVER_CONFIG: Readonly<DriverConfig> = Object.freeze({
  port: 9222,
  host: "localhost",
  headless: false,
  killExistingInstances: true,
  killPattern: DEFAULT_KILL_PATTERN,
  extraArgs: [],
  waitAttempts: DEFAULT_WAIT_POLICY.maxAttempts,
  waitDelayMs: DEFAULT_WAIT_POLICY.delayMs,
  actionAttempts: 3,
  actionDelayMs: 1000,
  logLevel: "info",
});

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

// Unrecognised text is passed through so schema validation reports it.
function envBoolean(value: string): boolean | string {
  const v = value.trim().toLowerCase();
  if (TRUE_VALUES.has(v)) return true;
  if (FALSE_VALUES.has(v)) return false;
  return value;
}

function envNumber(value: string): number | string {
  const trimmed = value.trim();
  const n = Number(trimmed);
  return trimmed === "" || Number.isNaN(n) ? value : n;
}

const ENV_FIELDS: ReadonlyArray<[string, keyof DriverConfig, (raw: string) => unknown]> = [
  ["TABRUNNER_PORT", "port", envNumber],
  ["TABRUNNER_HOST", "host", (raw) => raw.trim()],
  ["TABRUNNER_HEADLESS", "headless", envBoolean],
  ["TABRUNNER_CHROME_PATH", "executablePath", (raw) => raw],
  ["TABRUNNER_KILL_EXISTING", "killExistingInstances", envBoolean],
  ["TABRUNNER_KILL_PATTERN", "killPattern", (raw) => raw],
  ["TABRUNNER_USER_DATA_DIR", "userDataDir", (raw) => raw],
  ["TABRUNNER_WAIT_ATTEMPTS", "waitAttempts", envNumber],
  ["TABRUNNER_WAIT_DELAY_MS", "waitDelayMs", envNumber],
  ["TABRUNNER_ACTION_ATTEMPTS", "actionAttempts", envNumber],
  ["TABRUNNER_ACTION_DELAY_MS", "actionDelayMs", envNumber],
  ["TABRUNNER_LOG_LEVEL", "logLevel", (raw) => raw.trim().toLowerCase()],
];

/**
 * Builds the driver configuration: defaults, then `TABRUNNER_*` variables
 * from `env`, then `overrides` (command-line flags). Empty variables are
 * ignored, as are overrides set to undefined.
 */
export function resolveDriverConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<DriverConfig> = {},
): DriverConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_DRIVER_CONFIG, extraArgs: [...DEFAULT_DRIVER_CONFIG.extraArgs] };

  for (const [name, field, parse] of ENV_FIELDS) {
    const raw = env[name];
    if (raw !== undefined && raw !== "") merged[field] = parse(raw);
  }
  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[field] = value;
  }

  if (!isDriverConfig(merged)) {
    const { errors } = validateDriverConfigData(merged);
    throw new DriverError("INVALID_CONFIG", `Invalid driver configuration: ${errors.join("; ")}`, { errors });
  }
  return merged;
}
