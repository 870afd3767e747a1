import type { DriverConfig, Logger } from "@tabrunner/schemas";
import { createLogger } from "@tabrunner/schemas";
import { BrowserDriver, type BrowserDriverOptions } from "./browser-driver.js";
import { DriverManager } from "./driver-manager.js";

/** Collaborators passed through to every BrowserDriver the manager spawns. */
export type BrowserCollaborators = Pick<
  BrowserDriverOptions,
  "spawn" | "killByName" | "fetchJson" | "openChannel" | "sleep"
>;

export interface BrowserManagerOptions extends BrowserCollaborators {
  logger?: Logger;
}

/** Spawn options for a BrowserDriver described by `config`. */
export function browserDriverOptions(config: DriverConfig, options?: BrowserManagerOptions): BrowserDriverOptions {
  return {
    ...options,
    port: config.port,
    host: config.host,
    headless: config.headless,
    executablePath: config.executablePath,
    killExistingInstances: config.killExistingInstances,
    killPattern: config.killPattern,
    extraArgs: config.extraArgs,
    userDataDir: config.userDataDir,
    wait: true,
    waitPolicy: { maxAttempts: config.waitAttempts, delayMs: config.waitDelayMs },
  };
}

/** A DriverManager that launches Chromium browsers as described by `config`. */
export function createBrowserDriverManager(
  config: DriverConfig,
  options?: BrowserManagerOptions,
): DriverManager<BrowserDriver> {
  const logger = options?.logger ?? createLogger("chrome-driver", { TABRUNNER_LOG_LEVEL: config.logLevel });
  const spawnOptions = browserDriverOptions(config, { ...options, logger });
  return new DriverManager<BrowserDriver>({
    port: config.port,
    createDriver: () => BrowserDriver.spawn(spawnOptions),
    recoveryPolicy: { maxAttempts: config.actionAttempts, delayMs: config.actionDelayMs },
    logger,
    sleep: options?.sleep,
  });
}
