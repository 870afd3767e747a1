/**
 * BrowserDriver — one launched Chromium process plus the means to reach its
 * debug targets. Discovery is re-run each time a channel is opened; targets
 * are never cached.
 */

import type { DebugTarget, Logger } from "@tabrunner/schemas";
import { isTargetList, silentLogger } from "@tabrunner/schemas";
import { ProcessHandle, killProcessesByName, type SpawnFn } from "../process/process-handle.js";
import { DebugChannel, type DebugChannelOptions } from "../cdp/channel.js";
import { fetchJson as defaultFetchJson, type FetchJson } from "../http/json-get.js";
import { RetryWaiter, describeValue, type RetryPolicy } from "../retry/waiter.js";
import {
  ConnectionError,
  JsExecutionError,
  ProcessNotRunningError,
  TargetNotFoundError,
  UnknownProtocolResultError,
} from "../errors.js";
import { resolveChromeExecutable } from "./executable.js";

export type ChannelOpener = (url: string, options: DebugChannelOptions) => Promise<DebugChannel>;
export type KillByName = (pattern: string, options: { logger: Logger }) => Promise<unknown>;

export const DEFAULT_KILL_PATTERN = "chromium";
export const DEFAULT_WAIT_POLICY: RetryPolicy = { maxAttempts: 10, delayMs: 1000 };
export const DEFAULT_KILL_TIMEOUT_MS = 5000;

/** Page script used to decide the first target has finished loading. */
export const READINESS_PROBE = "document.body.innerText;";

export interface LaunchOptions {
  port: number;
  headless?: boolean;
  userDataDir?: string;
  extraArgs?: readonly string[];
}

export interface BrowserDriverOptions extends LaunchOptions {
  host?: string;
  executablePath?: string;
  /** Force-kill processes matching `killPattern` before launching. */
  killExistingInstances?: boolean;
  killPattern?: string;
  /** Block until the first target answers scripts. Default true. */
  wait?: boolean;
  waitPolicy?: RetryPolicy;
  /** How long `kill()` waits for the process to exit. */
  killTimeoutMs?: number;
  logger?: Logger;
  // Collaborators, replaceable in tests.
  spawn?: SpawnFn;
  killByName?: KillByName;
  fetchJson?: FetchJson;
  openChannel?: ChannelOpener;
  sleep?: (ms: number) => Promise<void>;
}

export function buildLaunchArgs(options: LaunchOptions): string[] {
  const args = ["--no-sandbox", `--remote-debugging-port=${options.port}`];
  if (options.headless) args.push("--headless");
  if (options.userDataDir) args.push(`--user-data-dir=${options.userDataDir}`);
  return [...args, ...(options.extraArgs ?? [])];
}

export class BrowserDriver {
  readonly port: number;
  readonly host: string;
  private readonly process: ProcessHandle;
  private readonly logger: Logger;
  private readonly fetchJson: FetchJson;
  private readonly channelOpener: ChannelOpener;
  private readonly killTimeoutMs: number;

  constructor(
    handle: ProcessHandle,
    options: Pick<BrowserDriverOptions, "host" | "logger" | "fetchJson" | "openChannel" | "killTimeoutMs">,
  ) {
    this.process = handle;
    this.port = handle.listenPort;
    this.host = options.host ?? "localhost";
    this.logger = options.logger ?? silentLogger;
    this.fetchJson = options.fetchJson ?? defaultFetchJson;
    this.channelOpener = options.openChannel ?? DebugChannel.open;
    this.killTimeoutMs = options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;
  }

  /**
   * Launches the browser and, unless `wait` is false, waits until the
   * debugging endpoint answers and the first page can run scripts. A failed
   * wait kills the process before the error propagates.
   */
  static async spawn(options: BrowserDriverOptions): Promise<BrowserDriver> {
    const logger = options.logger ?? silentLogger;

    if (options.killExistingInstances) {
      const killByName = options.killByName ?? killProcessesByName;
      await killByName(options.killPattern ?? DEFAULT_KILL_PATTERN, { logger });
    }

    const executable = resolveChromeExecutable(options.executablePath);
    const handle = ProcessHandle.spawn(executable, buildLaunchArgs(options), {
      listenPort: options.port,
      spawn: options.spawn,
      logger,
    });
    const driver = new BrowserDriver(handle, options);

    if (options.wait ?? true) {
      const waiter = new RetryWaiter(options.waitPolicy ?? DEFAULT_WAIT_POLICY, { sleep: options.sleep, logger });
      try {
        await driver.waitUntilReady(waiter);
      } catch (err: unknown) {
        logger.warn("Browser did not become ready; killing it", { pid: handle.pid, port: options.port });
        await driver.kill();
        throw err;
      }
    }
    return driver;
  }

  private async waitUntilReady(waiter: RetryWaiter): Promise<void> {
    await waiter.untilNoException(ConnectionError, () => {
      this.checkIsAlive();
      return this.listTargets();
    });

    const probe = await this.openChannel(0);
    try {
      await waiter.untilNoException(JsExecutionError, () => probe.runJsGetValue(READINESS_PROBE));
    } finally {
      await probe.kill();
    }
    this.logger.info("Browser ready", { pid: this.process.pid, port: this.port });
  }

  get pid(): number | undefined {
    return this.process.pid;
  }

  isAlive(): boolean {
    return this.process.isAlive();
  }

  /** Throws ProcessNotRunningError when the browser process has exited. */
  checkIsAlive(): void {
    if (this.process.isAlive()) return;
    const cause = this.process.spawnError;
    throw new ProcessNotRunningError(
      cause ? `Browser process failed to start: ${cause.message}` : undefined,
      { pid: this.process.pid, port: this.port },
    );
  }

  /**
   * SIGKILLs the browser and resolves once it has exited, so the debugging
   * port is free for a successor. Rejects with TimeoutError after
   * `killTimeoutMs`.
   */
  async kill(): Promise<void> {
    this.process.kill();
    await this.process.waitForExit(this.killTimeoutMs);
  }

  /** Current debug targets from the `/json` discovery endpoint. */
  async listTargets(): Promise<DebugTarget[]> {
    const payload = await this.fetchJson(`http://${this.host}:${this.port}/json`);
    if (!isTargetList(payload)) {
      throw new UnknownProtocolResultError(describeValue(payload), "Invalid target list");
    }
    return payload;
  }

  async getDebugWebSocketUrls(): Promise<string[]> {
    const targets = await this.listTargets();
    return targets.map((target) => target.webSocketDebuggerUrl);
  }

  /** Opens a channel to the target at `index` in discovery order. */
  async openChannel(index = 0): Promise<DebugChannel> {
    this.checkIsAlive();
    const urls = await this.getDebugWebSocketUrls();
    const url = urls[index];
    if (!Number.isInteger(index) || index < 0 || url === undefined) {
      throw new TargetNotFoundError(index, urls.length);
    }
    return this.channelOpener(url, { logger: this.logger });
  }
}
