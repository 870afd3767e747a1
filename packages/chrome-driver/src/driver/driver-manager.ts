/**
 * DriverManager — owns at most one live driver for a fixed debugging port.
 *
 * The driver is created lazily on first use and reused while it reports
 * alive. A dead driver is replaced transparently. Calls to `do` never
 * overlap: each waits for the previous one to finish. Actions must not call
 * back into the same manager, since they already hold its turn.
 */

import type { Logger } from "@tabrunner/schemas";
import { DriverError, errorMessage, silentLogger } from "@tabrunner/schemas";
import { RetryWaiter, DEFAULT_RETRY_POLICY, type RetryPolicy } from "../retry/waiter.js";
import { CRASH_ERRORS } from "../errors.js";

/** What the manager needs from a driver. */
export interface ManagedBrowser {
  isAlive(): boolean;
  kill(): void | Promise<void>;
}

export type DriverAction<D, T> = (driver: D) => Promise<T> | T;

export interface DoOptions {
  /** Quit the driver once the action has succeeded. */
  closeUponCompletion?: boolean;
}

export interface DriverManagerOptions<D extends ManagedBrowser> {
  port: number;
  createDriver: () => Promise<D>;
  /** Attempts for `doWithRecovery`. */
  recoveryPolicy?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

// Ports claimed by live managers in this process.
const leasedPorts = new Set<number>();

export class DriverManager<D extends ManagedBrowser> {
  readonly port: number;
  private readonly createDriver: () => Promise<D>;
  private readonly recoveryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private driver: D | null = null;
  private turn: Promise<void> = Promise.resolve();
  private disposed = false;

  constructor(options: DriverManagerOptions<D>) {
    if (leasedPorts.has(options.port)) {
      throw new DriverError(
        "PORT_IN_USE",
        `Another driver manager already owns debugging port ${options.port}`,
        { port: options.port },
      );
    }
    leasedPorts.add(options.port);

    this.port = options.port;
    this.createDriver = options.createDriver;
    this.recoveryPolicy = options.recoveryPolicy ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  static isPortLeased(port: number): boolean {
    return leasedPorts.has(port);
  }

  /** The driver currently held, alive or not. */
  get currentDriver(): D | null {
    return this.driver;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Runs `action` against the current driver, creating one if needed. When
   * the action throws, the driver is quit and the original error re-thrown.
   */
  async do<T>(action: DriverAction<D, T>, options?: DoOptions): Promise<T> {
    this.assertUsable();
    return this.exclusive(async () => {
      const driver = await this.obtainDriver();
      let result: Awaited<T>;
      try {
        result = await action(driver);
      } catch (err: unknown) {
        await this.quitAfterFailure(err);
        throw err;
      }
      if (options?.closeUponCompletion) await this.release();
      return result;
    });
  }

  /**
   * Like `do`, but an error that means the browser crashed or the connection
   * broke is retried against a fresh driver. Other errors surface at once.
   */
  async doWithRecovery<T>(action: DriverAction<D, T>, options?: DoOptions): Promise<T> {
    const waiter = new RetryWaiter(this.recoveryPolicy, { sleep: this.sleep, logger: this.logger });
    return waiter.untilNoException(CRASH_ERRORS, () => this.do(action, options));
  }

  /** Kills the driver if it is alive and forgets it. Safe to repeat. */
  async quit(): Promise<void> {
    await this.exclusive(() => this.release());
  }

  async getOrCreateDriver(): Promise<D> {
    this.assertUsable();
    return this.exclusive(() => this.obtainDriver());
  }

  /** Quits the driver and gives up the port. The manager cannot be used afterwards. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    try {
      await this.exclusive(() => this.release());
    } finally {
      leasedPorts.delete(this.port);
      this.logger.debug("Driver manager disposed", { port: this.port });
    }
  }

  // ── Internals (run while holding the turn) ─────────────────────────

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.turn.then(fn);
    this.turn = run.then(() => undefined, () => undefined);
    return run;
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new DriverError("MANAGER_DISPOSED", `Driver manager for port ${this.port} has been disposed`, {
        port: this.port,
      });
    }
  }

  private async obtainDriver(): Promise<D> {
    const existing = this.driver;
    if (existing && existing.isAlive()) return existing;

    if (existing) {
      this.driver = null;
      this.logger.info("Driver is no longer alive; replacing it", { port: this.port });
      try {
        await existing.kill();
      } catch (err: unknown) {
        this.logger.warn("Failed to kill stale driver", { port: this.port, error: errorMessage(err) });
      }
    }

    this.driver = await this.createDriver();
    return this.driver;
  }

  private async release(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    if (driver && driver.isAlive()) await driver.kill();
  }

  private async quitAfterFailure(cause: unknown): Promise<void> {
    this.logger.warn("Driver action failed; quitting driver", { port: this.port, error: errorMessage(cause) });
    try {
      await this.release();
    } catch (err: unknown) {
      this.logger.error("Failed to quit driver after action failure", { port: this.port, error: errorMessage(err) });
    }
  }
}
