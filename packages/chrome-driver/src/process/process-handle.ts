/**
 * Ownership of one external browser process. The process is started
 * directly (never through a shell) so the pid we hold is the browser's own
 * and a kill reaches it.
 */

import { spawn as nodeSpawn, execFile, type SpawnOptions } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "@tabrunner/schemas";
import { silentLogger, withTimeout, errorMessage } from "@tabrunner/schemas";

export interface ChildProcessLike {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "error", listener: (err: Error) => void): this;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcessLike;

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

export interface SpawnProcessOptions {
  listenPort: number;
  spawn?: SpawnFn;
  logger?: Logger;
}

const defaultSpawn: SpawnFn = (command, args, options) => nodeSpawn(command, [...args], options);

export class ProcessHandle {
  readonly listenPort: number;
  private readonly child: ChildProcessLike;
  private readonly logger: Logger;
  private exit: ProcessExit | null = null;
  private readonly exited: Promise<ProcessExit>;

  constructor(child: ChildProcessLike, listenPort: number, logger: Logger = silentLogger) {
    this.child = child;
    this.listenPort = listenPort;
    this.logger = logger;
    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once("exit", (code, signal) => {
        this.exit ??= { code, signal };
        this.logger.debug("Browser process exited", { pid: child.pid, code, signal });
        resolve(this.exit);
      });
      child.once("error", (error) => {
        // Spawn failures (ENOENT, EACCES) emit "error" and never "exit".
        this.exit ??= { code: null, signal: null, error };
        this.logger.error("Browser process failed", { pid: child.pid, error: error.message });
        resolve(this.exit);
      });
    });
  }

  static spawn(executable: string, args: readonly string[], options: SpawnProcessOptions): ProcessHandle {
    const logger = options.logger ?? silentLogger;
    const spawn = options.spawn ?? defaultSpawn;
    const child = spawn(executable, args, { stdio: "ignore", shell: false });
    logger.info("Spawned browser process", { pid: child.pid, executable, port: options.listenPort });
    return new ProcessHandle(child, options.listenPort, logger);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Error reported by the OS when the process could not be started. */
  get spawnError(): Error | undefined {
    return this.exit?.error;
  }

  isAlive(): boolean {
    return this.exit === null && this.child.exitCode === null && this.child.signalCode === null;
  }

  /** SIGKILL the process. No-op once it is gone. */
  kill(): void {
    if (!this.isAlive()) return;
    this.logger.debug("Killing browser process", { pid: this.child.pid });
    this.child.kill("SIGKILL");
  }

  /** Resolves once the process has exited; rejects with TimeoutError after `timeoutMs`. */
  waitForExit(timeoutMs?: number): Promise<ProcessExit> {
    if (this.exit) return Promise.resolve(this.exit);
    if (!this.isAlive()) {
      return Promise.resolve({ code: this.child.exitCode, signal: this.child.signalCode });
    }
    return withTimeout(this.exited, timeoutMs, `Exit of process ${this.child.pid ?? "?"}`);
  }
}

// ── Name-based cleanup ───────────────────────────────────────────────

export type CommandRunner = (file: string, args: readonly string[]) => Promise<unknown>;

const execFileAsync = promisify(execFile);
const defaultRunner: CommandRunner = (file, args) => execFileAsync(file, [...args]);

/**
 * Best-effort SIGKILL of every process whose name matches `pattern`
 * (`killall -r`). This can hit unrelated processes that share the name, so
 * callers use it only to clear a debugging port before spawning. Resolves
 * true when killall reported a match; never rejects.
 */
export async function killProcessesByName(
  pattern: string,
  options?: { run?: CommandRunner; logger?: Logger },
): Promise<boolean> {
  const run = options?.run ?? defaultRunner;
  const logger = options?.logger ?? silentLogger;
  try {
    await run("killall", ["-KILL", "-r", pattern]);
    logger.info("Killed existing browser processes", { pattern });
    return true;
  } catch (err: unknown) {
    // killall exits 1 when nothing matched; ENOENT when it is not installed.
    logger.debug("Name-based cleanup found nothing to kill", { pattern, error: errorMessage(err) });
    return false;
  }
}
