import type { LogLevel } from "./logger.js";

// ─── Driver configuration ───────────────────────────────────────────

export interface DriverConfig {
  /** Remote-debugging port the browser binds. */
  port: number;
  host: string;
  headless: boolean;
  /** Browser binary; resolved from well-known locations when absent. */
  executablePath?: string;
  /** Force-kill processes matching `killPattern` before spawning. */
  killExistingInstances: boolean;
  killPattern: string;
  extraArgs: string[];
  userDataDir?: string;
  /** Readiness polling after spawn. */
  waitAttempts: number;
  waitDelayMs: number;
  /** Crash-recovery retries around manager actions. */
  actionAttempts: number;
  actionDelayMs: number;
  logLevel: LogLevel;
}

// ─── Debug targets ──────────────────────────────────────────────────

export interface DebugTarget {
  id: string;
  type?: string;
  title?: string;
  url?: string;
  webSocketDebuggerUrl: string;
  devtoolsFrontendUrl?: string;
}
