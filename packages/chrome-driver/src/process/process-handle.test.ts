import { describe, it, expect, vi } from "vitest";
import { EventEmitter } from "node:events";
import { ProcessHandle, killProcessesByName, type SpawnFn } from "./process-handle.js";
import { TimeoutError } from "@tabrunner/schemas";

// ── Helper: a child process stand-in ───────────────────────────────

class FakeChild extends EventEmitter {
  pid: number | undefined = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  kill = vi.fn((signal?: NodeJS.Signals | number) => {
    if (typeof signal === "string") this.die(null, signal);
    return true;
  });

  die(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
  }
}

describe("ProcessHandle.spawn", () => {
  it("starts the executable without a shell", () => {
    const child = new FakeChild();
    const spawn = vi.fn<SpawnFn>(() => child);
    const handle = ProcessHandle.spawn("/usr/bin/chromium", ["--remote-debugging-port=9222"], {
      listenPort: 9222,
      spawn,
    });
    expect(spawn).toHaveBeenCalledWith(
      "/usr/bin/chromium",
      ["--remote-debugging-port=9222"],
      { stdio: "ignore", shell: false },
    );
    expect(handle.pid).toBe(4242);
    expect(handle.listenPort).toBe(9222);
    expect(handle.isAlive()).toBe(true);
  });
});

describe("ProcessHandle liveness", () => {
  it("reports dead after the process exits", () => {
    const child = new FakeChild();
    const handle = new ProcessHandle(child, 9222);
    child.die(0);
    expect(handle.isAlive()).toBe(false);
  });

  it("reports dead when the spawn failed", () => {
    const child = new FakeChild();
    child.pid = undefined;
    const handle = new ProcessHandle(child, 9222);
    const enoent = Object.assign(new Error("spawn /nope ENOENT"), { code: "ENOENT" });
    child.emit("error", enoent);
    expect(handle.isAlive()).toBe(false);
    expect(handle.spawnError).toBe(enoent);
  });
});

describe("ProcessHandle.kill", () => {
  it("sends SIGKILL to a live process", () => {
    const child = new FakeChild();
    const handle = new ProcessHandle(child, 9222);
    handle.kill();
    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
    expect(handle.isAlive()).toBe(false);
  });

  it("is a no-op on a dead process", () => {
    const child = new FakeChild();
    const handle = new ProcessHandle(child, 9222);
    child.die(1);
    handle.kill();
    handle.kill();
    expect(child.kill).not.toHaveBeenCalled();
  });
});

describe("ProcessHandle.waitForExit", () => {
  it("resolves with the exit signal", async () => {
    const child = new FakeChild();
    const handle = new ProcessHandle(child, 9222);
    const exited = handle.waitForExit();
    handle.kill();
    await expect(exited).resolves.toEqual({ code: null, signal: "SIGKILL" });
  });

  it("resolves immediately for an exited process", async () => {
    const child = new FakeChild();
    const handle = new ProcessHandle(child, 9222);
    child.die(3);
    await expect(handle.waitForExit()).resolves.toEqual({ code: 3, signal: null });
  });

  it("times out when the process keeps running", async () => {
    const handle = new ProcessHandle(new FakeChild(), 9222);
    await expect(handle.waitForExit(20)).rejects.toThrow(TimeoutError);
  });
});

describe("killProcessesByName", () => {
  it("runs killall with a regex pattern", async () => {
    const run = vi.fn(async () => ({ stdout: "", stderr: "" }));
    await expect(killProcessesByName("chromium", { run })).resolves.toBe(true);
    expect(run).toHaveBeenCalledWith("killall", ["-KILL", "-r", "chromium"]);
  });

  it("ignores failures", async () => {
    const run = vi.fn(async () => {
      throw new Error("chromium: no process found");
    });
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await expect(killProcessesByName("chromium", { run, logger })).resolves.toBe(false);
    expect(logger.debug).toHaveBeenCalledWith("Name-based cleanup found nothing to kill", {
      pattern: "chromium",
      error: "chromium: no process found",
    });
  });
});
