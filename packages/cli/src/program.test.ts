import { describe, it, expect, vi, afterEach, type Mock } from "vitest";
import { EventEmitter } from "node:events";
import { WebSocketServer } from "ws";
import { PNG } from "pngjs";
import { CommanderError } from "commander";
import { silentLogger, type DriverConfig } from "@tabrunner/schemas";
import {
  CORRELATION_ID,
  DriverManager,
  JsExecutionError,
  createBrowserDriverManager,
  type FetchJson,
  type SpawnFn,
} from "@tabrunner/chrome-driver";
import { createProgram, formatTargets, formatValue, parsePort, type CliDeps } from "./program.js";

// ── Helpers: a browser that lives entirely in this process ──────────

class FakeChild extends EventEmitter {
  pid = 8080;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;

  kill = vi.fn((signal?: NodeJS.Signals | number) => {
    if (typeof signal === "string") {
      this.signalCode = signal;
      this.emit("exit", null, signal);
    }
    return true;
  });
}

interface EvaluateRequest {
  method: string;
  params?: { expression?: string };
}

let servers: WebSocketServer[] = [];

afterEach(() => {
  for (const s of servers) {
    for (const client of s.clients) client.terminate();
    s.close();
  }
  servers = [];
});

function evaluate(expression: string, page: { url: string }): Record<string, unknown> {
  if (expression === "document.body.innerText;") {
    return { type: "string", value: page.url ? `Welcome to ${page.url}` : "" };
  }
  if (expression.startsWith("window.location = ")) {
    page.url = JSON.parse(expression.slice("window.location = ".length, -1));
    return { type: "undefined" };
  }
  if (expression.includes("getBoundingClientRect")) {
    return { type: "string", value: '{"x":0,"y":0,"width":2,"height":2}' };
  }
  if (expression.includes("window.scrollX")) return { type: "string", value: '{"x":0,"y":0}' };
  if (expression.endsWith(".innerText;")) return { type: "string", value: "Hello from #title" };
  if (expression === "1 + 1") return { type: "number", value: 2 };
  return { type: "object", subtype: "error", description: `ReferenceError: ${expression} is not defined` };
}

async function createPageServer(): Promise<string> {
  const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  servers.push(wss);
  await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
  const page = { url: "" };
  const screenshot = PNG.sync.write(new PNG({ width: 2, height: 2 })).toString("base64");

  wss.on("connection", (socket) => {
    socket.on("message", (data) => {
      const request: EvaluateRequest = JSON.parse(data.toString());
      const result = request.method === "Page.captureScreenshot"
        ? { data: screenshot }
        : { result: evaluate(request.params?.expression ?? "", page) };
      socket.send(JSON.stringify({ id: CORRELATION_ID, result }));
    });
  });

  const address = wss.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;
  return `ws://127.0.0.1:${port}/devtools/page/A`;
}

async function setup(): Promise<{
  deps: CliDeps;
  out: string[];
  spawn: Mock<SpawnFn>;
  fetchJson: Mock<FetchJson>;
  children: FakeChild[];
  pageUrl: string;
}> {
  const pageUrl = await createPageServer();
  const children: FakeChild[] = [];
  const spawn = vi.fn<SpawnFn>(() => {
    const child = new FakeChild();
    children.push(child);
    return child;
  });
  const fetchJson = vi.fn<FetchJson>().mockResolvedValue([
    { id: "A", type: "page", url: "about:blank", webSocketDebuggerUrl: pageUrl },
  ]);
  const out: string[] = [];
  const deps: CliDeps = {
    env: { TABRUNNER_CHROME_PATH: "/usr/bin/chromium", TABRUNNER_KILL_EXISTING: "false" },
    createManager: (config: DriverConfig) => createBrowserDriverManager(config, { spawn, fetchJson, logger: silentLogger }),
    writeOut: (text) => out.push(text),
    writeErr: () => {},
    writeFile: vi.fn(async () => {}),
  };
  return { deps, out, spawn, fetchJson, children, pageUrl };
}

// ── Pure helpers ────────────────────────────────────────────────────

describe("parsePort", () => {
  it("accepts ports in range", () => {
    expect(parsePort("9222")).toBe(9222);
  });

  it("rejects ports out of range", () => {
    expect(() => parsePort("0")).toThrow('Invalid port: "0" (must be 1–65535)');
    expect(() => parsePort("abc")).toThrow('Invalid port: "abc"');
  });
});

describe("formatTargets", () => {
  it("prints one tab-separated line per target", () => {
    expect(formatTargets([
      { id: "A", type: "page", url: "https://example.test/", webSocketDebuggerUrl: "ws://localhost:9222/devtools/page/A" },
      { id: "B", webSocketDebuggerUrl: "ws://localhost:9222/devtools/page/B" },
    ])).toBe(
      "0\tpage\thttps://example.test/\tws://localhost:9222/devtools/page/A\n"
      + "1\t?\t\tws://localhost:9222/devtools/page/B",
    );
  });

  it("says so when there are none", () => {
    expect(formatTargets([])).toBe("No debug targets.");
  });
});

describe("formatValue", () => {
  it("prints strings raw and everything else as JSON", () => {
    expect(formatValue("plain")).toBe("plain");
    expect(formatValue(undefined)).toBe("undefined");
    expect(formatValue({ a: 1 })).toBe('{\n  "a": 1\n}');
  });
});

// ── Commands ────────────────────────────────────────────────────────

describe("tabrunner commands", () => {
  it("targets lists the discovered targets and shuts the browser down", async () => {
    const { deps, out, children, pageUrl } = await setup();

    await createProgram(deps).parseAsync(["targets"], { from: "user" });

    expect(out).toEqual([`0\tpage\tabout:blank\t${pageUrl}\n`]);
    expect(children).toHaveLength(1);
    expect(children[0]?.kill).toHaveBeenCalledWith("SIGKILL");
    expect(DriverManager.isPortLeased(9222)).toBe(false);
  });

  it("eval prints the script's value", async () => {
    const { deps, out } = await setup();
    await createProgram(deps).parseAsync(["eval", "1 + 1"], { from: "user" });
    expect(out).toEqual(["2\n"]);
  });

  it("eval surfaces script errors without retrying", async () => {
    const { deps, spawn } = await setup();

    await expect(createProgram(deps).parseAsync(["eval", "missingVar"], { from: "user" }))
      .rejects.toBeInstanceOf(JsExecutionError);
    expect(spawn).toHaveBeenCalledTimes(1);
    expect(DriverManager.isPortLeased(9222)).toBe(false);
  });

  it("text applies the global options", async () => {
    const { deps, out, spawn, fetchJson } = await setup();

    await createProgram(deps).parseAsync(
      ["--port", "9333", "--headless", "text", "https://example.test/", "#title"],
      { from: "user" },
    );

    expect(out).toEqual(["Hello from #title\n"]);
    expect(spawn).toHaveBeenCalledWith(
      "/usr/bin/chromium",
      ["--no-sandbox", "--remote-debugging-port=9333", "--headless"],
      { stdio: "ignore", shell: false },
    );
    expect(fetchJson).toHaveBeenCalledWith("http://localhost:9333/json");
  });

  it("screenshot writes the PNG", async () => {
    const { deps, out } = await setup();

    await createProgram(deps).parseAsync(["screenshot", "https://example.test/", "-o", "/tmp/shot.png"], { from: "user" });

    expect(deps.writeFile).toHaveBeenCalledWith("/tmp/shot.png", expect.any(Buffer));
    expect(out).toEqual(["Saved 2x2 screenshot to /tmp/shot.png\n"]);
  });

  it("rejects an invalid --port before starting anything", async () => {
    const { deps, spawn } = await setup();

    const err = await createProgram(deps).parseAsync(["--port", "0", "targets"], { from: "user" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CommanderError);
    expect(err).toHaveProperty("code", "commander.invalidArgument");
    expect(spawn).not.toHaveBeenCalled();
  });
});
