import { writeFile as fsWriteFile } from "node:fs/promises";
import { Command, InvalidArgumentError } from "commander";
import type { DebugTarget, DriverConfig } from "@tabrunner/schemas";
import { createLogger } from "@tabrunner/schemas";
import {
  createBrowserDriverManager,
  getElementText,
  goToUrl,
  resolveDriverConfig,
  takeScreenshot,
  type BrowserDriver,
  type DebugChannel,
  type DriverManager,
} from "@tabrunner/chrome-driver";

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  createManager: (config: DriverConfig) => DriverManager<BrowserDriver>;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
  writeFile: (path: string, data: Buffer) => Promise<void>;
}

type GlobalOptions = {
  port?: number;
  headless?: boolean;
  executable?: string;
};

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`Invalid port: "${value}" (must be 1–65535)`);
  }
  return port;
}

export function formatTargets(targets: readonly DebugTarget[]): string {
  if (targets.length === 0) return "No debug targets.";
  return targets
    .map((t, i) => `${i}\t${t.type ?? "?"}\t${t.url ?? ""}\t${t.webSocketDebuggerUrl}`)
    .join("\n");
}

export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "undefined";
  return JSON.stringify(value, null, 2);
}

/** Runs `fn` on a channel to the first target, closing the channel afterwards. */
async function withFirstTarget<T>(driver: BrowserDriver, fn: (channel: DebugChannel) => Promise<T>): Promise<T> {
  const channel = await driver.openChannel(0);
  try {
    return await fn(channel);
  } finally {
    await channel.kill();
  }
}

export function defaultDeps(): CliDeps {
  return {
    env: process.env,
    createManager: (config) => createBrowserDriverManager(config, {
      logger: createLogger("chrome-driver", { TABRUNNER_LOG_LEVEL: config.logLevel }),
    }),
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text),
    writeFile: (path, data) => fsWriteFile(path, data),
  };
}

export function createProgram(deps: CliDeps = defaultDeps()): Command {
  const program = new Command();
  program.name("tabrunner").description("Drive a Chromium browser over the DevTools protocol").version("0.1.0")
    .option("-p, --port <port>", "Remote-debugging port (defaults to TABRUNNER_PORT or 9222)", parsePort)
    .option("--headless", "Run the browser headless")
    .option("--no-headless", "Run the browser with a window")
    .option("--executable <path>", "Browser executable (defaults to TABRUNNER_CHROME_PATH or a well-known path)")
    .configureOutput({ writeOut: deps.writeOut, writeErr: deps.writeErr })
    // Parse errors, --help and --version surface as CommanderError instead of exiting.
    .exitOverride();

  const print = (text: string): void => deps.writeOut(`${text}\n`);

  /** One managed browser session per command, torn down before returning. */
  async function session<T>(action: (driver: BrowserDriver) => Promise<T>): Promise<T> {
    const opts = program.opts<GlobalOptions>();
    const config = resolveDriverConfig(deps.env, {
      port: opts.port,
      headless: opts.headless,
      executablePath: opts.executable,
    });
    const manager = deps.createManager(config);
    try {
      return await manager.doWithRecovery(action, { closeUponCompletion: true });
    } finally {
      await manager.dispose();
    }
  }

  program.command("targets").description("List the browser's debug targets")
    .action(async () => {
      const targets = await session((driver) => driver.listTargets());
      print(formatTargets(targets));
    });

  program.command("eval").description("Evaluate a script in the first target").argument("<script>", "JavaScript expression")
    .action(async (script: string) => {
      const value = await session((driver) => withFirstTarget(driver, (channel) => channel.runJsGetValue(script)));
      print(formatValue(value));
    });

  program.command("text").description("Print the text of an element after loading a page")
    .argument("<url>", "Page to load")
    .argument("<selector>", "CSS selector")
    .action(async (url: string, selector: string) => {
      const text = await session((driver) => withFirstTarget(driver, async (channel) => {
        await goToUrl(channel, url);
        return getElementText(channel, selector);
      }));
      print(text);
    });

  program.command("screenshot").description("Save a PNG of a page or one of its elements")
    .argument("<url>", "Page to load")
    .argument("[selector]", "CSS selector of the element to capture")
    .requiredOption("-o, --output <file>", "Where to write the PNG")
    .action(async (url: string, selector: string | undefined, opts: { output: string }) => {
      const image = await session((driver) => withFirstTarget(driver, async (channel) => {
        await goToUrl(channel, url);
        return takeScreenshot(channel, selector);
      }));
      await deps.writeFile(opts.output, image.data);
      print(`Saved ${image.width}x${image.height} screenshot to ${opts.output}`);
    });

  return program;
}
