import { existsSync } from "node:fs";
import { platform } from "node:os";
import { DriverError } from "@tabrunner/schemas";

/** Well-known Chrome/Chromium install locations for a platform. */
export function chromeCandidates(
  systemPlatform: NodeJS.Platform = platform(),
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  if (systemPlatform === "darwin") {
    return [
      "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
      "/Applications/Chromium.app/Contents/MacOS/Chromium",
      `${env.HOME ?? ""}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
    ];
  }
  if (systemPlatform === "win32") {
    const roots = [env.LOCALAPPDATA, env.PROGRAMFILES, env["PROGRAMFILES(X86)"]]
      .filter((root): root is string => typeof root === "string" && root.length > 0);
    return [
      "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
      "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
      ...roots.map((root) => `${root}\\Google\\Chrome\\Application\\chrome.exe`),
      "C:\\Program Files\\Chromium\\Application\\chrome.exe",
    ];
  }
  return [
    "/usr/bin/chromium",
    "/usr/bin/chromium-browser",
    "/usr/bin/google-chrome",
    "/usr/bin/google-chrome-stable",
    "/snap/bin/chromium",
    "/usr/local/bin/google-chrome",
    "/opt/google/chrome/chrome",
  ];
}

export interface ResolveExecutableOptions {
  exists?: (path: string) => boolean;
  candidates?: readonly string[];
}

/**
 * The configured path when given (taken as-is), else the first candidate
 * that exists on disk.
 */
export function resolveChromeExecutable(configured?: string, options?: ResolveExecutableOptions): string {
  if (configured) return configured;

  const exists = options?.exists ?? existsSync;
  const candidates = options?.candidates ?? chromeCandidates();
  const found = candidates.find((candidate) => exists(candidate));
  if (found) return found;

  throw new DriverError(
    "BROWSER_NOT_FOUND",
    "No Chrome or Chromium executable found; set TABRUNNER_CHROME_PATH or pass --executable",
    { searched: [...candidates] },
  );
}
