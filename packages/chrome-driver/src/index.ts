export {
  RetryWaiter,
  DEFAULT_RETRY_POLICY,
  MAX_DIAGNOSTIC_CHARS,
  success,
  retry,
  fatal,
  truncateDiagnostic,
  describeValue,
  type RetryPolicy,
  type AttemptOutcome,
  type AttemptFn,
  type Action,
  type ErrorKind,
  type RetryWaiterOptions,
} from "./retry/waiter.js";
export { Throttler, type ThrottlerOptions } from "./retry/throttler.js";
export {
  ProcessHandle,
  killProcessesByName,
  type ChildProcessLike,
  type CommandRunner,
  type ProcessExit,
  type SpawnFn,
  type SpawnProcessOptions,
} from "./process/process-handle.js";
export { DebugChannel, CORRELATION_ID, type DebugChannelOptions } from "./cdp/channel.js";
export type {
  CDPCommand,
  CDPResponse,
  RemoteObject,
  ScreenshotClip,
  PageCaptureScreenshotParams,
  RuntimeEvaluateParams,
} from "./cdp/protocol.js";
export { fetchJson, type FetchJson } from "./http/json-get.js";
export {
  BrowserDriver,
  buildLaunchArgs,
  DEFAULT_KILL_PATTERN,
  DEFAULT_WAIT_POLICY,
  DEFAULT_KILL_TIMEOUT_MS,
  READINESS_PROBE,
  type BrowserDriverOptions,
  type ChannelOpener,
  type KillByName,
  type LaunchOptions,
} from "./driver/browser-driver.js";
export { chromeCandidates, resolveChromeExecutable } from "./driver/executable.js";
export {
  DriverManager,
  type DoOptions,
  type DriverAction,
  type DriverManagerOptions,
  type ManagedBrowser,
} from "./driver/driver-manager.js";
export {
  createBrowserDriverManager,
  browserDriverOptions,
  type BrowserCollaborators,
  type BrowserManagerOptions,
} from "./driver/chrome-manager.js";
export {
  uiWait,
  UI_WAIT_POLICY,
  goToUrl,
  getWindowScrollValues,
  getElementText,
  getElementRect,
  takeScreenshot,
  type PageChannel,
  type ScrollValues,
  type ElementRect,
} from "./ui/actions.js";
export { decodePng, type DecodedImage, type ImageDecoder } from "./ui/image.js";
export { resolveDriverConfig, DEFAULT_DRIVER_CONFIG } from "./config.js";
export * from "./errors.js";
