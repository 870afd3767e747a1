/**
 * Minimal CDP type definitions for the methods this driver sends.
 */

// ── Generic CDP message types ────────────────────────────────────────

export interface CDPCommand {
  method: string;
  params?: object;
}

export interface CDPRequest extends CDPCommand {
  id: number;
}

export interface CDPResponse {
  id: number;
  result?: Record<string, unknown>;
  error?: { code: number; message: string; data?: string };
}

// ── Page domain ──────────────────────────────────────────────────────

export interface ScreenshotClip {
  x: number;
  y: number;
  width: number;
  height: number;
  scale: number;
}

export interface PageCaptureScreenshotParams {
  format?: "jpeg" | "png" | "webp";
  quality?: number;
  clip?: ScreenshotClip;
  captureBeyondViewport?: boolean;
}

export interface PageCaptureScreenshotResult {
  data: string; // base64
}

// ── Runtime domain ───────────────────────────────────────────────────

export interface RemoteObject {
  type?: string;
  subtype?: string;
  className?: string;
  value?: unknown;
  objectId?: string;
  description?: string;
}

export interface ExceptionDetails {
  exceptionId: number;
  text: string;
  lineNumber: number;
  columnNumber: number;
  exception?: RemoteObject;
}

export interface RuntimeEvaluateParams {
  expression: string;
  returnByValue?: boolean;
  awaitPromise?: boolean;
}

export interface RuntimeEvaluateResult {
  result: RemoteObject;
  exceptionDetails?: ExceptionDetails;
}

// ── CDP method → params/result mapping ───────────────────────────────

export interface CDPMethodMap {
  "Page.captureScreenshot": { params: PageCaptureScreenshotParams; result: PageCaptureScreenshotResult };
  "Runtime.evaluate": { params: RuntimeEvaluateParams; result: RuntimeEvaluateResult };
}

// ── Guards ───────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isCDPResponse(msg: unknown): msg is CDPResponse {
  return isRecord(msg) && typeof msg.id === "number";
}

export function isRemoteObject(value: unknown): value is RemoteObject {
  return isRecord(value) && (value.type === undefined || typeof value.type === "string");
}

export function isEvaluateResult(value: unknown): value is RuntimeEvaluateResult {
  return isRecord(value) && isRemoteObject(value.result);
}

export function isScreenshotResult(value: unknown): value is PageCaptureScreenshotResult {
  return isRecord(value) && typeof value.data === "string";
}
