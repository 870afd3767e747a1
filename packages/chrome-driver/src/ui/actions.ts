/**
 * Page-level helpers built on a DebugChannel. Anything that depends on the
 * page settling (navigation, elements appearing) goes through a RetryWaiter;
 * `uiWait()` gives the default budget of 5 attempts, 4 s apart.
 *
 * Selectors and URLs are embedded in scripts as JSON string literals.
 */

import type { DebugChannel } from "../cdp/channel.js";
import { isRecord, isScreenshotResult, type PageCaptureScreenshotParams } from "../cdp/protocol.js";
import { JsExecutionError, UnknownProtocolResultError } from "../errors.js";
import {
  RetryWaiter,
  describeValue,
  fatal,
  retry,
  success,
  type RetryWaiterOptions,
} from "../retry/waiter.js";
import { decodePng, type DecodedImage, type ImageDecoder } from "./image.js";

/** The part of a DebugChannel the actions use. */
export type PageChannel = Pick<DebugChannel, "runJsGetValue" | "send">;

export interface ScrollValues {
  x: number;
  y: number;
}

export interface ElementRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const UI_WAIT_POLICY = { maxAttempts: 5, delayMs: 4000 } as const;

const BODY_TEXT = "document.body.innerText;";

export function uiWait(options?: RetryWaiterOptions): RetryWaiter {
  return new RetryWaiter(UI_WAIT_POLICY, options);
}

function querySelector(selector: string): string {
  return `document.querySelector(${JSON.stringify(selector)})`;
}

function parseJsonObject(raw: unknown, context: string): Record<string, unknown> {
  if (typeof raw !== "string") throw new UnknownProtocolResultError(describeValue(raw), context);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new UnknownProtocolResultError(raw, context);
  }
  if (!isRecord(parsed)) throw new UnknownProtocolResultError(raw, context);
  return parsed;
}

function numberField(obj: Record<string, unknown>, key: string, context: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new UnknownProtocolResultError(JSON.stringify(obj), context);
  }
  return value;
}

/**
 * Navigates to `url` and waits until the body text differs from what it was
 * before. Script errors while the new document loads count as "not yet".
 */
export async function goToUrl(channel: PageChannel, url: string, waiter: RetryWaiter = uiWait()): Promise<void> {
  const before = await channel.runJsGetValue(BODY_TEXT);
  await channel.runJsGetValue(`window.location = ${JSON.stringify(url)};`);

  await waiter.until(async (read) => {
    try {
      const text = await read();
      return text !== before ? success(text) : retry(`Page text unchanged: ${describeValue(text)}`);
    } catch (err: unknown) {
      return err instanceof JsExecutionError ? retry(err.message) : fatal(err);
    }
  }, () => channel.runJsGetValue(BODY_TEXT));
}

export async function getWindowScrollValues(channel: PageChannel): Promise<ScrollValues> {
  const raw = await channel.runJsGetValue('JSON.stringify({"x": window.scrollX, "y": window.scrollY});');
  const context = "Unexpected scroll values";
  const obj = parseJsonObject(raw, context);
  return { x: numberField(obj, "x", context), y: numberField(obj, "y", context) };
}

/** `innerText` of the first element matching `selector`, waiting for it to appear. */
export async function getElementText(
  channel: PageChannel,
  selector: string,
  waiter: RetryWaiter = uiWait(),
): Promise<string> {
  const text = await waiter.untilNoException(
    JsExecutionError,
    () => channel.runJsGetValue(`${querySelector(selector)}.innerText;`),
  );
  if (typeof text !== "string") throw new UnknownProtocolResultError(describeValue(text), "Element text is not a string");
  return text;
}

export async function getElementRect(channel: PageChannel, selector: string): Promise<ElementRect> {
  const raw = await channel.runJsGetValue(`JSON.stringify(${querySelector(selector)}.getBoundingClientRect());`);
  const context = "Unexpected element rect";
  const obj = parseJsonObject(raw, context);
  return {
    x: numberField(obj, "x", context),
    y: numberField(obj, "y", context),
    width: numberField(obj, "width", context),
    height: numberField(obj, "height", context),
  };
}

/**
 * Captures the viewport as PNG, or only the element matching `selector`.
 * The element's rect is offset by the current scroll, since the clip is in
 * document coordinates.
 */
export function takeScreenshot(channel: PageChannel, selector?: string): Promise<DecodedImage>;
export function takeScreenshot<T>(channel: PageChannel, selector: string | undefined, decoder: ImageDecoder<T>): Promise<T>;
export async function takeScreenshot<T>(
  channel: PageChannel,
  selector?: string,
  decoder?: ImageDecoder<T>,
): Promise<T | DecodedImage> {
  const params: PageCaptureScreenshotParams = { format: "png" };
  if (selector) {
    const rect = await getElementRect(channel, selector);
    const scroll = await getWindowScrollValues(channel);
    params.clip = {
      x: rect.x + scroll.x,
      y: rect.y + scroll.y,
      width: rect.width,
      height: rect.height,
      scale: 1,
    };
  }

  const result = await channel.send("Page.captureScreenshot", params);
  if (!isScreenshotResult(result)) {
    throw new UnknownProtocolResultError(describeValue(result), "Screenshot reply without data");
  }
  return decoder ? decoder(result.data) : decodePng(result.data);
}
