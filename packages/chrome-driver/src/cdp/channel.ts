/**
 * DebugChannel — one persistent WebSocket to a CDP target.
 *
 * Every request is stamped with the same correlation id, so at most one
 * command is on the wire at a time. Concurrent callers are queued in call
 * order. Replies with any other id (events, stray responses) are discarded.
 * Running several commands in parallel would need per-request ids and a
 * pending map, which this channel does not have.
 */

import WebSocket from "ws";
import type { Logger } from "@tabrunner/schemas";
import { silentLogger, withTimeout, errorMessage } from "@tabrunner/schemas";
import {
  CommandError,
  ConnectionError,
  JsExecutionError,
  ProtocolError,
  UnknownProtocolResultError,
} from "../errors.js";
import {
  isCDPResponse,
  isEvaluateResult,
  type CDPCommand,
  type CDPMethodMap,
  type CDPRequest,
  type CDPResponse,
  type RemoteObject,
} from "./protocol.js";

export const CORRELATION_ID = 77;

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface DebugChannelOptions {
  logger?: Logger;
  /** Handshake deadline; 0 disables it. */
  connectTimeoutMs?: number;
}

interface PendingReply {
  method: string;
  resolve: (response: CDPResponse) => void;
  reject: (error: Error) => void;
}

export class DebugChannel {
  readonly url: string;
  private readonly ws: WebSocket;
  private readonly logger: Logger;
  private pending: PendingReply | null = null;
  private queue: Promise<void> = Promise.resolve();
  private readonly closed: Promise<void>;

  private constructor(ws: WebSocket, url: string, logger: Logger) {
    this.ws = ws;
    this.url = url;
    this.logger = logger;
    this.closed = new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
    });
    this.attachHandlers();
  }

  /** Connects to a target's webSocketDebuggerUrl. */
  static async open(url: string, options?: DebugChannelOptions): Promise<DebugChannel> {
    const logger = options?.logger ?? silentLogger;
    const timeoutMs = options?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

    let ws: WebSocket;
    try {
      ws = new WebSocket(url);
    } catch (err: unknown) {
      throw new ConnectionError(`Invalid CDP endpoint ${url}: ${errorMessage(err)}`, { url });
    }

    const opened = new Promise<void>((resolve, reject) => {
      ws.once("open", () => resolve());
      ws.once("error", (err: Error) => reject(new ConnectionError(`CDP connection failed: ${err.message}`, { url })));
    });

    try {
      await withTimeout(opened, timeoutMs, `CDP handshake with ${url}`);
    } catch (err: unknown) {
      ws.removeAllListeners();
      ws.on("error", (e: Error) => logger.debug("Error while abandoning CDP socket", { url, error: e.message }));
      ws.terminate();
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(errorMessage(err), { url });
    }

    ws.removeAllListeners();
    logger.debug("CDP channel open", { url });
    return new DebugChannel(ws, url, logger);
  }

  private attachHandlers(): void {
    this.ws.on("message", (data: WebSocket.RawData) => this.handleMessage(data.toString()));

    this.ws.on("error", (err: Error) => {
      // A "close" event always follows and settles any pending command.
      this.logger.warn("CDP socket error", { url: this.url, error: err.message });
    });

    this.ws.on("close", (code: number, reason: Buffer) => {
      const pending = this.pending;
      this.pending = null;
      if (pending) {
        pending.reject(new ProtocolError(
          `CDP connection closed while waiting for ${pending.method}`,
          { url: this.url, code, reason: reason.toString() },
        ));
      }
    });
  }

  private handleMessage(text: string): void {
    let msg: unknown;
    try {
      msg = JSON.parse(text);
    } catch {
      this.logger.debug("Discarding unparseable CDP frame", { url: this.url, frame: text.slice(0, 200) });
      return;
    }

    if (!isCDPResponse(msg) || msg.id !== CORRELATION_ID) {
      this.logger.debug("Discarding unmatched CDP message", { url: this.url, frame: text.slice(0, 200) });
      return;
    }

    const pending = this.pending;
    if (!pending) {
      this.logger.debug("Discarding reply with no command in flight", { url: this.url });
      return;
    }
    this.pending = null;
    pending.resolve(msg);
  }

  isAlive(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  /** Closes the socket; resolves once it is closed. Safe to call repeatedly. */
  async kill(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
    await this.closed;
  }

  /**
   * Sends a raw command and waits for the reply carrying the channel's
   * correlation id. Rejects with ProtocolError if the socket closes first.
   */
  runCommand(command: CDPCommand): Promise<CDPResponse> {
    const run = this.queue.then(() => this.exchange(command));
    // The queue only orders commands; callers see failures through `run`.
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private exchange(command: CDPCommand): Promise<CDPResponse> {
    if (!this.isAlive()) {
      return Promise.reject(new ProtocolError(`CDP channel is closed; cannot send ${command.method}`, { url: this.url }));
    }

    const request: CDPRequest = { ...command, id: CORRELATION_ID };
    return new Promise<CDPResponse>((resolve, reject) => {
      this.pending = { method: command.method, resolve, reject };
      this.ws.send(JSON.stringify(request), (err?: Error) => {
        if (err && this.pending?.resolve === resolve) {
          this.pending = null;
          reject(new ProtocolError(`Failed to send ${command.method}: ${err.message}`, { url: this.url }));
        }
      });
    });
  }

  /** Sends a typed command and returns its `result`; a CDP `error` reply becomes CommandError. */
  async send<M extends keyof CDPMethodMap>(
    method: M,
    params: CDPMethodMap[M]["params"],
  ): Promise<Record<string, unknown>> {
    const response = await this.runCommand({ method, params });
    if (response.error) {
      throw new CommandError(method, response.error.code, response.error.message);
    }
    return response.result ?? {};
  }

  /** Evaluates an expression and returns the resulting RemoteObject. */
  async runJs(script: string): Promise<RemoteObject> {
    const result = await this.send("Runtime.evaluate", { expression: script });
    if (!isEvaluateResult(result)) {
      throw new UnknownProtocolResultError(JSON.stringify(result), "Malformed Runtime.evaluate reply");
    }
    return result.result;
  }

  /**
   * Evaluates an expression and interprets the result:
   * a plain value is returned as-is, a DOM node yields its objectId, a thrown
   * error becomes JsExecutionError and anything else UnknownProtocolResultError.
   */
  async runJsGetValue(script: string): Promise<unknown> {
    const result = await this.runJs(script);
    if ("value" in result) return result.value;

    if (result.subtype === "node" && typeof result.objectId === "string") {
      return result.objectId;
    }
    if (result.subtype === "error") {
      throw new JsExecutionError(result.description ?? "Script raised an error without a description");
    }
    if (result.type === "undefined") return undefined;

    throw new UnknownProtocolResultError(JSON.stringify(result), "Unknown error");
  }
}
