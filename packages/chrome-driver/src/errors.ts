import { DriverError } from "@tabrunner/schemas";

export class OutOfRetriesError extends DriverError {
  readonly attempts: number;
  readonly lastDiagnostic: string | undefined;

  constructor(attempts: number, lastDiagnostic?: string) {
    super(
      "OUT_OF_RETRIES",
      `Action did not succeed after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
      { attempts, lastDiagnostic },
    );
    this.name = "OutOfRetriesError";
    this.attempts = attempts;
    this.lastDiagnostic = lastDiagnostic;
  }
}

export class ProcessNotRunningError extends DriverError {
  constructor(message = "Browser process is not running", data?: Record<string, unknown>) {
    super("PROCESS_NOT_RUNNING", message, data);
    this.name = "ProcessNotRunningError";
  }
}

export class ConnectionError extends DriverError {
  constructor(message: string, data?: Record<string, unknown>) {
    super("CONNECTION_FAILED", message, data);
    this.name = "ConnectionError";
  }
}

export class ProtocolError extends DriverError {
  constructor(message: string, data?: Record<string, unknown>) {
    super("PROTOCOL_ERROR", message, data);
    this.name = "ProtocolError";
  }
}

/** The browser answered a command with a CDP `error` member. The connection is fine. */
export class CommandError extends DriverError {
  readonly method: string;
  readonly cdpCode: number;

  constructor(method: string, cdpCode: number, cdpMessage: string) {
    super("CDP_COMMAND_ERROR", `CDP error: ${cdpMessage} (code ${cdpCode})`, { method, code: cdpCode });
    this.name = "CommandError";
    this.method = method;
    this.cdpCode = cdpCode;
  }
}

/** The evaluated script threw inside the page. */
export class JsExecutionError extends DriverError {
  readonly description: string;

  constructor(description: string) {
    super("JS_EXECUTION_ERROR", description, { description });
    this.name = "JsExecutionError";
    this.description = description;
  }
}

export class UnknownProtocolResultError extends DriverError {
  readonly raw: string;

  constructor(raw: string, context = "Unknown protocol result") {
    super("UNKNOWN_PROTOCOL_RESULT", `${context}: ${raw}`, { raw });
    this.name = "UnknownProtocolResultError";
    this.raw = raw;
  }
}

export class TargetNotFoundError extends DriverError {
  constructor(index: number, available: number) {
    super(
      "TARGET_NOT_FOUND",
      `No debug target at index ${index} (${available} available)`,
      { index, available },
    );
    this.name = "TargetNotFoundError";
  }
}

/** Errors that mean the browser or its connection went away. */
export const CRASH_ERRORS = [ProcessNotRunningError, ConnectionError, ProtocolError] as const;
