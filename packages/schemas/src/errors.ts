export const ErrorCodes = {
  OUT_OF_RETRIES: "OUT_OF_RETRIES",
  PROCESS_NOT_RUNNING: "PROCESS_NOT_RUNNING",
  CONNECTION_FAILED: "CONNECTION_FAILED",
  PROTOCOL_ERROR: "PROTOCOL_ERROR",
  CDP_COMMAND_ERROR: "CDP_COMMAND_ERROR",
  JS_EXECUTION_ERROR: "JS_EXECUTION_ERROR",
  UNKNOWN_PROTOCOL_RESULT: "UNKNOWN_PROTOCOL_RESULT",
  TARGET_NOT_FOUND: "TARGET_NOT_FOUND",
  BROWSER_NOT_FOUND: "BROWSER_NOT_FOUND",
  PORT_IN_USE: "PORT_IN_USE",
  MANAGER_DISPOSED: "MANAGER_DISPOSED",
  INVALID_CONFIG: "INVALID_CONFIG",
  TIMEOUT: "TIMEOUT",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Base class for every error raised by the driver stack. */
export class DriverError extends Error {
  readonly code: ErrorCode;
  readonly data?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = "DriverError";
    this.code = code;
    this.data = data;
  }
}

export function isDriverError(err: unknown, code?: ErrorCode): err is DriverError {
  if (!(err instanceof DriverError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
