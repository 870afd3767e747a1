/**
 * Bounded retry combinator. Repeats an attempt until it reports success, a
 * fatal error, or the attempt budget runs out.
 *
 * Each attempt returns a tagged AttemptOutcome instead of signalling "try
 * again" through an exception, so genuine failures and retry requests never
 * share a channel.
 */

import type { Logger } from "@tabrunner/schemas";
import { silentLogger } from "@tabrunner/schemas";
import { OutOfRetriesError } from "../errors.js";

export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export type AttemptOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "retry"; diagnostic: string }
  | { kind: "fatal"; error: unknown };

/** `R` may be a Promise; results are awaited. */
export type Action<A extends unknown[], R> = (...args: A) => R;

export type AttemptFn<A extends unknown[], R, T> = (
  action: Action<A, R>,
  ...args: A
) => AttemptOutcome<T> | Promise<AttemptOutcome<T>>;

/** Any error class usable on the right of `instanceof`. */
export type ErrorKind<E extends Error = Error> = abstract new (...args: never[]) => E;

export interface RetryWaiterOptions {
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const MAX_DIAGNOSTIC_CHARS = 200;

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, delayMs: 500 };

export function success<T>(value: T): AttemptOutcome<T> {
  return { kind: "success", value };
}

export function retry(diagnostic: string): AttemptOutcome<never> {
  return { kind: "retry", diagnostic: truncateDiagnostic(diagnostic) };
}

export function fatal(error: unknown): AttemptOutcome<never> {
  return { kind: "fatal", error };
}

export function truncateDiagnostic(text: string): string {
  return text.length > MAX_DIAGNOSTIC_CHARS ? text.slice(0, MAX_DIAGNOSTIC_CHARS) : text;
}

/** Printable form of an action result, for retry diagnostics. */
export function describeValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function isKindList(kinds: ErrorKind | readonly ErrorKind[]): kinds is readonly ErrorKind[] {
  return Array.isArray(kinds);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RetryWaiter {
  readonly policy: Readonly<RetryPolicy>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY, options?: RetryWaiterOptions) {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
    }
    if (!Number.isFinite(policy.delayMs) || policy.delayMs < 0) {
      throw new RangeError(`delayMs must be a finite number >= 0, got ${policy.delayMs}`);
    }
    this.policy = Object.freeze({ ...policy });
    this.sleep = options?.sleep ?? sleep;
    this.logger = options?.logger ?? silentLogger;
  }

  /** Runs `attempt(action, ...args)` until it returns success or fatal. */
  async until<A extends unknown[], R, T>(
    attempt: AttemptFn<A, R, T>,
    action: Action<A, R>,
    ...args: A
  ): Promise<T> {
    const { maxAttempts, delayMs } = this.policy;
    let lastDiagnostic: string | undefined;

    for (let n = 1; n <= maxAttempts; n++) {
      const outcome = await attempt(action, ...args);
      switch (outcome.kind) {
        case "success":
          return outcome.value;
        case "fatal":
          throw outcome.error;
        case "retry":
          lastDiagnostic = outcome.diagnostic;
          this.logger.debug(`Attempt ${n}/${maxAttempts} will retry`, { diagnostic: outcome.diagnostic });
          if (n < maxAttempts) await this.sleep(delayMs);
          break;
      }
    }
    throw new OutOfRetriesError(maxAttempts, lastDiagnostic);
  }

  /** Retries until `predicate` accepts the action's result; resolves to that result. */
  untilValue<A extends unknown[], R>(
    predicate: (value: Awaited<R>) => boolean,
    action: Action<A, R>,
    ...args: A
  ): Promise<Awaited<R>> {
    return this.until<A, R, Awaited<R>>(async (fn, ...fnArgs) => {
      const value = await fn(...fnArgs);
      if (predicate(value)) return success(value);
      return retry(`Return value: ${describeValue(value)}`);
    }, action, ...args);
  }

  /** Retries until the action returns a truthy value. */
  untilTrue<A extends unknown[], R>(action: Action<A, R>, ...args: A): Promise<Awaited<R>> {
    return this.untilValue((value) => Boolean(value), action, ...args);
  }

  /**
   * Retries while the action throws one of `kinds`. Any other error
   * propagates on its first occurrence.
   */
  untilNoException<A extends unknown[], R>(
    kinds: ErrorKind | readonly ErrorKind[],
    action: Action<A, R>,
    ...args: A
  ): Promise<Awaited<R>> {
    const list: readonly ErrorKind[] = isKindList(kinds) ? kinds : [kinds];
    return this.until<A, R, Awaited<R>>(async (fn, ...fnArgs) => {
      try {
        return success(await fn(...fnArgs));
      } catch (err: unknown) {
        if (list.some((kind) => err instanceof kind)) return retry(describeValue(err));
        return fatal(err);
      }
    }, action, ...args);
  }
}
