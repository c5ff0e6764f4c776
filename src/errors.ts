/**
 * Structured error types for lsq.
 *
 * Every failure that crosses a module boundary is an LsqError: a plain
 * Error carrying a `kind` and a `retryable` flag, so callers can branch on
 * the kind instead of matching message text.
 */

export type LsqErrorKind =
  | "connection_error"
  | "connection_lost"
  | "protocol_error"
  | "aborted"
  | "config_error";

export interface LsqError extends Error {
  kind: LsqErrorKind;
  retryable: boolean;
  address?: string;
  command?: string;
  cause?: unknown;
}

/**
 * Create an LsqError with structured fields.
 * `connection_lost` is retryable unless the caller says otherwise.
 */
export function lsqError(
  kind: LsqErrorKind,
  message: string,
  opts: {
    address?: string;
    command?: string;
    retryable?: boolean;
    cause?: unknown;
  } = {},
): LsqError {
  const err: LsqError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? kind === "connection_lost",
  });
  if (opts.address) err.address = opts.address;
  if (opts.command) err.command = opts.command;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isLsqError(e: unknown): e is LsqError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/** True for errors that may succeed when the same operation is tried again. */
export function isRetryable(e: unknown): e is LsqError {
  return isLsqError(e) && e.retryable;
}

/**
 * Format an LsqError for structured logging.
 */
export function errorLogFields(e: LsqError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.address) fields.address = e.address;
  if (e.command) fields.command = e.command;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
