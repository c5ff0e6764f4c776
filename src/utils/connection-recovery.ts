/**
 * Connection recovery — one retry for a dropped control connection.
 *
 * Liquidsoap closes idle control connections on its own, so the first
 * command after a pause often finds the socket dead. Retrying that command
 * once on a fresh connection hides the hang-up; a second consecutive loss
 * is a real outage and goes to the caller. Only errors flagged `retryable`
 * are retried, which by default means `connection_lost`; refused connects,
 * bad responses and aborts pass through immediately.
 */

import { isRetryable, type LsqError } from "../errors.js";
import { Logger } from "../logger.js";
import { END_MARKER, type CommandChannel, type SendOptions } from "../connection/connection.js";

export interface RecoveryOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: LsqError) => void;
  retries?: number;   // default: 1
}

export async function withConnectionRecovery<T>(
  fn: () => Promise<T>,
  opts: RecoveryOptions = {},
): Promise<T> {
  const { signal, onRetry, retries = 1 } = opts;

  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!isRetryable(err)) throw err;
      if (signal?.aborted) throw err;
      if (attempt >= retries) throw err;

      attempt++;
      if (onRetry) onRetry(attempt, err);
    }
  }
}

/** Send a command, resending it once if the connection turned out to be dead. */
export function sendWithRetry(
  channel: CommandChannel,
  command: string,
  opts: SendOptions & Pick<RecoveryOptions, "onRetry"> = {},
): Promise<string> {
  const { signal, onRetry } = opts;
  return withConnectionRecovery(() => channel.send(command, END_MARKER, { signal }), {
    signal,
    onRetry: onRetry ?? ((attempt, err) => {
      Logger.debug(`[lsq] ${err.message}, reconnecting (retry ${attempt})`);
    }),
  });
}
