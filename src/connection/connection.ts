/**
 * Reconnecting framed connection to the Liquidsoap control interface.
 *
 * Liquidsoap answers every command with a block of text followed by
 * `\r\nEND\r\n` (or `Bye!\r\n` for `quit`) and hangs up on idle clients
 * after about a minute. A Connection holds at most one live transport,
 * opens one lazily when a command needs it, and drops it as soon as a
 * write or read shows the link is gone. It never retries by itself:
 * `send()` reports `connection_lost` and the next `send()` reconnects.
 */

import { TextDecoder } from "node:util";
import { Logger } from "../logger.js";
import { lsqError, asError, type LsqError } from "../errors.js";
import { parseAddress, formatAddress } from "./address.js";
import { dialNet, type Dialer, type Transport } from "./transport.js";

export const END_MARKER = Buffer.from("\r\nEND\r\n");
export const QUIT_MARKER = Buffer.from("Bye!\r\n");
export const QUIT_COMMAND = "quit";

export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_QUIT_TIMEOUT_MS = 1000;

export interface ConnectionOptions {
  /** Read polling interval; a quiet interval is retried, never a failure. */
  pollIntervalMs?: number;
  /** Upper bound on the best-effort `quit` exchange in `close()`. */
  quitTimeoutMs?: number;
  connectTimeoutMs?: number;
  /** Abort signal applied to every exchange that does not pass its own. */
  signal?: AbortSignal;
  dial?: Dialer;
}

export interface SendOptions {
  signal?: AbortSignal;
}

/** Anything that can run one command and hand back its response text. */
export interface CommandChannel {
  send(command: string, marker?: Uint8Array, opts?: SendOptions): Promise<string>;
}

function endsWith(buffer: Buffer, marker: Uint8Array): boolean {
  if (buffer.length < marker.length) return false;
  return buffer.subarray(buffer.length - marker.length).equals(marker);
}

/**
 * Settle with the dial, or reject as soon as the signal fires. A transport
 * that arrives after the abort is closed straight away.
 */
function untilAborted(dialing: Promise<Transport>, signal?: AbortSignal): Promise<Transport> {
  if (!signal) return dialing;
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      reject(signal.reason);
      dialing.then(
        (late) => late.close(),
        (e: unknown) => Logger.debug(`[lsq] abandoned connect failed: ${asError(e).message}`),
      );
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    dialing.then(
      (transport) => {
        signal.removeEventListener("abort", onAbort);
        resolve(transport);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}

export class Connection implements CommandChannel {
  private transport: Transport | null = null;
  private inFlight = false;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  private readonly pollIntervalMs: number;
  private readonly quitTimeoutMs: number;
  private readonly dial: Dialer;

  constructor(readonly address: string, private readonly opts: ConnectionOptions = {}) {
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.quitTimeoutMs = opts.quitTimeoutMs ?? DEFAULT_QUIT_TIMEOUT_MS;
    this.dial = opts.dial ?? dialNet;
  }

  get connected(): boolean {
    return this.transport !== null;
  }

  /**
   * Open a fresh transport, replacing any current one.
   * Fails with `connection_error` for a bad address or a refused connect,
   * `aborted` if the connection-wide signal fires while dialing.
   */
  async connect(): Promise<this> {
    await this.exclusive(undefined, () => this.open(this.opts.signal));
    return this;
  }

  /**
   * Send one command and wait for its terminator.
   *
   * The command is trimmed and sent with a single trailing newline. The
   * response is returned decoded, without the terminator.
   */
  send(command: string, marker: Uint8Array = END_MARKER, opts: SendOptions = {}): Promise<string> {
    return this.exclusive(command, () => this.exchange(command, marker, opts.signal ?? this.opts.signal));
  }

  /**
   * Say goodbye and release the transport. Best effort: a failed or
   * unanswered `quit` is ignored and the socket is closed regardless.
   */
  async close(): Promise<void> {
    if (!this.transport) return;
    try {
      await this.send(QUIT_COMMAND, QUIT_MARKER, { signal: AbortSignal.timeout(this.quitTimeoutMs) });
    } catch (e: unknown) {
      Logger.debug(`[lsq] quit on ${this.address} failed: ${asError(e).message}`);
    }
    this.drop();
  }

  // One exchange or connect at a time; a second caller would tear down the first one's transport.
  private async exclusive<T>(command: string | undefined, fn: () => Promise<T>): Promise<T> {
    if (this.inFlight) {
      throw lsqError("protocol_error", "Another exchange is already in flight on this connection", {
        address: this.address,
        command,
      });
    }
    this.inFlight = true;
    try {
      return await fn();
    } finally {
      this.inFlight = false;
    }
  }

  private async open(signal?: AbortSignal, command?: string): Promise<Transport> {
    this.drop();
    const target = parseAddress(this.address);
    let transport: Transport;
    try {
      transport = await untilAborted(
        this.dial(target, { connectTimeoutMs: this.opts.connectTimeoutMs, signal }),
        signal,
      );
    } catch (e: unknown) {
      if (signal?.aborted) throw this.aborted(signal, command);
      throw lsqError("connection_error", `Cannot connect to ${this.address}: ${asError(e).message}`, {
        address: this.address,
        cause: e,
      });
    }
    this.transport = transport;
    Logger.debug(`[lsq] connected to ${formatAddress(target)}`);
    return transport;
  }

  private async exchange(command: string, marker: Uint8Array, signal: AbortSignal | undefined): Promise<string> {
    if (signal?.aborted) throw this.aborted(signal, command);
    const transport = this.transport ?? await this.open(signal, command);

    const request = Buffer.from(`${command.trim()}\n`, "utf-8");
    let total = 0;
    while (total < request.length) {
      let sent: number;
      try {
        sent = await transport.write(request.subarray(total));
      } catch (e: unknown) {
        throw this.lost(command, `write failed: ${asError(e).message}`, e);
      }
      if (sent === 0) throw this.lost(command, "no bytes written");
      total += sent;
    }

    let reply = Buffer.alloc(0);
    while (!endsWith(reply, marker)) {
      if (signal?.aborted) {
        // Unread bytes are left on the wire, so the transport cannot be reused.
        this.drop();
        throw this.aborted(signal, command);
      }
      let chunk: Buffer | null;
      try {
        chunk = await transport.read(this.pollIntervalMs);
      } catch (e: unknown) {
        throw this.lost(command, `read failed: ${asError(e).message}`, e);
      }
      if (chunk === null) continue;
      if (chunk.length === 0) throw this.lost(command, "closed by peer");
      reply = Buffer.concat([reply, chunk]);
    }

    try {
      return this.decoder.decode(reply.subarray(0, reply.length - marker.length));
    } catch (e: unknown) {
      throw lsqError("protocol_error", `Response to "${command.trim()}" is not valid UTF-8`, {
        address: this.address,
        command,
        cause: e,
      });
    }
  }

  private aborted(signal: AbortSignal, command?: string): LsqError {
    const what = command === undefined ? `Connect to ${this.address}` : `"${command.trim()}"`;
    return lsqError("aborted", `${what} aborted`, {
      address: this.address,
      command,
      cause: signal.reason,
    });
  }

  private lost(command: string, reason: string, cause?: unknown): LsqError {
    this.drop();
    Logger.debug(`[lsq] connection to ${this.address} lost: ${reason}`);
    return lsqError("connection_lost", `Connection lost (${reason})`, {
      address: this.address,
      command,
      cause,
    });
  }

  private drop(): void {
    if (!this.transport) return;
    this.transport.close();
    this.transport = null;
    Logger.debug(`[lsq] disconnected from ${this.address}`);
  }
}
