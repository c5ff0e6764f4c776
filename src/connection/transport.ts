/**
 * Byte transport under the framed connection.
 *
 * A Transport is a pull-style pipe: `write` reports how many bytes the link
 * accepted and `read` hands back the next received chunk, `null` when the
 * polling interval elapsed with nothing to read, or an empty buffer once
 * the peer has closed its side.
 */

import { connect, type Socket } from "node:net";
import type { SocketAddress } from "./address.js";

export interface Transport {
  /** Bytes accepted by the link. 0 means the link is gone. */
  write(data: Uint8Array): Promise<number>;
  /** Next chunk, `null` on poll timeout, empty at end-of-stream. */
  read(timeoutMs: number): Promise<Buffer | null>;
  close(): void;
}

export interface DialOptions {
  connectTimeoutMs?: number;
  /** Aborting it gives up on a connect still in progress. */
  signal?: AbortSignal;
}

export type Dialer = (target: SocketAddress, opts?: DialOptions) => Promise<Transport>;

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/** Transport over a connected node:net socket (TCP or Unix domain). */
export class NetTransport implements Transport {
  private chunks: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(private readonly socket: Socket) {
    socket.on("data", (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.notify();
    });
    socket.on("end", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("close", () => {
      this.ended = true;
      this.notify();
    });
    socket.on("error", (err: Error) => {
      this.failure = err;
      this.notify();
    });
  }

  write(data: Uint8Array): Promise<number> {
    if (this.socket.destroyed || !this.socket.writable) return Promise.resolve(0);
    return new Promise((resolve) => {
      this.socket.write(data, (err) => resolve(err ? 0 : data.length));
    });
  }

  async read(timeoutMs: number): Promise<Buffer | null> {
    const ready = this.take();
    if (ready !== undefined) return ready;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, timeoutMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });

    return this.take() ?? null;
  }

  close(): void {
    this.socket.destroy();
    this.notify();
  }

  // Buffered data wins over end-of-stream so nothing received is dropped.
  private take(): Buffer | undefined {
    const chunk = this.chunks.shift();
    if (chunk) return chunk;
    if (this.failure) throw this.failure;
    if (this.ended) return Buffer.alloc(0);
    return undefined;
  }

  private notify(): void {
    this.wake?.();
  }
}

/** Open a node:net socket for the address and wrap it once connected. */
export const dialNet: Dialer = (target, opts = {}) => {
  const timeoutMs = opts.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

  const { signal } = opts;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const socket = target.kind === "tcp"
      ? connect({ host: target.host || undefined, port: target.port })
      : connect({ path: target.path });

    const fail = (err: unknown) => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.destroy();
      reject(err);
    };
    const onError = (err: Error) => fail(err);
    const onAbort = () => fail(signal?.reason);

    const timer = setTimeout(() => fail(new Error(`connect timed out after ${timeoutMs}ms`)), timeoutMs);

    signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.off("error", onError);
      resolve(new NetTransport(socket));
    });
  });
};
