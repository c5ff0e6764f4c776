/**
 * Socket address selection.
 *
 * `host:port` selects TCP, anything without a colon is a local (Unix
 * domain) socket path. The split happens at the first colon, so a bare
 * IPv6 literal such as `::1` has an empty host and fails on its port.
 */

import { lsqError } from "../errors.js";

export type SocketAddress =
  | { kind: "tcp"; host: string; port: number }
  | { kind: "ipc"; path: string };

export const DEFAULT_ADDRESS = "localhost:1234";

export function parseAddress(addr: string): SocketAddress {
  const colon = addr.indexOf(":");
  if (colon === -1) return { kind: "ipc", path: addr };

  const host = addr.slice(0, colon);
  const rawPort = addr.slice(colon + 1).trim();
  const port = /^\d+$/.test(rawPort) ? parseInt(rawPort, 10) : NaN;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw lsqError("connection_error", `Invalid port in socket address "${addr}"`, { address: addr });
  }
  return { kind: "tcp", host, port };
}

export function formatAddress(addr: SocketAddress): string {
  return addr.kind === "tcp" ? `${addr.host}:${addr.port}` : addr.path;
}
