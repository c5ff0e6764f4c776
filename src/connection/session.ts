/**
 * Scoped use of a connection.
 *
 * `withSession` connects on entry and always says `quit` on the way out,
 * whether the body returns, throws or is aborted. `Connection.close()`
 * never throws, so the reason the body left is what the caller sees.
 */

import { Connection, type ConnectionOptions } from "./connection.js";

export async function withSession<T>(
  address: string,
  body: (connection: Connection) => Promise<T>,
  opts: ConnectionOptions = {},
): Promise<T> {
  const connection = new Connection(address, opts);
  await connection.connect();
  try {
    return await body(connection);
  } finally {
    await connection.close();
  }
}
