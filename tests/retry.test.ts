/**
 * Tests for connection recovery.
 *
 * Covers: withConnectionRecovery, sendWithRetry
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { withConnectionRecovery, sendWithRetry } from "../src/utils/connection-recovery.js";
import { Connection } from "../src/connection/connection.js";
import { lsqError, isLsqError } from "../src/errors.js";
import { ScriptedTransport, scriptedDialer } from "./helpers/scripted-transport.js";
import { startFakeLiquidsoap, reply, type FakeLiquidsoap } from "./helpers/fake-liquidsoap.js";

describe("withConnectionRecovery", () => {
  test("returns the first result without retrying", async () => {
    let calls = 0;
    const result = await withConnectionRecovery(async () => { calls++; return "ok"; });
    assert.strictEqual(result, "ok");
    assert.strictEqual(calls, 1);
  });

  test("retries once after connection_lost", async () => {
    let calls = 0;
    const retries: number[] = [];
    const result = await withConnectionRecovery(async () => {
      calls++;
      if (calls === 1) throw lsqError("connection_lost", "gone");
      return "recovered";
    }, { onRetry: (attempt) => retries.push(attempt) });
    assert.strictEqual(result, "recovered");
    assert.strictEqual(calls, 2);
    assert.deepStrictEqual(retries, [1]);
  });

  test("a second consecutive loss propagates", async () => {
    let calls = 0;
    await assert.rejects(
      () => withConnectionRecovery(async () => { calls++; throw lsqError("connection_lost", `gone ${calls}`); }),
      (err: unknown) => isLsqError(err) && err.message === "gone 2",
    );
    assert.strictEqual(calls, 2);
  });

  test("other errors are not retried", async () => {
    let calls = 0;
    await assert.rejects(
      () => withConnectionRecovery(async () => { calls++; throw lsqError("connection_error", "refused"); }),
      (err: unknown) => isLsqError(err) && err.kind === "connection_error",
    );
    assert.strictEqual(calls, 1);
  });

  test("the retryable flag decides, not the kind", async () => {
    let lostCalls = 0;
    await assert.rejects(
      () => withConnectionRecovery(async () => {
        lostCalls++;
        throw lsqError("connection_lost", "gone", { retryable: false });
      }),
      (err: unknown) => isLsqError(err) && err.kind === "connection_lost",
    );
    assert.strictEqual(lostCalls, 1);

    let oddCalls = 0;
    const result = await withConnectionRecovery(async () => {
      oddCalls++;
      if (oddCalls === 1) throw lsqError("protocol_error", "odd", { retryable: true });
      return "second try";
    });
    assert.strictEqual(result, "second try");
    assert.strictEqual(oddCalls, 2);
  });

  test("an aborted signal stops the retry", async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;
    await assert.rejects(
      () => withConnectionRecovery(async () => { calls++; throw lsqError("connection_lost", "gone"); }, { signal: controller.signal }),
    );
    assert.strictEqual(calls, 1);
  });
});

describe("sendWithRetry", () => {
  test("resends the same command on a fresh connection", async () => {
    const dead = new ScriptedTransport({ deadWrites: true });
    const fresh = new ScriptedTransport({ reads: ["Liquidsoap 2.2.0\r\nEND\r\n"] });
    const dial = scriptedDialer([dead, fresh]);
    const conn = new Connection("localhost:1234", { dial });

    assert.strictEqual(await sendWithRetry(conn, "version"), "Liquidsoap 2.2.0");
    assert.strictEqual(fresh.written, "version\n");
    assert.strictEqual(dial.targets.length, 2);
  });

  test("gives up after the second loss", async () => {
    const dial = scriptedDialer([
      new ScriptedTransport({ deadWrites: true }),
      new ScriptedTransport({ reads: ["eof"] }),
      new ScriptedTransport({ reads: ["never\r\nEND\r\n"] }),
    ]);
    const conn = new Connection("localhost:1234", { dial });
    await assert.rejects(
      () => sendWithRetry(conn, "version"),
      (err: unknown) => isLsqError(err) && err.kind === "connection_lost",
    );
    assert.strictEqual(dial.targets.length, 2);
  });

  test("recovers from an idle hang-up by the server", async () => {
    // Answer, then hang up as Liquidsoap does with idle clients.
    const srv: FakeLiquidsoap = await startFakeLiquidsoap((cmd, socket) => {
      socket.end(reply(`${cmd} on link ${srv.connectionCount()}`));
      return undefined;
    });
    const conn = new Connection(srv.address);
    try {
      assert.strictEqual(await sendWithRetry(conn, "uptime"), "uptime on link 1");
      assert.strictEqual(await sendWithRetry(conn, "uptime"), "uptime on link 2");
      assert.strictEqual(srv.connectionCount(), 2);
      await conn.close();
    } finally {
      await srv.close();
    }
  });
});
