/**
 * Tests for scoped session use (withSession).
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { withSession } from "../src/connection/session.js";
import { isLsqError } from "../src/errors.js";
import { ScriptedTransport, scriptedDialer } from "./helpers/scripted-transport.js";
import { startFakeLiquidsoap, reply } from "./helpers/fake-liquidsoap.js";

describe("withSession", () => {
  test("connects on entry, returns the body's result and quits on exit", async () => {
    const t = new ScriptedTransport({ reads: ["2.2.0\r\nEND\r\n", "Bye!\r\n"] });
    const dial = scriptedDialer([t]);
    let connectedInside = false;

    const result = await withSession("localhost:1234", async (conn) => {
      connectedInside = conn.connected;
      return conn.send("version");
    }, { dial });

    assert.strictEqual(result, "2.2.0");
    assert.strictEqual(connectedInside, true);
    assert.strictEqual(t.written, "version\nquit\n");
    assert.strictEqual(t.closed, true);
  });

  test("quits once when the body throws, and rethrows the body's error", async () => {
    const t = new ScriptedTransport({ reads: ["Bye!\r\n"] });
    await assert.rejects(
      () => withSession("localhost:1234", async () => { throw new Error("boom"); }, { dial: scriptedDialer([t]) }),
      /boom/,
    );
    assert.strictEqual(t.written, "quit\n");
    assert.strictEqual(t.closed, true);
  });

  test("a failing quit does not mask the body's error", async () => {
    const t = new ScriptedTransport({ deadWrites: true });
    await assert.rejects(
      () => withSession("localhost:1234", async () => { throw new Error("boom"); }, { dial: scriptedDialer([t]) }),
      (err: unknown) => err instanceof Error && err.message === "boom",
    );
    assert.strictEqual(t.closed, true);
  });

  test("an initial connect failure surfaces before the body runs", async () => {
    let ran = false;
    await assert.rejects(
      () => withSession("localhost:1234", async () => { ran = true; }, { dial: scriptedDialer([]) }),
      (err: unknown) => isLsqError(err) && err.kind === "connection_error",
    );
    assert.strictEqual(ran, false);
  });

  test("a link lost inside the body leaves nothing to quit", async () => {
    const t = new ScriptedTransport({ reads: ["eof"] });
    await assert.rejects(
      () => withSession("localhost:1234", (conn) => conn.send("version"), { dial: scriptedDialer([t]) }),
      (err: unknown) => isLsqError(err) && err.kind === "connection_lost",
    );
    assert.strictEqual(t.written, "version\n");
  });

  test("runs a block of commands against a real socket", async () => {
    const srv = await startFakeLiquidsoap((cmd) => reply(`> ${cmd}`));
    try {
      const answers = await withSession(srv.address, async (conn) => [
        await conn.send("request.all"),
        await conn.send("uptime"),
      ]);
      assert.deepStrictEqual(answers, ["> request.all", "> uptime"]);
      assert.deepStrictEqual(srv.received, ["request.all", "uptime", "quit"]);
      assert.strictEqual(srv.connectionCount(), 1);
    } finally {
      await srv.close();
    }
  });
});
