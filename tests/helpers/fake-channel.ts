/**
 * A CommandChannel that answers from a function, for console-level tests.
 */

import type { CommandChannel, SendOptions } from "../../src/connection/connection.js";

export type Answer = (command: string, signal?: AbortSignal) => Promise<string>;

export class FakeChannel implements CommandChannel {
  readonly sent: string[] = [];

  constructor(private readonly answer: Answer) {}

  send(command: string, _marker?: Uint8Array, opts: SendOptions = {}): Promise<string> {
    this.sent.push(command);
    return this.answer(command, opts.signal);
  }
}
