/**
 * Interactive console: read a line, send it, print the answer.
 *
 * A handful of words are handled locally (see `dispatchLine`); everything
 * else goes to the server as typed. On a terminal the console also offers
 * tab completion from the server's `help` listing and keeps a history file.
 */

import * as readline from "node:readline";
import { ReadStream } from "node:tty";
import { C, Logger } from "../logger.js";
import { lsqError, asError, isLsqError, errorLogFields } from "../errors.js";
import type { CommandChannel } from "../connection/connection.js";
import { sendWithRetry } from "../utils/connection-recovery.js";
import { completeCommand } from "./completion.js";
import { HISTORY_LIMIT, type HistoryStore } from "./history.js";

export const PROMPT = `${C.boldYellow(">")} `;
export const INTRO = C.yellow("Interactive Liquidsoap console, type '?' for help.");

export type ConsoleAction =
  | { type: "noop" }
  | { type: "exit" }
  | { type: "send"; command: string };

export type ConsoleOutcome = "exit" | "eof" | "interrupted";

export interface ConsoleOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Line editing, completion and history. Defaults to whether input is a TTY. */
  terminal?: boolean;
  history?: HistoryStore;
  /** Aborting it interrupts the console like Ctrl+C. */
  signal?: AbortSignal;
}

/** Decide what a console line means. Meta-commands are checked first. */
export function dispatchLine(line: string): ConsoleAction {
  const input = line.trim();
  if (!input) return { type: "noop" };
  if (input.startsWith("?")) {
    return { type: "send", command: `help ${input.slice(1).trim()}`.trim() };
  }
  const word = input.split(/\s+/, 1)[0];
  if (word === "exit" || word === "quit") return { type: "exit" };
  if (word === "help") {
    return { type: "send", command: `help ${input.slice(word.length).trim()}`.trim() };
  }
  return { type: "send", command: input };
}

export function isLineEditingAvailable(input: NodeJS.ReadableStream): boolean {
  return input instanceof ReadStream && input.isTTY;
}

export class InteractiveConsole {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(
    private readonly channel: CommandChannel,
    private readonly opts: ConsoleOptions = {},
  ) {
    this.input = opts.input ?? process.stdin;
    this.output = opts.output ?? process.stdout;
  }

  async run(): Promise<ConsoleOutcome> {
    const terminal = this.opts.terminal ?? isLineEditingAvailable(this.input);
    const history = terminal ? this.opts.history : undefined;
    const interrupt = new AbortController();
    let entries = history?.load() ?? [];

    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal,
      prompt: PROMPT,
      history: [...entries],
      historySize: history?.limit ?? HISTORY_LIMIT,
      completer: terminal ? this.completer : undefined,
    });

    let closed = false;
    rl.on("close", () => { closed = true; });
    rl.on("history", (h: string[]) => { entries = h; });

    const stop = () => {
      interrupt.abort();
      if (!closed) rl.close();
    };
    rl.on("SIGINT", stop);
    const external = this.opts.signal;
    if (external?.aborted) stop();
    else external?.addEventListener("abort", stop, { once: true });

    this.output.write(`${INTRO}\n`);

    let outcome: ConsoleOutcome = "eof";
    try {
      // A closed interface never ends its line iterator.
      if (!closed) {
        if (terminal) rl.prompt();
        for await (const line of rl) {
          if (!(await this.handle(line, interrupt.signal))) {
            outcome = "exit";
            break;
          }
          if (terminal && !closed) rl.prompt();
        }
      }
    } finally {
      external?.removeEventListener("abort", stop);
      if (!closed) rl.close();
      history?.save(entries);
    }

    if (interrupt.signal.aborted) return "interrupted";
    if (outcome === "eof") this.output.write("\n");
    return outcome;
  }

  /** Handle one line. Returns false when the console should stop. */
  async handle(line: string, signal?: AbortSignal): Promise<boolean> {
    const action = dispatchLine(line);
    if (action.type === "noop") return true;
    if (action.type === "exit") return false;

    try {
      const response = await sendWithRetry(this.channel, action.command, { signal });
      this.output.write(`${response}\n`);
    } catch (e: unknown) {
      if (isLsqError(e) && e.kind === "aborted") return false;
      const err = isLsqError(e)
        ? e
        : lsqError("protocol_error", asError(e).message, { command: action.command, cause: e });
      Logger.error(C.red(`error: ${err.message}`));
      Logger.debug(errorLogFields(err));
    }
    return true;
  }

  // Only the command word is completed.
  private readonly completer: readline.AsyncCompleter = (line, callback) => {
    if (/\s/.test(line)) {
      callback(null, [[], line]);
      return;
    }
    completeCommand(this.channel, line).then(
      (names) => callback(null, [names, line]),
      (e: unknown) => {
        Logger.debug(`[lsq] completion failed: ${asError(e).message}`);
        callback(null, [[], line]);
      },
    );
  };
}
