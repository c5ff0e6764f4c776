/**
 * Batch mode: run the commands of one or more files, one session per file.
 *
 * Unlike the interactive console there is no resend on a dropped
 * connection: losing the link ends the batch with the error.
 */

import { createReadStream } from "node:fs";
import { access, stat } from "node:fs/promises";
import { constants } from "node:fs";
import { createInterface } from "node:readline";
import { lsqError, asError } from "../errors.js";
import { Logger } from "../logger.js";
import { withSession } from "../connection/session.js";
import type { ConnectionOptions } from "../connection/connection.js";

export interface BatchOptions extends ConnectionOptions {
  output?: NodeJS.WritableStream;
}

/** The lines of a command file, in order. `-` reads standard input. */
export async function* fileCommands(path: string): AsyncGenerator<string> {
  const rl = createInterface({
    input: path === "-" ? process.stdin : createReadStream(path, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });
  try {
    for await (const line of rl) yield line;
  } finally {
    rl.close();
  }
}

export async function runBatch(address: string, files: readonly string[], opts: BatchOptions = {}): Promise<void> {
  const { output = process.stdout, ...connectionOpts } = opts;

  for (const file of files) {
    if (file === "-") continue;
    let isFile: boolean;
    try {
      isFile = (await stat(file)).isFile();
      await access(file, constants.R_OK);
    } catch (e: unknown) {
      throw lsqError("config_error", `Cannot read command file ${file}: ${asError(e).message}`, { cause: e });
    }
    if (!isFile) throw lsqError("config_error", `Command file ${file} is not a regular file`);
  }

  for (const file of files) {
    Logger.debug(`[lsq] running ${file} against ${address}`);
    await withSession(address, async (connection) => {
      for await (const line of fileCommands(file)) {
        if (!line.trim()) continue;
        const response = await connection.send(line);
        output.write(`${response}\n`);
      }
    }, connectionOpts);
  }
}
