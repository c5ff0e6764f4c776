#!/usr/bin/env node
/**
 * lsq — console for Liquidsoap's telnet / socket control interface.
 *
 * With no files it opens an interactive console; otherwise each file is
 * sent line by line, one connection per file, and the answers printed.
 */

import { C, Logger } from "./logger.js";
import { lsqError, asError, isLsqError, errorLogFields, type LsqError } from "./errors.js";
import { loadConfig, usage, type LsqConfig } from "./cli/config.js";
import { withSession } from "./connection/session.js";
import { InteractiveConsole } from "./console/console.js";
import { HistoryStore } from "./console/history.js";
import { runBatch } from "./console/batch.js";
import { LSQ_VERSION } from "./version.js";

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;
const EXIT_INTERRUPTED = 130;

function report(e: unknown): LsqError {
  const err = isLsqError(e) ? e : lsqError("protocol_error", asError(e).message, { cause: e });
  Logger.error(C.red(`✗ ${err.message}`));
  Logger.debug(errorLogFields(err));
  return err;
}

async function interactive(cfg: LsqConfig, signal: AbortSignal): Promise<number> {
  const history = new HistoryStore(cfg.historyPath);
  const outcome = await withSession(
    cfg.socket,
    (connection) => new InteractiveConsole(connection, { history, signal }).run(),
    { signal },
  );
  if (outcome === "interrupted") {
    Logger.info("Interrupted.");
    return EXIT_INTERRUPTED;
  }
  return EXIT_OK;
}

async function batch(cfg: LsqConfig, signal: AbortSignal): Promise<number> {
  await runBatch(cfg.socket, cfg.files, { signal });
  return EXIT_OK;
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  let cfg: LsqConfig;
  try {
    cfg = loadConfig(args);
  } catch (e: unknown) {
    report(e);
    Logger.error(usage());
    return EXIT_USAGE;
  }

  if (cfg.action === "help") { Logger.info(usage()); return EXIT_OK; }
  if (cfg.action === "version") { Logger.info(`lsq ${LSQ_VERSION}`); return EXIT_OK; }

  Logger.setVerbose(cfg.verbose);

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.on("SIGINT", onSigint);

  try {
    return cfg.files.length === 0
      ? await interactive(cfg, controller.signal)
      : await batch(cfg, controller.signal);
  } catch (e: unknown) {
    if (isLsqError(e) && e.kind === "aborted") {
      Logger.info("Interrupted.");
      return EXIT_INTERRUPTED;
    }
    report(e);
    return EXIT_FAILURE;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

main().then(
  (code) => process.exit(code),
  (e: unknown) => {
    Logger.error(C.red(`✗ Fatal: ${asError(e).message}`));
    process.exit(EXIT_FAILURE);
  },
);
