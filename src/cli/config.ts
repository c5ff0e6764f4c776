/**
 * CLI argument parsing, configuration loading, and help text.
 */

import { Logger } from "../logger.js";
import { lsqError } from "../errors.js";
import { DEFAULT_ADDRESS } from "../connection/address.js";
import { DEFAULT_HISTORY_PATH } from "../console/history.js";
import { LSQ_VERSION } from "../version.js";

export interface LsqConfig {
  action: "run" | "help" | "version";
  /** `host:port` or a Unix domain socket path. */
  socket: string;
  /** Command files; none means interactive mode. */
  files: string[];
  /** null disables history persistence. */
  historyPath: string | null;
  verbose: boolean;
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || (value.startsWith("-") && value !== "-")) {
    throw lsqError("config_error", `${flag} requires a value`);
  }
  return value;
}

export function loadConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): LsqConfig {
  const flags: Record<string, string> = {};
  const files: string[] = [];
  let action: LsqConfig["action"] = "run";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-s" || arg === "--socket") { flags.socket = takeValue(args, i++, arg); }
    else if (arg === "--history") { flags.history = takeValue(args, i++, arg); }
    else if (arg === "--no-history") { flags.noHistory = "true"; }
    else if (arg === "--verbose" || arg === "-v") { flags.verbose = "true"; }
    else if (arg === "-V" || arg === "--version") { action = "version"; }
    else if (arg === "-h" || arg === "--help") { action = "help"; }
    else if (!arg.startsWith("-") || arg === "-") { files.push(arg); }
    else { Logger.warn(`Unknown flag: ${arg}`); }
  }

  return {
    action,
    socket: flags.socket || env.LSQ_SOCKET || DEFAULT_ADDRESS,
    files,
    historyPath: flags.noHistory === "true" ? null : (flags.history || env.LSQ_HISTORY || DEFAULT_HISTORY_PATH),
    verbose: flags.verbose === "true",
  };
}

export function usage(): string {
  return `lsq ${LSQ_VERSION} — console for the Liquidsoap telnet / socket interface

usage: lsq [options] [file ...]

Without files, starts an interactive console. Each file is run as a
batch of commands, one per line, over its own connection.

options:
  -s, --socket <addr>   host:port or Unix domain socket path
                        (default: $LSQ_SOCKET or ${DEFAULT_ADDRESS})
  --history <path>      console history file (default: ${DEFAULT_HISTORY_PATH})
  --no-history          do not load or save console history
  -v, --verbose         debug logging (with LSQ_LOG_LEVEL=DEBUG)
  -V, --version         print version and exit
  -h, --help            show this help
`;
}
