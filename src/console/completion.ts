/**
 * Command-name completion from the server's own `help` listing.
 *
 * Liquidsoap lists its commands one per line as `| name [args]`, so the
 * completion for a prefix is every listed name that starts with it.
 */

import type { CommandChannel } from "../connection/connection.js";
import { sendWithRetry } from "../utils/connection-recovery.js";

/** Commands the console handles itself. */
export const META_COMMANDS = ["exit", "help", "quit"] as const;

export function parseCommandNames(helpText: string, prefix: string): string[] {
  const names: string[] = [];
  for (const line of helpText.split("\n")) {
    if (!line.startsWith(`| ${prefix}`)) continue;
    const name = line.trim().split(/\s+/)[1];
    if (name) names.push(name);
  }
  return names;
}

export async function completeCommand(
  channel: CommandChannel,
  prefix: string,
  opts: { signal?: AbortSignal } = {},
): Promise<string[]> {
  const local = META_COMMANDS.filter((name) => name.startsWith(prefix));
  const help = await sendWithRetry(channel, "help", opts);
  return [...new Set([...local, ...parseCommandNames(help, prefix)])];
}
