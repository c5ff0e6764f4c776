/**
 * Persisted console history.
 *
 * Lines are kept newest-first in memory (readline's order) and written
 * oldest-first, one per line. A missing file is an empty history; an
 * unreadable or unwritable one is a warning, never an error.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { homedir } from "node:os";
import { Logger } from "../logger.js";
import { asError } from "../errors.js";

export const DEFAULT_HISTORY_PATH = join(homedir(), ".liquidsoap_history");
export const HISTORY_LIMIT = 1000;

export class HistoryStore {
  constructor(
    readonly path: string | null,
    readonly limit = HISTORY_LIMIT,
  ) {}

  load(): string[] {
    if (!this.path || !existsSync(this.path)) return [];
    try {
      const lines = readFileSync(this.path, "utf-8")
        .split("\n")
        .map((l) => l.replace(/\r$/, ""))
        .filter((l) => l.trim() !== "");
      return lines.slice(-this.limit).reverse();
    } catch (e: unknown) {
      Logger.warn(`Failed to read history ${this.path}: ${asError(e).message}`);
      return [];
    }
  }

  save(entries: readonly string[]): void {
    if (!this.path) return;
    const lines = entries.slice(0, this.limit).reverse();
    try {
      mkdirSync(dirname(this.path), { recursive: true });
      writeFileSync(this.path, lines.map((l) => `${l}\n`).join(""), "utf-8");
    } catch (e: unknown) {
      Logger.warn(`Failed to save history ${this.path}: ${asError(e).message}`);
    }
  }
}
