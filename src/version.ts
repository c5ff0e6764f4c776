/**
 * The lsq version, read from package.json so the two never disagree.
 */
import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

export const PACKAGE_NAME = "liquidsoap-console";

function readVersion(): string {
  const selfDir = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(selfDir, "..", "package.json"),        // from src/
    join(selfDir, "..", "..", "package.json"),  // from dist/src/
  ];
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    let pkg: unknown;
    try {
      pkg = JSON.parse(readFileSync(p, "utf-8"));
    } catch {
      continue; // not ours, try the next one
    }
    if (
      typeof pkg === "object" && pkg !== null
      && "name" in pkg && pkg.name === PACKAGE_NAME
      && "version" in pkg && typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
  }
  return "unknown";
}

export const LSQ_VERSION = readVersion();
