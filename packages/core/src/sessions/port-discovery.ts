import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { debug } from "../utils/debug.js";

/** Port the hook listener binds to unless told otherwise */
export const DEFAULT_HOOK_PORT = 19847;

/**
 * `~/.claude/usagebar-hook-port` holds the listener's port as one integer.
 * The listener writes it; hook scripts read it to know where to post.
 */
export function portFilePath(homeDir: string): string {
  return join(homeDir, ".claude", "usagebar-hook-port");
}

export function writePort(homeDir: string, port: number): void {
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${port}`);
  }
  const path = portFilePath(homeDir);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, String(port), "utf-8");
}

/** The recorded port, or null when the file is missing or not an integer */
export function readPort(homeDir: string): number | null {
  let content: string;
  try {
    content = readFileSync(portFilePath(homeDir), "utf-8");
  } catch (err) {
    debug("hooks", "no port file:", err instanceof Error ? err.message : err);
    return null;
  }
  const trimmed = content.trim();
  return /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/** Best effort; a file that cannot be removed is only logged */
export function removePortFile(homeDir: string): void {
  try {
    rmSync(portFilePath(homeDir), { force: true });
  } catch (err) {
    debug("hooks", "failed to remove port file:", err instanceof Error ? err.message : err);
  }
}
