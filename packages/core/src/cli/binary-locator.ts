/**
 * Resolves CLI binaries the way the user's own terminal would.
 *
 * GUI launchers and services start with a minimal PATH, so both lookups go
 * through the login shell instead of the current process environment.
 */

import { execFile } from "node:child_process";
import { debug } from "../utils/debug.js";

export type ShellRunner = (shell: string, args: string[], timeoutMs: number) => Promise<string>;

const SAFE_BINARY_RE = /^[A-Za-z0-9._+-]+$/;
const LOOKUP_TIMEOUT_MS = 5_000;

export const runShell: ShellRunner = (shell, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(shell, args, { encoding: "utf-8", timeout: timeoutMs }, (err, stdout) => {
      if (err) reject(err);
      else resolve(stdout);
    });
  });

export interface BinaryLocatorOptions {
  /** Defaults to $SHELL, then /bin/zsh */
  shell?: string;
  run?: ShellRunner;
}

export class BinaryLocator {
  private readonly shell: string;
  private readonly run: ShellRunner;
  private pathPromise: Promise<string | null> | null = null;

  constructor(options: BinaryLocatorOptions = {}) {
    this.shell = options.shell ?? process.env.SHELL ?? "/bin/zsh";
    this.run = options.run ?? runShell;
  }

  /** Absolute path of `binary` on the login-shell PATH, or null */
  async locate(binary: string): Promise<string | null> {
    if (!SAFE_BINARY_RE.test(binary)) {
      debug("locator", `refusing to look up "${binary}"`);
      return null;
    }
    try {
      const stdout = await this.run(this.shell, ["-l", "-c", `which ${binary}`], LOOKUP_TIMEOUT_MS);
      // Login shells may print banners first; the path is the last absolute line
      const candidates = stdout
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.startsWith("/"));
      return candidates.at(-1) ?? null;
    } catch (err) {
      debug("locator", `which ${binary} failed:`, err instanceof Error ? err.message : err);
      return null;
    }
  }

  /** PATH as the login shell sees it, cached for the locator's lifetime */
  shellPath(): Promise<string | null> {
    if (!this.pathPromise) {
      this.pathPromise = this.run(this.shell, ["-l", "-c", 'printf "%s" "$PATH"'], LOOKUP_TIMEOUT_MS)
        .then((stdout) => {
          const lines = stdout.trim().split("\n");
          return lines[lines.length - 1]?.trim() || null;
        })
        .catch((err: unknown) => {
          debug("locator", "login shell PATH lookup failed:", err instanceof Error ? err.message : err);
          return null;
        });
    }
    return this.pathPromise;
  }
}
