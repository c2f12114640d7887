/**
 * Claude Code OAuth credentials.
 *
 * The CLI keeps them in ~/.claude/.credentials.json under `claudeAiOauth`.
 * A long-lived setup token in CLAUDE_CODE_OAUTH_TOKEN is used when the file
 * has nothing usable; it cannot be refreshed.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { debug } from "../utils/debug.js";
import type { CredentialStore, StoredCredential } from "./stored-credential.js";

export const CLAUDE_SETUP_TOKEN_ENV = "CLAUDE_CODE_OAUTH_TOKEN";

const oauthBlockSchema = z.object({
  accessToken: z.string().trim().min(1),
  refreshToken: z.string().min(1).nullish(),
  expiresAt: z.number().nullish(),
  subscriptionType: z.string().nullish(),
});

const credentialsFileSchema = z
  .object({ claudeAiOauth: oauthBlockSchema })
  .passthrough();

export class ClaudeCredentialStore implements CredentialStore {
  readonly path: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: { homeDir: string; env?: NodeJS.ProcessEnv }) {
    this.path = join(options.homeDir, ".claude", ".credentials.json");
    this.env = options.env ?? process.env;
  }

  async load(): Promise<StoredCredential | null> {
    return this.loadFromFile() ?? this.loadFromEnvironment();
  }

  async save(credential: StoredCredential): Promise<void> {
    if (credential.source === "environment") {
      debug("claude-credentials", "environment token, nothing to save");
      return;
    }

    // Merge into the existing file so fields we don't model survive
    let existing: Record<string, unknown> = {};
    if (existsSync(this.path)) {
      const parsed: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      if (isRecord(parsed)) existing = parsed;
    }
    const previous = isRecord(existing.claudeAiOauth) ? existing.claudeAiOauth : {};

    existing.claudeAiOauth = {
      ...previous,
      accessToken: credential.accessToken,
      refreshToken: credential.refreshToken,
      expiresAt: credential.expiresAt ? credential.expiresAt.getTime() : null,
      ...(credential.subscriptionType ? { subscriptionType: credential.subscriptionType } : {}),
    };
    writeFileSync(this.path, JSON.stringify(existing, null, 2), { mode: 0o600 });
    console.log("[Claude Credentials] Saved refreshed token");
  }

  private loadFromFile(): StoredCredential | null {
    if (!existsSync(this.path)) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (err) {
      console.warn(`[Claude Credentials] Ignoring malformed ${this.path}:`, err instanceof Error ? err.message : err);
      return null;
    }

    const result = credentialsFileSchema.safeParse(raw);
    if (!result.success) {
      debug("claude-credentials", "no usable claudeAiOauth block");
      return null;
    }
    const oauth = result.data.claudeAiOauth;
    return {
      accessToken: oauth.accessToken,
      refreshToken: oauth.refreshToken ?? null,
      expiresAt: oauth.expiresAt ? new Date(oauth.expiresAt) : null,
      subscriptionType: oauth.subscriptionType ?? null,
      source: "file",
    };
  }

  private loadFromEnvironment(): StoredCredential | null {
    const token = this.env[CLAUDE_SETUP_TOKEN_ENV]?.trim();
    if (!token) return null;
    return {
      accessToken: token,
      refreshToken: null,
      expiresAt: null,
      subscriptionType: null,
      source: "environment",
    };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
