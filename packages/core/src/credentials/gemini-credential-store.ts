import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { isRecord } from "./claude-credential-store.js";
import type { CredentialStore, StoredCredential } from "./stored-credential.js";

const oauthCredsSchema = z
  .object({
    access_token: z.string().trim().min(1),
    refresh_token: z.string().min(1).nullish(),
    expiry_date: z.number().nullish(),
  })
  .passthrough();

/** Gemini CLI OAuth tokens in ~/.gemini/oauth_creds.json */
export class GeminiCredentialStore implements CredentialStore {
  readonly path: string;

  constructor(options: { homeDir: string }) {
    this.path = join(options.homeDir, ".gemini", "oauth_creds.json");
  }

  async load(): Promise<StoredCredential | null> {
    if (!existsSync(this.path)) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (err) {
      console.warn(`[Gemini Credentials] Ignoring malformed ${this.path}:`, err instanceof Error ? err.message : err);
      return null;
    }
    const result = oauthCredsSchema.safeParse(raw);
    if (!result.success) return null;
    return {
      accessToken: result.data.access_token,
      refreshToken: result.data.refresh_token ?? null,
      expiresAt: result.data.expiry_date ? new Date(result.data.expiry_date) : null,
      subscriptionType: null,
      source: "file",
    };
  }

  async save(credential: StoredCredential): Promise<void> {
    let existing: Record<string, unknown> = {};
    if (existsSync(this.path)) {
      const parsed: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
      if (isRecord(parsed)) existing = parsed;
    }
    const next = {
      ...existing,
      access_token: credential.accessToken,
      refresh_token: credential.refreshToken,
      expiry_date: credential.expiresAt ? credential.expiresAt.getTime() : null,
    };
    writeFileSync(this.path, JSON.stringify(next, null, 2), { mode: 0o600 });
  }
}
