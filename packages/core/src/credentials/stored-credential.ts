export type CredentialSource = "file" | "environment";

export interface StoredCredential {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date | null;
  /** Plan hint stored next to the token, e.g. "claude_max" */
  subscriptionType: string | null;
  source: CredentialSource;
}

export interface CredentialStore {
  load(): Promise<StoredCredential | null>;
  /** Writes refreshed tokens back to where they were loaded from */
  save(credential: StoredCredential): Promise<void>;
}

/** Tokens are refreshed this long before they actually expire */
export const REFRESH_WINDOW_MS = 5 * 60 * 1000;

export function isExpired(credential: StoredCredential, now: Date = new Date()): boolean {
  return credential.expiresAt !== null && credential.expiresAt.getTime() <= now.getTime();
}

/** Expired, about to expire, or of unknown age */
export function needsRefresh(credential: StoredCredential, now: Date = new Date()): boolean {
  if (!credential.expiresAt) return true;
  return credential.expiresAt.getTime() - now.getTime() < REFRESH_WINDOW_MS;
}
