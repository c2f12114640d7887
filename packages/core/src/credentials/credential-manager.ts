/**
 * Credential lifecycle for API probes: load, refresh when stale, persist,
 * and retry a rejected request exactly once with the new token.
 */

import { ProbeError } from "../probes/probe-error.js";
import { debug } from "../utils/debug.js";
import {
  isExpired,
  needsRefresh,
  type CredentialStore,
  type StoredCredential,
} from "./stored-credential.js";

export interface RefreshedTokens {
  accessToken: string;
  /** Null keeps the current refresh token */
  refreshToken: string | null;
  expiresAt: Date | null;
}

export type TokenRefresher = (refreshToken: string) => Promise<RefreshedTokens>;

/** The token endpoint rejected the refresh token itself */
export class InvalidGrantError extends Error {
  constructor(detail: string) {
    super(`Refresh token rejected: ${detail}`);
    this.name = "InvalidGrantError";
  }
}

export interface CredentialManagerOptions {
  label: string;
  store: CredentialStore;
  /** Null when the provider's tokens cannot be refreshed by us */
  refresher: TokenRefresher | null;
  now?: () => Date;
}

function isAuthFailure(status: number): boolean {
  return status === 401 || status === 403;
}

export class CredentialManager {
  private readonly label: string;
  private readonly store: CredentialStore;
  private readonly refresher: TokenRefresher | null;
  private readonly now: () => Date;
  /** In-flight refresh shared by concurrent callers */
  private refreshPromise: Promise<StoredCredential> | null = null;

  constructor(options: CredentialManagerOptions) {
    this.label = options.label;
    this.store = options.store;
    this.refresher = options.refresher;
    this.now = options.now ?? (() => new Date());
  }

  async loadCredential(): Promise<StoredCredential> {
    const credential = await this.store.load();
    if (!credential) {
      debug(this.label, "no stored credential");
      throw ProbeError.of("authenticationRequired");
    }
    return credential;
  }

  /**
   * Sends the request built by `send` with a valid access token.
   *
   * Stale tokens are refreshed first. A 401/403 on the first attempt triggers
   * one refresh and one retry; anything the retry returns is handed back
   * unless it is another auth failure.
   */
  async authorizedRequest(send: (accessToken: string) => Promise<Response>): Promise<Response> {
    let credential = await this.loadCredential();
    let refreshed = false;

    if (this.canRefresh(credential) && needsRefresh(credential, this.now())) {
      debug(this.label, "token stale, refreshing before request");
      credential = await this.refresh(credential);
      refreshed = true;
    } else if (credential.source === "file" && isExpired(credential, this.now())) {
      throw ProbeError.of(this.refresher ? "sessionExpired" : "authenticationRequired");
    }

    const first = await send(credential.accessToken);
    if (!isAuthFailure(first.status)) return first;

    if (credential.source === "environment") {
      console.warn(`[${this.label}] Setup token rejected (HTTP ${first.status})`);
      throw ProbeError.of("authenticationRequired");
    }
    if (!this.refresher) throw ProbeError.of("authenticationRequired");
    if (refreshed || !credential.refreshToken) throw ProbeError.of("sessionExpired");

    console.log(`[${this.label}] Access token rejected (HTTP ${first.status}), refreshing`);
    credential = await this.refresh(credential);

    const retry = await send(credential.accessToken);
    if (isAuthFailure(retry.status)) {
      console.warn(`[${this.label}] Refreshed token rejected (HTTP ${retry.status})`);
      throw ProbeError.of("sessionExpired");
    }
    return retry;
  }

  private canRefresh(credential: StoredCredential): boolean {
    return credential.source === "file" && credential.refreshToken !== null && this.refresher !== null;
  }

  private refresh(credential: StoredCredential): Promise<StoredCredential> {
    if (this.refreshPromise) return this.refreshPromise;
    this.refreshPromise = this.performRefresh(credential).finally(() => {
      this.refreshPromise = null;
    });
    return this.refreshPromise;
  }

  private async performRefresh(credential: StoredCredential): Promise<StoredCredential> {
    const refreshToken = credential.refreshToken;
    if (!refreshToken || !this.refresher) throw ProbeError.of("sessionExpired");

    let tokens: RefreshedTokens;
    try {
      tokens = await this.refresher(refreshToken);
    } catch (err) {
      if (err instanceof InvalidGrantError) {
        console.warn(`[${this.label}] ${err.message}`);
        throw ProbeError.of("sessionExpired");
      }
      throw err instanceof ProbeError
        ? err
        : ProbeError.executionFailed(`Token refresh failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    const updated: StoredCredential = {
      ...credential,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken ?? refreshToken,
      expiresAt: tokens.expiresAt,
    };
    await this.store.save(updated);
    console.log(`[${this.label}] Token refreshed`);
    return updated;
  }
}
