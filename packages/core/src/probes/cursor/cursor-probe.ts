import type { UsageSnapshot } from "@usagebar/shared";
import { debug } from "../../utils/debug.js";
import { readJson, sendRequest, type HttpOptions } from "../http.js";
import { ProbeError } from "../probe-error.js";
import type { UsageProbe } from "../usage-probe.js";
import { cursorDatabasePath, cursorSessionCookie, readCursorAccessToken } from "./cursor-auth.js";
import { parseCursorUsageSummary } from "./cursor-usage-parser.js";

export const CURSOR_USAGE_SUMMARY_URL = "https://cursor.com/api/usage-summary";

export interface CursorProbeOptions {
  homeDir: string;
  /** Access token from the environment; skips the state database */
  accessToken: string | null;
  databasePath?: string;
  http?: HttpOptions;
}

export class CursorProbe implements UsageProbe {
  readonly id = "cursor" as const;
  private readonly options: CursorProbeOptions;

  constructor(options: CursorProbeOptions) {
    this.options = options;
  }

  private get databasePath(): string {
    return this.options.databasePath ?? cursorDatabasePath(this.options.homeDir);
  }

  async isAvailable(): Promise<boolean> {
    if (this.options.accessToken) return true;
    try {
      return readCursorAccessToken(this.databasePath) !== null;
    } catch (err) {
      debug("cursor", "state database unreadable:", err instanceof Error ? err.message : err);
      return false;
    }
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const accessToken = this.options.accessToken ?? readCursorAccessToken(this.databasePath);
    if (!accessToken) {
      console.error(`[Cursor] No access token found in ${this.databasePath} (not logged in?)`);
      throw ProbeError.of("authenticationRequired");
    }

    const response = await sendRequest(
      CURSOR_USAGE_SUMMARY_URL,
      {
        method: "GET",
        headers: { Cookie: cursorSessionCookie(accessToken), "Content-Type": "application/json" },
      },
      { ...this.options.http, signal: signal ?? this.options.http?.signal },
    );
    debug("cursor", `API response status ${response.status}`);

    switch (response.status) {
      case 200:
        break;
      case 401:
        console.error("[Cursor] Authentication failed (401), token may be expired");
        throw ProbeError.of("sessionExpired");
      case 403:
        console.error("[Cursor] Forbidden (403)");
        throw ProbeError.of("authenticationRequired");
      default:
        throw ProbeError.executionFailed(`HTTP ${response.status}`);
    }

    return parseCursorUsageSummary(await readJson(response));
  }
}
