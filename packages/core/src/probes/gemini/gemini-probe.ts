/**
 * Gemini quotas from the Code Assist quota endpoint using the Gemini CLI's
 * OAuth tokens, with the CLI's `/stats` screen as a fallback.
 */

import type { UsageSnapshot } from "@usagebar/shared";
import type { CliExecutor } from "../../cli/pty-executor.js";
import type { CredentialManager } from "../../credentials/credential-manager.js";
import type { CredentialStore } from "../../credentials/stored-credential.js";
import { debug } from "../../utils/debug.js";
import { renderTerminal } from "../../utils/terminal.js";
import { httpFailure, readJson, sendRequest, type HttpOptions } from "../http.js";
import { toProbeError } from "../probe-error.js";
import { classifyRunError, type UsageProbe } from "../usage-probe.js";
import { parseGeminiQuota, pickQuotaProject } from "./gemini-quota.js";
import { parseGeminiStats } from "./gemini-stats-parser.js";

export const GEMINI_QUOTA_URL = "https://cloudcode-pa.googleapis.com/v1internal:retrieveUserQuota";
export const GEMINI_PROJECTS_URL = "https://cloudresourcemanager.googleapis.com/v1/projects";

export interface GeminiProbeOptions {
  store: CredentialStore;
  credentials: CredentialManager;
  executor: CliExecutor;
  http?: HttpOptions;
  timeoutMs?: number;
}

export class GeminiProbe implements UsageProbe {
  readonly id = "gemini" as const;
  private readonly options: GeminiProbeOptions;

  constructor(options: GeminiProbeOptions) {
    this.options = options;
  }

  async isAvailable(): Promise<boolean> {
    if ((await this.options.store.load()) !== null) return true;
    return (await this.options.executor.locate("gemini")) !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    if ((await this.options.store.load()) === null) return this.probeCli(signal);
    try {
      return await this.probeApi(signal);
    } catch (err) {
      if (signal?.aborted || (await this.options.executor.locate("gemini")) === null) throw toProbeError(err);
      console.warn("[Gemini] API probe failed, falling back to CLI:", err instanceof Error ? err.message : err);
      return this.probeCli(signal);
    }
  }

  async probeApi(signal?: AbortSignal): Promise<UsageSnapshot> {
    const http = { ...this.options.http, signal: signal ?? this.options.http?.signal };
    const response = await this.options.credentials.authorizedRequest(async (token) => {
      const project = await this.findProject(token, http);
      return sendRequest(
        GEMINI_QUOTA_URL,
        {
          method: "POST",
          headers: { Authorization: `Bearer ${token}`, "Content-Type": "application/json" },
          body: JSON.stringify(project ? { project } : {}),
        },
        http,
      );
    });
    if (!response.ok) throw httpFailure(response.status);
    return parseGeminiQuota(await readJson(response));
  }

  async probeCli(signal?: AbortSignal): Promise<UsageSnapshot> {
    let output: string;
    try {
      const result = await this.options.executor.execute({
        binary: "gemini",
        input: "/stats\n",
        timeoutMs: this.options.timeoutMs ?? 20_000,
        signal,
      });
      output = renderTerminal(result.output);
    } catch (err) {
      throw classifyRunError(err);
    }
    return parseGeminiStats(output);
  }

  /** Best effort: without a project the endpoint still answers for the default one */
  private async findProject(token: string, http: HttpOptions): Promise<string | null> {
    try {
      const response = await sendRequest(GEMINI_PROJECTS_URL, { headers: { Authorization: `Bearer ${token}` } }, http);
      if (!response.ok) {
        debug("gemini", `project lookup returned HTTP ${response.status}`);
        return null;
      }
      return pickQuotaProject(await readJson(response));
    } catch (err) {
      debug("gemini", "project lookup failed:", err instanceof Error ? err.message : err);
      return null;
    }
  }
}
