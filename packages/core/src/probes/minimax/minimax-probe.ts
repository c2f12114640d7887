import type { UsageSnapshot } from "@usagebar/shared";
import { quotaTypeLabel } from "../../quota/usage-quota.js";
import { debug } from "../../utils/debug.js";
import { readJson, sendRequest, type HttpOptions } from "../http.js";
import { ProbeError } from "../probe-error.js";
import type { UsageProbe } from "../usage-probe.js";
import { codingPlanRemainsUrl, parseMiniMaxRemains, type MiniMaxRegion } from "./minimax-parser.js";

export interface MiniMaxProbeOptions {
  apiKey: string | null;
  region?: MiniMaxRegion;
  http?: HttpOptions;
}

export class MiniMaxProbe implements UsageProbe {
  readonly id = "minimax" as const;
  private readonly options: MiniMaxProbeOptions;

  constructor(options: MiniMaxProbeOptions) {
    this.options = options;
  }

  get url(): string {
    return codingPlanRemainsUrl(this.options.region ?? "international");
  }

  async isAvailable(): Promise<boolean> {
    if (!this.options.apiKey) debug("minimax", "not available: no API key configured");
    return this.options.apiKey !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      console.error("[MiniMax] No API key configured (set MINIMAX_API_KEY)");
      throw ProbeError.of("authenticationRequired");
    }

    const response = await sendRequest(
      this.url,
      {
        method: "GET",
        headers: { Authorization: `Bearer ${apiKey}`, Accept: "application/json" },
      },
      { ...this.options.http, signal: signal ?? this.options.http?.signal },
    );

    if (response.status === 401 || response.status === 403) {
      console.error(`[MiniMax] API returned HTTP ${response.status}`);
      throw ProbeError.of("authenticationRequired");
    }
    if (!response.ok) {
      console.error(`[MiniMax] API returned HTTP ${response.status}`);
      throw ProbeError.executionFailed(`MiniMax API returned HTTP ${response.status}`);
    }

    const snapshot = parseMiniMaxRemains(await readJson(response));
    for (const quota of snapshot.quotas) {
      debug("minimax", `${quotaTypeLabel(quota.quotaType)}: ${Math.round(quota.percentRemaining)}% remaining`);
    }
    return snapshot;
  }
}
