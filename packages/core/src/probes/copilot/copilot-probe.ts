import type { UsageSnapshot } from "@usagebar/shared";
import { debug } from "../../utils/debug.js";
import { readJson, sendRequest, type HttpOptions } from "../http.js";
import { ProbeError } from "../probe-error.js";
import type { UsageProbe } from "../usage-probe.js";
import { DEFAULT_COPILOT_MONTHLY_LIMIT, parseCopilotBillingUsage } from "./copilot-billing-parser.js";
import { parseCopilotUser } from "./copilot-user-parser.js";

export const COPILOT_USER_URL = "https://api.github.com/copilot_internal/user";
const GITHUB_API_VERSION = "2022-11-28";

export function copilotBillingUrl(username: string): string {
  return `https://api.github.com/users/${encodeURIComponent(username)}/settings/billing/premium_request/usage`;
}

/** `billing` reads the billing API; `api` reads the Copilot internal user endpoint */
export type CopilotProbeMode = "billing" | "api";

function missingToken(): ProbeError {
  console.error("[Copilot] No GitHub token configured (set GITHUB_TOKEN or GH_TOKEN)");
  return ProbeError.of("authenticationRequired");
}

export interface CopilotProbeOptions {
  /** Classic PAT with the `copilot` scope */
  token: string | null;
  http?: HttpOptions;
}

export class CopilotProbe implements UsageProbe {
  readonly id = "copilot" as const;
  private readonly options: CopilotProbeOptions;

  constructor(options: CopilotProbeOptions) {
    this.options = options;
  }

  async isAvailable(): Promise<boolean> {
    return this.options.token !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const token = this.options.token;
    if (!token) throw missingToken();

    const response = await sendRequest(
      COPILOT_USER_URL,
      {
        method: "GET",
        headers: { Authorization: `Bearer ${token}`, Accept: "application/json" },
      },
      { ...this.options.http, signal: signal ?? this.options.http?.signal },
    );
    debug("copilot", `response status ${response.status}`);

    switch (response.status) {
      case 200:
        break;
      case 401:
        throw ProbeError.of("authenticationRequired");
      case 403:
        console.error("[Copilot] Forbidden (403), check token permissions");
        throw ProbeError.executionFailed("Forbidden - ensure Classic PAT has 'copilot' scope");
      case 404:
        throw ProbeError.executionFailed("No Copilot subscription found");
      default:
        throw ProbeError.executionFailed(`HTTP ${response.status}`);
    }

    return parseCopilotUser(await readJson(response));
  }
}

export interface CopilotBillingProbeOptions {
  /** Fine-grained PAT with the "Plan: read" permission */
  token: string | null;
  username: string | null;
  monthlyLimit?: number;
  manualUsage?: number | null;
  http?: HttpOptions;
}

/** Premium request usage from the GitHub billing API */
export class CopilotBillingProbe implements UsageProbe {
  readonly id = "copilot" as const;
  private readonly options: CopilotBillingProbeOptions;

  constructor(options: CopilotBillingProbeOptions) {
    this.options = options;
  }

  async isAvailable(): Promise<boolean> {
    return this.options.token !== null && this.options.username !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const { token, username } = this.options;
    if (!token) throw missingToken();
    if (!username) {
      console.error("[Copilot] No GitHub username configured (set GITHUB_USERNAME)");
      throw ProbeError.executionFailed("GitHub username not configured");
    }

    const response = await sendRequest(
      copilotBillingUrl(username),
      {
        method: "GET",
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/vnd.github+json",
          "X-GitHub-Api-Version": GITHUB_API_VERSION,
        },
      },
      { ...this.options.http, signal: signal ?? this.options.http?.signal },
    );
    debug("copilot", `billing response status ${response.status}`);

    switch (response.status) {
      case 200:
        break;
      case 401:
        throw ProbeError.of("authenticationRequired");
      case 403:
        console.error("[Copilot] Forbidden (403), check token permissions");
        throw ProbeError.executionFailed("Forbidden - ensure PAT has 'Plan: read' permission");
      case 404:
        throw ProbeError.executionFailed("User not found or no billing access");
      default:
        throw ProbeError.executionFailed(`HTTP ${response.status}`);
    }

    return parseCopilotBillingUsage(await readJson(response), {
      username,
      monthlyLimit: this.options.monthlyLimit ?? DEFAULT_COPILOT_MONTHLY_LIMIT,
      manualUsage: this.options.manualUsage ?? null,
    });
  }
}
