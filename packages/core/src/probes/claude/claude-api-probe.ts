/**
 * Claude quotas straight from the OAuth usage endpoint, using the tokens the
 * CLI stores. Faster than driving the CLI and needs no terminal.
 */

import { z } from "zod";
import type { CostUsage, QuotaType, UsageQuota, UsageSnapshot } from "@usagebar/shared";
import type { CredentialManager } from "../../credentials/credential-manager.js";
import type { CredentialStore } from "../../credentials/stored-credential.js";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { centsToDollars } from "../parse-helpers.js";
import { ProbeError } from "../probe-error.js";
import { httpFailure, readJson, sendRequest, type HttpOptions } from "../http.js";
import type { UsageProbe } from "../usage-probe.js";
import { CLAUDE_TIERS } from "./claude-usage-parser.js";

export const CLAUDE_USAGE_URL = "https://api.anthropic.com/api/oauth/usage";

const windowSchema = z
  .object({
    utilization: z.number().nullish(),
    resets_at: z.string().nullish(),
  })
  .nullish();

const usageResponseSchema = z.object({
  five_hour: windowSchema,
  seven_day: windowSchema,
  seven_day_sonnet: windowSchema,
  seven_day_opus: windowSchema,
  extra_usage: z
    .object({
      is_enabled: z.boolean().nullish(),
      used_credits: z.number().nullish(),
      monthly_limit: z.number().nullish(),
    })
    .nullish(),
});

type UsageWindow = z.infer<typeof windowSchema>;

const WINDOWS: Array<{ key: "five_hour" | "seven_day" | "seven_day_sonnet" | "seven_day_opus"; type: QuotaType }> = [
  { key: "five_hour", type: QuotaTypes.session },
  { key: "seven_day", type: QuotaTypes.weekly },
  { key: "seven_day_sonnet", type: QuotaTypes.model("sonnet") },
  { key: "seven_day_opus", type: QuotaTypes.model("opus") },
];

/** Maps the credential's subscriptionType ("claude_max", "pro", ...) to a tier name */
export function tierForSubscription(subscriptionType: string | null): string | null {
  if (!subscriptionType) return null;
  const normalized = subscriptionType.toLowerCase();
  if (normalized.includes("max")) return CLAUDE_TIERS.max;
  if (normalized.includes("pro")) return CLAUDE_TIERS.pro;
  if (normalized.includes("team")) return CLAUDE_TIERS.team;
  if (normalized.includes("enterprise")) return CLAUDE_TIERS.enterprise;
  return null;
}

function parseInstant(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toQuota(window: UsageWindow, type: QuotaType): UsageQuota | null {
  const utilization = window?.utilization;
  if (typeof utilization !== "number") return null;
  return createQuota({
    percentRemaining: 100 - utilization,
    quotaType: type,
    providerId: "claude",
    resetsAt: parseInstant(window?.resets_at),
  });
}

/** Converts the usage endpoint's body into a snapshot; credits are in cents */
export function parseClaudeApiUsage(
  body: unknown,
  subscriptionType: string | null,
  now: Date = new Date(),
): UsageSnapshot {
  const parsed = usageResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw ProbeError.parseFailed(`Unexpected usage response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  const data = parsed.data;

  const quotas: UsageQuota[] = [];
  for (const { key, type } of WINDOWS) {
    const quota = toQuota(data[key], type);
    if (quota) quotas.push(quota);
  }

  let costUsage: CostUsage | null = null;
  const extra = data.extra_usage;
  if (extra?.is_enabled && typeof extra.used_credits === "number") {
    costUsage = {
      spent: centsToDollars(extra.used_credits),
      budget: typeof extra.monthly_limit === "number" ? centsToDollars(extra.monthly_limit) : null,
      currency: "USD",
    };
  }

  return createSnapshot({
    providerId: "claude",
    quotas,
    capturedAt: now,
    accountTier: tierForSubscription(subscriptionType),
    costUsage,
  });
}

export interface ClaudeApiProbeOptions {
  store: CredentialStore;
  credentials: CredentialManager;
  http?: HttpOptions;
}

export class ClaudeApiProbe implements UsageProbe {
  readonly id = "claude" as const;
  private readonly options: ClaudeApiProbeOptions;

  constructor(options: ClaudeApiProbeOptions) {
    this.options = options;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.options.store.load()) !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const { credentials, http } = this.options;
    const credential = await credentials.loadCredential();

    const response = await credentials.authorizedRequest((token) =>
      sendRequest(
        CLAUDE_USAGE_URL,
        {
          method: "GET",
          headers: {
            Authorization: `Bearer ${token}`,
            Accept: "application/json",
            "anthropic-beta": "oauth-2025-04-20",
            "User-Agent": "claude-code/2.0.32",
          },
        },
        { ...http, signal: signal ?? http?.signal },
      ),
    );
    if (!response.ok) throw httpFailure(response.status);

    return parseClaudeApiUsage(await readJson(response), credential.subscriptionType);
  }
}
