import { z } from "zod";
import type { UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { debug } from "../../utils/debug.js";
import { ProbeError } from "../probe-error.js";

const userResponseSchema = z.object({
  copilot_plan: z.string().nullish(),
  quota_reset_date: z.string().nullish(),
  quota_reset_date_utc: z.string().nullish(),
  quota_snapshots: z
    .object({
      premium_interactions: z
        .object({
          entitlement: z.number().nullish(),
          percent_remaining: z.number().nullish(),
          remaining: z.number().nullish(),
          unlimited: z.boolean().nullish(),
          overage_count: z.number().nullish(),
          overage_permitted: z.boolean().nullish(),
        })
        .nullish(),
    })
    .nullish(),
});

const PREMIUM = QuotaTypes.timeLimit("Monthly");

function parseInstant(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function planLabel(plan: string): string {
  return plan
    .split(/[_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/**
 * Parses `GET /copilot_internal/user`. Only premium interactions are
 * metered; plans without that quota, or with it unlimited, report full.
 */
export function parseCopilotUser(body: unknown, now: Date = new Date()): UsageSnapshot {
  const parsed = userResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw ProbeError.parseFailed(
      `Failed to parse Copilot response: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`,
    );
  }
  const user = parsed.data;
  const resetsAt = parseInstant(user.quota_reset_date_utc ?? user.quota_reset_date);
  const accountTier = user.copilot_plan ? planLabel(user.copilot_plan) : null;
  const premium = user.quota_snapshots?.premium_interactions;

  if (!premium || premium.unlimited) {
    debug("copilot", premium ? "unlimited premium interactions" : "no premium_interactions quota");
    return createSnapshot({
      providerId: "copilot",
      quotas: [
        createQuota({
          percentRemaining: 100,
          quotaType: PREMIUM,
          providerId: "copilot",
          resetsAt,
          resetText: premium ? "Unlimited premium requests" : "No premium requests quota",
        }),
      ],
      capturedAt: now,
      accountTier,
    });
  }

  const entitlement = premium.entitlement ?? 0;
  const remaining = premium.remaining ?? 0;
  return createSnapshot({
    providerId: "copilot",
    quotas: [
      createQuota({
        percentRemaining: premium.percent_remaining ?? 100,
        quotaType: PREMIUM,
        providerId: "copilot",
        resetsAt,
        resetText: `${entitlement - remaining}/${entitlement} requests`,
      }),
    ],
    capturedAt: now,
    accountTier,
  });
}
