import { z } from "zod";
import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { ProbeError } from "../probe-error.js";

const poolSchema = z.object({
  enabled: z.boolean().nullish(),
  used: z.number().nullish(),
  limit: z.number().nullish(),
  remaining: z.number().nullish(),
});

const usageSummarySchema = z.object({
  membershipType: z.string().nullish(),
  isUnlimited: z.boolean().nullish(),
  billingCycleStart: z.string().nullish(),
  billingCycleEnd: z.string().nullish(),
  individualUsage: z
    .object({
      plan: poolSchema.nullish(),
      onDemand: poolSchema.nullish(),
    })
    .nullish(),
  // Older responses carried the pools at the top level
  planUsage: poolSchema.nullish(),
  onDemandUsage: poolSchema.nullish(),
});

type Pool = z.infer<typeof poolSchema>;

const KNOWN_TIERS = new Set(["pro", "business", "free", "ultra"]);

function poolQuota(pool: Pool | null | undefined, label: string, suffix: string, resetsAt: Date | null): UsageQuota | null {
  if (!pool?.enabled) return null;
  const used = Math.trunc(pool.used ?? 0);
  const limit = Math.trunc(pool.limit ?? 0);
  if (limit <= 0) return null;
  return createQuota({
    percentRemaining: Math.max(0, ((limit - used) / limit) * 100),
    quotaType: QuotaTypes.timeLimit(label),
    providerId: "cursor",
    resetsAt,
    resetText: `${used}/${limit} ${suffix}`,
  });
}

function parseInstant(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Tier label from `membershipType`, upper-cased */
export function cursorTier(membershipType: string | null | undefined): string | null {
  if (!membershipType) return null;
  const lower = membershipType.toLowerCase();
  return KNOWN_TIERS.has(lower) ? lower.toUpperCase() : membershipType.toUpperCase();
}

/**
 * Parses `cursor.com/api/usage-summary`. Included requests become the
 * "Monthly" quota and usage-based pricing the "On-Demand" quota; both reset
 * at the end of the billing cycle.
 */
export function parseCursorUsageSummary(body: unknown, now: Date = new Date()): UsageSnapshot {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw ProbeError.parseFailed("Response is not a JSON object");
  }
  const parsed = usageSummarySchema.safeParse(body);
  if (!parsed.success) {
    throw ProbeError.parseFailed(`Invalid JSON: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`);
  }
  const summary = parsed.data;
  const resetsAt = parseInstant(summary.billingCycleEnd);

  const quotas: UsageQuota[] = [];
  const plan = poolQuota(summary.individualUsage?.plan ?? summary.planUsage, "Monthly", "requests", resetsAt);
  if (plan) quotas.push(plan);
  const onDemand = poolQuota(
    summary.individualUsage?.onDemand ?? summary.onDemandUsage,
    "On-Demand",
    "on-demand",
    resetsAt,
  );
  if (onDemand) quotas.push(onDemand);

  if (summary.isUnlimited) {
    quotas.push(
      createQuota({
        percentRemaining: 100,
        quotaType: QuotaTypes.timeLimit("Monthly"),
        providerId: "cursor",
        resetText: "Unlimited",
      }),
    );
  }

  if (quotas.length === 0) throw ProbeError.parseFailed("No usage data found in Cursor response");

  return createSnapshot({
    providerId: "cursor",
    quotas,
    capturedAt: now,
    accountTier: cursorTier(summary.membershipType),
  });
}
