import { z } from "zod";
import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { parseRelativeReset } from "../parse-helpers.js";
import { ProbeError } from "../probe-error.js";

// ---------------------------------------------------------------------------
// CLI `/usage` panel
// ---------------------------------------------------------------------------

const LEFT_RE = /(\d+(?:\.\d+)?)%\s+left/i;
const RESETS_IN_RE = /\(resets\s+in\s+(.+?)\)/i;

/**
 * Parses the "API Usage" panel of `kimi` after `/usage`:
 *
 *   │  Weekly limit  ━━━━━━━━━━  100% left  (resets in 6d 23h 22m)  │
 *   │  5h limit      ━━━━━━━━━━  100% left  (resets in 4h 22m)      │
 */
export function parseKimiCliUsage(text: string, now: Date = new Date()): UsageSnapshot {
  const quotas: UsageQuota[] = [];

  for (const line of text.split("\n")) {
    const lower = line.toLowerCase();
    if (!lower.includes("% left")) continue;

    const quotaType = lower.includes("weekly")
      ? QuotaTypes.weekly
      : lower.includes("5h") || lower.includes("hour")
        ? QuotaTypes.session
        : null;
    const percent = LEFT_RE.exec(line)?.[1];
    if (!quotaType || percent === undefined) continue;

    const duration = RESETS_IN_RE.exec(line)?.[1]?.trim();
    quotas.push(
      createQuota({
        percentRemaining: parseFloat(percent),
        quotaType,
        providerId: "kimi",
        resetsAt: duration ? parseRelativeReset(`in ${duration}`, now) : null,
        resetText: duration ? `Resets in ${duration}` : null,
      }),
    );
  }

  if (quotas.length === 0) throw ProbeError.parseFailed("No quota data found in Kimi CLI output");
  return createSnapshot({ providerId: "kimi", quotas, capturedAt: now });
}

// ---------------------------------------------------------------------------
// Billing API `GetUsages`
// ---------------------------------------------------------------------------

/** Subscription tiers by weekly request limit */
const TIER_BY_LIMIT: Record<number, string> = {
  1024: "Andante",
  2048: "Moderato",
  7168: "Allegretto",
};

const detailSchema = z.object({
  limit: z.string(),
  used: z.string().nullish(),
  remaining: z.string().nullish(),
  resetTime: z.string(),
});

const usagesResponseSchema = z.object({
  usages: z.array(
    z.object({
      scope: z.string(),
      detail: detailSchema,
      limits: z
        .array(
          z.object({
            window: z.object({ duration: z.number(), timeUnit: z.string() }),
            detail: detailSchema,
          }),
        )
        .nullish(),
    }),
  ),
});

type UsageDetail = z.infer<typeof detailSchema>;

function toInt(value: string | null | undefined): number | null {
  if (value === null || value === undefined || !/^-?\d+$/.test(value.trim())) return null;
  return parseInt(value, 10);
}

/** Counts arrive as strings; whichever of used/remaining is missing is derived from the limit */
export function usageNumbers(detail: UsageDetail): { used: number; limit: number; remaining: number } {
  const limit = toInt(detail.limit) ?? 0;
  const used = toInt(detail.used);
  const remaining = toInt(detail.remaining);
  if (used !== null && remaining !== null) return { used, limit, remaining };
  if (used !== null) return { used, limit, remaining: Math.max(0, limit - used) };
  if (remaining !== null) return { used: Math.max(0, limit - remaining), limit, remaining };
  return { used: 0, limit, remaining: Math.max(0, limit) };
}

function parseInstant(value: string): Date | null {
  const date = new Date(value);
  return value && !Number.isNaN(date.getTime()) ? date : null;
}

function percentOf(remaining: number, limit: number): number {
  return limit > 0 ? (remaining / limit) * 100 : 100;
}

export function parseKimiUsages(body: unknown, now: Date = new Date()): UsageSnapshot {
  const parsed = usagesResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw ProbeError.parseFailed(`Failed to decode Kimi response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const coding = parsed.data.usages.find((u) => u.scope === "FEATURE_CODING");
  if (!coding) throw ProbeError.parseFailed("Missing FEATURE_CODING scope in response");

  const weekly = usageNumbers(coding.detail);
  const quotas: UsageQuota[] = [
    createQuota({
      percentRemaining: percentOf(weekly.remaining, weekly.limit),
      quotaType: QuotaTypes.weekly,
      providerId: "kimi",
      resetsAt: parseInstant(coding.detail.resetTime),
      resetText: `${weekly.used}/${weekly.limit} requests`,
    }),
  ];

  // The 5-hour window is 300 TIME_UNIT_MINUTE
  const rateLimit =
    coding.limits?.find((l) => l.window.duration === 300 && l.window.timeUnit === "TIME_UNIT_MINUTE") ??
    coding.limits?.[0];
  if (rateLimit) {
    const rate = usageNumbers(rateLimit.detail);
    quotas.push(
      createQuota({
        percentRemaining: percentOf(rate.remaining, rate.limit),
        quotaType: QuotaTypes.session,
        providerId: "kimi",
        resetsAt: parseInstant(rateLimit.detail.resetTime),
        resetText: `${rate.used}/${rate.limit} requests (5h)`,
      }),
    );
  }

  return createSnapshot({
    providerId: "kimi",
    quotas,
    capturedAt: now,
    accountTier: TIER_BY_LIMIT[weekly.limit] ?? null,
  });
}
