import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { ProbeError } from "../probe-error.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const BONUS_RE = /Bonus credits:\s*([\d.]+)\s*\/\s*([\d.]+)/i;
const EXPIRES_RE = /expires in (\d+) days?/i;
const CREDITS_RE = /Credits \(([\d.]+) of ([\d.]+)/i;
const RESETS_ON_RE = /resets on (\d{1,2})\/(\d{1,2})/i;
const PLAN_RE = /Estimated Usage\s*\|[^|\n]*\|\s*([^\n|]+)/i;

function remainingPercent(used: number, total: number): number {
  if (total <= 0) return 0;
  return Math.max(0, ((total - used) / total) * 100);
}

/** Next local midnight on MM/DD that is still ahead */
function nextMonthDay(month: number, day: number, now: Date): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const candidate = new Date(now.getFullYear(), month - 1, day);
  if (candidate.getTime() <= now.getTime()) candidate.setFullYear(candidate.getFullYear() + 1);
  return candidate;
}

/**
 * Parses `kiro-cli` `/usage`:
 *
 *   Estimated Usage | resets on 03/01 | KIRO FREE
 *   🎁 Bonus credits: 122.54/500 credits used, expires in 29 days
 *   Credits (0.00 of 50 covered in plan)
 */
export function parseKiroUsage(text: string, now: Date = new Date()): UsageSnapshot {
  const quotas: UsageQuota[] = [];

  const bonus = BONUS_RE.exec(text);
  if (bonus?.[1] && bonus[2]) {
    const days = EXPIRES_RE.exec(text)?.[1];
    quotas.push(
      createQuota({
        percentRemaining: remainingPercent(parseFloat(bonus[1]), parseFloat(bonus[2])),
        quotaType: QuotaTypes.weekly,
        providerId: "kiro",
        resetsAt: days ? new Date(now.getTime() + parseInt(days, 10) * DAY_MS) : null,
        resetText: days ? `Expires in ${days} days` : null,
      }),
    );
  }

  const credits = CREDITS_RE.exec(text);
  if (credits?.[1] && credits[2]) {
    const reset = RESETS_ON_RE.exec(text);
    const resetsAt = reset?.[1] && reset[2] ? nextMonthDay(parseInt(reset[1], 10), parseInt(reset[2], 10), now) : null;
    quotas.push(
      createQuota({
        percentRemaining: remainingPercent(parseFloat(credits[1]), parseFloat(credits[2])),
        quotaType: QuotaTypes.timeLimit("Monthly"),
        providerId: "kiro",
        resetsAt,
        resetText: reset ? `Resets on ${reset[1]}/${reset[2]}` : null,
      }),
    );
  }

  if (quotas.length === 0) throw ProbeError.parseFailed("No quota data found in Kiro CLI output");

  return createSnapshot({
    providerId: "kiro",
    quotas,
    capturedAt: now,
    accountTier: PLAN_RE.exec(text)?.[1]?.trim() ?? null,
  });
}
