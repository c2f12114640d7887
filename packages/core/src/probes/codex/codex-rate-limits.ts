import { z } from "zod";
import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, formatResetCountdown, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { ProbeError } from "../probe-error.js";

export interface CodexRateLimitWindow {
  usedPercent: number;
  resetsAt: Date | null;
  resetDescription: string | null;
}

export interface CodexRateLimits {
  planType: string | null;
  /** Short rolling window (5h) */
  primary: CodexRateLimitWindow | null;
  /** Weekly window */
  secondary: CodexRateLimitWindow | null;
}

const windowSchema = z.object({
  usedPercent: z.number(),
  resetsAt: z.number().nullish(),
});

const rateLimitsSchema = z.object({
  planType: z.string().nullish(),
  primary: z.unknown().optional(),
  secondary: z.unknown().optional(),
});

const rpcResponseSchema = z.object({
  id: z.number().optional(),
  result: z.object({ rateLimits: rateLimitsSchema.nullish() }).passthrough().optional(),
  error: z.object({ message: z.string() }).passthrough().optional(),
});

/** `resetsAt` is in epoch seconds; malformed windows are dropped rather than failing the read */
export function parseRateLimitWindow(value: unknown, now: Date = new Date()): CodexRateLimitWindow | null {
  const parsed = windowSchema.safeParse(value);
  if (!parsed.success) return null;
  const resetsAt = typeof parsed.data.resetsAt === "number" ? new Date(parsed.data.resetsAt * 1000) : null;
  return {
    usedPercent: parsed.data.usedPercent,
    resetsAt,
    resetDescription: resetsAt ? formatResetCountdown(resetsAt.getTime() - now.getTime()) : null,
  };
}

/**
 * Decodes the reply to `account/rateLimits/read`.
 *
 * A free plan reports no windows at all; it is shown as an untouched session
 * quota instead of an error.
 */
export function parseRateLimitsResponse(message: unknown, now: Date = new Date()): CodexRateLimits {
  const parsed = rpcResponseSchema.safeParse(message);
  if (!parsed.success) throw ProbeError.parseFailed("Malformed RPC response");
  if (parsed.data.error) throw ProbeError.executionFailed(parsed.data.error.message);

  const limits = parsed.data.result?.rateLimits;
  if (!limits) throw ProbeError.parseFailed("RPC response has no rateLimits");

  const planType = limits.planType ?? null;
  const primary = parseRateLimitWindow(limits.primary, now);
  const secondary = parseRateLimitWindow(limits.secondary, now);

  if (!primary && !secondary) {
    if (planType === "free") {
      return { planType, primary: { usedPercent: 0, resetsAt: null, resetDescription: "Free plan" }, secondary: null };
    }
    throw ProbeError.of("noData");
  }
  return { planType, primary, secondary };
}

function toQuota(window: CodexRateLimitWindow, weekly: boolean): UsageQuota {
  return createQuota({
    percentRemaining: 100 - window.usedPercent,
    quotaType: weekly ? QuotaTypes.weekly : QuotaTypes.session,
    providerId: "codex",
    resetsAt: window.resetsAt,
    resetText: window.resetDescription,
  });
}

/** Primary maps to the session quota, secondary to the weekly one */
export function rateLimitsToSnapshot(limits: CodexRateLimits, now: Date = new Date()): UsageSnapshot {
  const quotas: UsageQuota[] = [];
  if (limits.primary) quotas.push(toQuota(limits.primary, false));
  if (limits.secondary) quotas.push(toQuota(limits.secondary, true));
  if (quotas.length === 0) throw ProbeError.of("noData");

  return createSnapshot({
    providerId: "codex",
    quotas,
    capturedAt: now,
    accountTier: limits.planType ? planLabel(limits.planType) : null,
  });
}

function planLabel(planType: string): string {
  return `ChatGPT ${planType.charAt(0).toUpperCase()}${planType.slice(1)}`;
}
