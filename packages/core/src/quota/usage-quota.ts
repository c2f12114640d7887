/**
 * Derived analytics for usage quotas.
 *
 * Quotas themselves are plain values from `@usagebar/shared`; everything
 * here is a pure function of a quota and the current instant.
 */

import type {
  PaceStatus,
  ProviderId,
  QuotaDisplayMode,
  QuotaStatus,
  QuotaType,
  UsageQuota,
} from "@usagebar/shared";

// ---------------------------------------------------------------------------
// Policy constants
// ---------------------------------------------------------------------------

export interface StatusThresholds {
  /** Above this remaining percentage the quota is healthy */
  healthyAbove: number;
  /** Above this (and at or below healthyAbove) it is a warning */
  warningAbove: number;
}

export const DEFAULT_STATUS_THRESHOLDS: StatusThresholds = {
  healthyAbove: 50,
  warningAbove: 20,
};

/** Pace difference (percentage points) still considered on pace */
export const DEFAULT_PACE_TOLERANCE = 5;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function createQuota(input: {
  percentRemaining: number;
  quotaType: QuotaType;
  providerId: ProviderId;
  resetsAt?: Date | null;
  resetText?: string | null;
}): UsageQuota {
  return {
    percentRemaining: Math.min(100, input.percentRemaining),
    quotaType: input.quotaType,
    providerId: input.providerId,
    resetsAt: input.resetsAt ?? null,
    resetText: input.resetText ?? null,
  };
}

export const QuotaTypes = {
  session: { kind: "session" },
  weekly: { kind: "weekly" },
  model: (model: string): QuotaType => ({ kind: "modelSpecific", model }),
  timeLimit: (label: string): QuotaType => ({ kind: "timeLimit", label }),
} as const satisfies Record<string, QuotaType | ((arg: string) => QuotaType)>;

export function quotaTypeLabel(type: QuotaType): string {
  switch (type.kind) {
    case "session":
      return "Session";
    case "weekly":
      return "Weekly";
    case "modelSpecific":
      return type.model;
    case "timeLimit":
      return type.label;
  }
}

export function sameQuotaType(a: QuotaType, b: QuotaType): boolean {
  if (a.kind !== b.kind) return false;
  if (a.kind === "modelSpecific" && b.kind === "modelSpecific") return a.model === b.model;
  if (a.kind === "timeLimit" && b.kind === "timeLimit") return a.label === b.label;
  return true;
}

/** Length of the reset window for a quota type, or null when unknown */
export function windowDurationMs(type: QuotaType): number | null {
  switch (type.kind) {
    case "session":
      return 5 * HOUR_MS;
    case "weekly":
    case "modelSpecific":
      return 7 * DAY_MS;
    case "timeLimit":
      return type.label.toLowerCase() === "monthly" ? 30 * DAY_MS : null;
  }
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export function quotaStatus(
  percentRemaining: number,
  thresholds: StatusThresholds = DEFAULT_STATUS_THRESHOLDS,
): QuotaStatus {
  if (percentRemaining <= 0) return "depleted";
  if (percentRemaining > thresholds.healthyAbove) return "healthy";
  if (percentRemaining > thresholds.warningAbove) return "warning";
  return "critical";
}

const STATUS_SEVERITY: Record<QuotaStatus, number> = {
  healthy: 0,
  warning: 1,
  critical: 2,
  depleted: 3,
};

export function worseStatus(a: QuotaStatus, b: QuotaStatus): QuotaStatus {
  return STATUS_SEVERITY[b] > STATUS_SEVERITY[a] ? b : a;
}

export function percentUsed(quota: UsageQuota): number {
  return 100 - quota.percentRemaining;
}

export function isDepleted(quota: UsageQuota): boolean {
  return quota.percentRemaining <= 0;
}

export function needsAttention(
  quota: UsageQuota,
  thresholds: StatusThresholds = DEFAULT_STATUS_THRESHOLDS,
): boolean {
  return quotaStatus(quota.percentRemaining, thresholds) !== "healthy";
}

// ---------------------------------------------------------------------------
// Time and pace
// ---------------------------------------------------------------------------

export function timeUntilResetMs(quota: UsageQuota, now: Date = new Date()): number | null {
  if (!quota.resetsAt) return null;
  return Math.max(0, quota.resetsAt.getTime() - now.getTime());
}

/**
 * Share of the reset window already elapsed, 0-100.
 * Null when the reset instant or the window length is unknown.
 */
export function percentTimeElapsed(quota: UsageQuota, now: Date = new Date()): number | null {
  const duration = windowDurationMs(quota.quotaType);
  const remaining = timeUntilResetMs(quota, now);
  if (duration === null || remaining === null) return null;
  const elapsed = ((duration - remaining) / duration) * 100;
  return Math.min(100, Math.max(0, elapsed));
}

/** Positive when usage runs ahead of elapsed time */
export function pacePercent(quota: UsageQuota, now: Date = new Date()): number | null {
  const elapsed = percentTimeElapsed(quota, now);
  if (elapsed === null) return null;
  return percentUsed(quota) - elapsed;
}

export function paceStatus(
  quota: UsageQuota,
  now: Date = new Date(),
  tolerance: number = DEFAULT_PACE_TOLERANCE,
): PaceStatus {
  const pace = pacePercent(quota, now);
  if (pace === null) return "unknown";
  if (pace > tolerance) return "ahead";
  if (pace < -tolerance) return "behind";
  return "onPace";
}

export function paceInsight(
  quota: UsageQuota,
  now: Date = new Date(),
  tolerance: number = DEFAULT_PACE_TOLERANCE,
): string | null {
  const pace = pacePercent(quota, now);
  if (pace === null) return null;
  const magnitude = Math.round(Math.abs(pace));
  switch (paceStatus(quota, now, tolerance)) {
    case "ahead":
      return `${magnitude}% above expected usage`;
    case "behind":
      return `${magnitude}% below expected usage`;
    default:
      return "Right on track";
  }
}

// ---------------------------------------------------------------------------
// Display helpers
// ---------------------------------------------------------------------------

export function formatResetCountdown(ms: number): string {
  const totalMinutes = Math.floor(ms / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  // A full day still reads in hours
  if (hours > 24) return `Resets in ${Math.floor(hours / 24)}d ${hours % 24}h`;
  if (hours > 0) return `Resets in ${hours}h ${minutes}m`;
  if (minutes > 0) return `Resets in ${minutes}m`;
  return "Resets soon";
}

/** Countdown when the reset instant is known, otherwise the provider's own phrase */
export function resetDescription(quota: UsageQuota, now: Date = new Date()): string | null {
  const remaining = timeUntilResetMs(quota, now);
  if (remaining === null) return quota.resetText;
  return formatResetCountdown(remaining);
}

/** Number shown next to the quota; pace mode keeps the familiar remaining figure */
export function displayPercent(quota: UsageQuota, mode: QuotaDisplayMode): number {
  return mode === "used" ? percentUsed(quota) : quota.percentRemaining;
}

/** Progress bar fill: drains in remaining and pace modes, fills in used mode */
export function displayProgressPercent(quota: UsageQuota, mode: QuotaDisplayMode): number {
  return displayPercent(quota, mode);
}

/** Where the bar would sit if usage tracked elapsed time exactly */
export function expectedProgressPercent(
  quota: UsageQuota,
  mode: QuotaDisplayMode,
  now: Date = new Date(),
): number | null {
  const elapsed = percentTimeElapsed(quota, now);
  if (elapsed === null) return null;
  return mode === "used" ? elapsed : 100 - elapsed;
}
