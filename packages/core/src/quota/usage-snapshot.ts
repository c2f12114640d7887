import type {
  CostUsage,
  ProviderId,
  QuotaStatus,
  QuotaType,
  UsageQuota,
  UsageSnapshot,
} from "@usagebar/shared";
import {
  DEFAULT_STATUS_THRESHOLDS,
  quotaStatus,
  sameQuotaType,
  worseStatus,
  type StatusThresholds,
} from "./usage-quota.js";

export interface SnapshotInput {
  providerId: ProviderId;
  quotas: UsageQuota[];
  capturedAt?: Date;
  accountEmail?: string | null;
  accountOrganization?: string | null;
  accountTier?: string | null;
  loginMethod?: string | null;
  costUsage?: CostUsage | null;
}

/** Builds a snapshot, dropping absent account fields instead of storing nulls */
export function createSnapshot(input: SnapshotInput): UsageSnapshot {
  const snapshot: UsageSnapshot = {
    providerId: input.providerId,
    quotas: input.quotas,
    capturedAt: input.capturedAt ?? new Date(),
  };
  if (input.accountEmail) snapshot.accountEmail = input.accountEmail;
  if (input.accountOrganization) snapshot.accountOrganization = input.accountOrganization;
  if (input.accountTier) snapshot.accountTier = input.accountTier;
  if (input.loginMethod) snapshot.loginMethod = input.loginMethod;
  if (input.costUsage) snapshot.costUsage = input.costUsage;
  return snapshot;
}

export function quotaOfType(snapshot: UsageSnapshot, type: QuotaType): UsageQuota | undefined {
  return snapshot.quotas.find((q) => sameQuotaType(q.quotaType, type));
}

export function lowestQuota(snapshot: UsageSnapshot): UsageQuota | undefined {
  let lowest: UsageQuota | undefined;
  for (const quota of snapshot.quotas) {
    if (!lowest || quota.percentRemaining < lowest.percentRemaining) lowest = quota;
  }
  return lowest;
}

/** Worst status across all quotas; a snapshot without quotas is healthy */
export function overallStatus(
  snapshot: UsageSnapshot,
  thresholds: StatusThresholds = DEFAULT_STATUS_THRESHOLDS,
): QuotaStatus {
  return snapshot.quotas.reduce<QuotaStatus>(
    (worst, q) => worseStatus(worst, quotaStatus(q.percentRemaining, thresholds)),
    "healthy",
  );
}
