import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { ProbeError } from "../probe-error.js";

const SIGNED_IN_RE = /Signed in as\s+(\S+)\s+\(/;
const CREDIT_LINE_RE = /^(.+?):\s*\$(\d+(?:\.\d+)?)\s*\/\s*\$(\d+(?:\.\d+)?)\s+remaining/i;

const TIER_BY_LABEL: Record<string, string> = {
  "amp free": "Free",
};

/** "Amp Free: $17.59/$20 remaining ..." -> 87.95% of the "Amp Free" pool */
function parseCreditLine(line: string): UsageQuota | null {
  const match = CREDIT_LINE_RE.exec(line);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  const remaining = parseFloat(match[2]);
  const total = parseFloat(match[3]);
  if (!(total > 0)) return null;

  return createQuota({
    percentRemaining: Math.round((remaining / total) * 100 * 100) / 100,
    quotaType: QuotaTypes.model(match[1].trim()),
    providerId: "amp",
  });
}

/**
 * Parses `amp usage --no-color`:
 *
 *   Signed in as user@example.com (username)
 *   Amp Free: $17.59/$20 remaining (replenishes +$0.83/hour) - https://...
 *   Individual credits: $0 remaining - https://...
 *
 * Lines without a total cannot be expressed as a percentage and are skipped.
 */
export function parseAmpUsage(text: string, now: Date = new Date()): UsageSnapshot {
  const lines = text
    .split("\n")
    .map((l) => l.trim())
    .filter((l) => l.length > 0);

  const quotas = lines.map(parseCreditLine).filter((q): q is UsageQuota => q !== null);
  if (quotas.length === 0) throw ProbeError.parseFailed("No valid credit lines found in amp usage output");

  let email: string | null = null;
  for (const line of lines) {
    email = SIGNED_IN_RE.exec(line)?.[1] ?? null;
    if (email) break;
  }

  let tier: string | null = null;
  for (const quota of quotas) {
    if (quota.quotaType.kind !== "modelSpecific") continue;
    tier = TIER_BY_LABEL[quota.quotaType.model.toLowerCase()] ?? null;
    if (tier) break;
  }

  return createSnapshot({ providerId: "amp", quotas, capturedAt: now, accountEmail: email, accountTier: tier });
}
