/**
 * Parser for the `/status` screen of the interactive codex TUI, used when
 * the app-server RPC is unavailable.
 */

import type { ProbeErrorKind, UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes, sameQuotaType } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { detectKnownError, extractPercentRemaining, parseResetDate } from "../parse-helpers.js";
import { ProbeError } from "../probe-error.js";

const LIMIT_LINES = [
  { pattern: /\b5h limit\b/i, quotaType: QuotaTypes.session },
  { pattern: /\bweekly limit\b/i, quotaType: QuotaTypes.weekly },
];

const RESET_RE = /\(resets\s+([^)]+)\)/i;
const ACCOUNT_RE = /Account:\s*(\S+@\S+?)(?:\s*\(([^)]+)\))?\s*$/im;

/** Errors the codex TUI prints instead of limits */
export function extractCodexUsageError(text: string): ProbeErrorKind | null {
  if (/data not available yet/i.test(text)) return { kind: "noData" };
  return detectKnownError(text);
}

export function parseCodexStatus(text: string, now: Date = new Date()): UsageSnapshot {
  const quotas: UsageQuota[] = [];

  for (const line of text.split("\n")) {
    const entry = LIMIT_LINES.find((l) => l.pattern.test(line));
    if (!entry || quotas.some((q) => sameQuotaType(q.quotaType, entry.quotaType))) continue;
    const percent = extractPercentRemaining(line);
    if (percent === null) continue;

    const phrase = RESET_RE.exec(line)?.[1]?.trim();
    quotas.push(
      createQuota({
        percentRemaining: percent,
        quotaType: entry.quotaType,
        providerId: "codex",
        resetsAt: phrase ? parseResetDate(phrase, now) : null,
        resetText: phrase ? `Resets ${phrase}` : null,
      }),
    );
  }

  if (quotas.length === 0) {
    const known = extractCodexUsageError(text);
    if (known) throw new ProbeError(known);
    throw ProbeError.parseFailed("No rate limits in /status output");
  }

  const account = ACCOUNT_RE.exec(text);
  return createSnapshot({
    providerId: "codex",
    quotas,
    capturedAt: now,
    accountEmail: account?.[1] ?? null,
    accountTier: account?.[2]?.trim() ?? null,
  });
}
