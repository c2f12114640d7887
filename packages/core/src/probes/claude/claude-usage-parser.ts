/**
 * Parsers for the rendered output of `claude /usage` and `claude /cost`.
 */

import type { CostUsage, QuotaType, UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes, sameQuotaType } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { ProbeError } from "../probe-error.js";
import {
  detectKnownError,
  extractPercentRemaining,
  extractResetText,
  parseCostLine,
  parseDollarAmount,
  parseDurationSeconds,
  parseHeaderLine,
  parseResetDate,
} from "../parse-helpers.js";

interface SectionPattern {
  pattern: RegExp;
  quotaType: QuotaType;
}

const SECTIONS: SectionPattern[] = [
  { pattern: /^current session\b/i, quotaType: QuotaTypes.session },
  { pattern: /^current week \(all models\)/i, quotaType: QuotaTypes.weekly },
  { pattern: /^current week \(opus\)/i, quotaType: QuotaTypes.model("opus") },
  { pattern: /^current week \(sonnet( only)?\)/i, quotaType: QuotaTypes.model("sonnet") },
];

/** Any heading that closes the previous section */
const HEADING_RE = /^(current session|current week|extra usage)\b/i;

const EMAIL_RE = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

export const CLAUDE_TIERS = {
  max: "Claude Max",
  pro: "Claude Pro",
  team: "Claude Team",
  enterprise: "Claude Enterprise",
  api: "Claude API",
} as const;

// ---------------------------------------------------------------------------
// Account details
// ---------------------------------------------------------------------------

export function extractEmail(text: string): string | null {
  const labelled = /(?:Account|Email):\s*(\S+@\S+)/i.exec(text)?.[1];
  if (labelled) return labelled;
  const header = parseHeaderLine(text);
  return header?.account ? EMAIL_RE.exec(header.account)?.[0] ?? null : null;
}

export function extractOrganization(text: string): string | null {
  const labelled = /(?:Organization|Org):\s*(.+)/i.exec(text)?.[1]?.trim();
  if (labelled) return labelled;
  return parseHeaderLine(text)?.account ?? null;
}

export function extractLoginMethod(text: string): string | null {
  return /Login method:\s*(.+)/i.exec(text)?.[1]?.trim() || null;
}

/** Folder path printed under a trust prompt */
export function extractTrustFolder(text: string): string | null {
  const lines = text.split("\n").map((l) => l.trim());
  const index = lines.findIndex((l) => /trust the files in this folder|one you trust/i.test(l));
  if (index < 0) return null;
  return lines.slice(index + 1).find((l) => l.startsWith("/") || l.startsWith("~")) ?? null;
}

function detectTier(text: string, hasQuotas: boolean): string | null {
  const plan = [parseHeaderLine(text)?.plan, extractLoginMethod(text)].filter((p): p is string => !!p).join(" ");
  if (/claude max/i.test(plan)) return CLAUDE_TIERS.max;
  if (/claude pro/i.test(plan)) return CLAUDE_TIERS.pro;
  if (/team/i.test(plan)) return CLAUDE_TIERS.team;
  if (/enterprise/i.test(plan)) return CLAUDE_TIERS.enterprise;
  if (/api usage billing/i.test(plan) || /api usage billing/i.test(text)) return CLAUDE_TIERS.api;
  // Older CLIs label subscription logins "Claude API" too; quotas settle it
  if (/claude api/i.test(plan)) return hasQuotas ? CLAUDE_TIERS.max : CLAUDE_TIERS.api;
  return hasQuotas ? CLAUDE_TIERS.max : null;
}

// ---------------------------------------------------------------------------
// /usage
// ---------------------------------------------------------------------------

function parseSections(lines: string[], now: Date): UsageQuota[] {
  const quotas: UsageQuota[] = [];

  lines.forEach((line, index) => {
    const section = SECTIONS.find((s) => s.pattern.test(line));
    if (!section || quotas.some((q) => sameQuotaType(q.quotaType, section.quotaType))) return;

    let percent: number | null = null;
    let resetText: string | null = null;
    for (let i = index; i < Math.min(lines.length, index + 5); i++) {
      const candidate = lines[i] ?? "";
      if (i > index && HEADING_RE.test(candidate)) break;
      percent ??= extractPercentRemaining(candidate);
      resetText ??= extractResetText(candidate);
    }
    if (percent === null) return;

    quotas.push(
      createQuota({
        percentRemaining: percent,
        quotaType: section.quotaType,
        providerId: "claude",
        resetText,
        resetsAt: resetText ? parseResetDate(resetText, now) : null,
      }),
    );
  });

  return quotas;
}

function parseExtraUsage(lines: string[], now: Date): CostUsage | null {
  const start = lines.findIndex((l) => /^extra usage\b/i.test(l));
  if (start < 0) return null;
  for (let i = start; i < Math.min(lines.length, start + 5); i++) {
    const line = lines[i] ?? "";
    if (i > start && HEADING_RE.test(line)) break;
    if (/not enabled/i.test(line)) return null;
    const cost = parseCostLine(line);
    if (!cost) continue;
    const resetText = extractResetText(line);
    return {
      spent: cost.spent,
      budget: cost.budget,
      currency: "USD",
      resetText,
      resetsAt: resetText ? parseResetDate(resetText, now) : null,
    };
  }
  return null;
}

/**
 * Parses rendered `/usage` output.
 *
 * Known prompts and errors only fail the parse when no quota could be read,
 * since a trust prompt answered earlier may still be visible above the data.
 */
export function parseClaudeUsage(text: string, now: Date = new Date()): UsageSnapshot {
  const lines = text.split("\n").map((l) => l.trim());
  const quotas = parseSections(lines, now);

  if (quotas.length === 0) {
    const known = detectKnownError(text);
    if (known) throw new ProbeError(known);
    throw ProbeError.parseFailed("No usage data found in output");
  }

  return createSnapshot({
    providerId: "claude",
    quotas,
    capturedAt: now,
    accountEmail: extractEmail(text),
    accountOrganization: extractOrganization(text),
    accountTier: detectTier(text, true),
    loginMethod: extractLoginMethod(text),
    costUsage: parseExtraUsage(lines, now),
  });
}

// ---------------------------------------------------------------------------
// /cost
// ---------------------------------------------------------------------------

/** Parses rendered `/cost` output of pay-as-you-go accounts */
export function parseClaudeCost(text: string, now: Date = new Date()): UsageSnapshot {
  const costLine = /Total cost:\s*(\$?[\d,]*\d(?:\.\d+)?)/i.exec(text)?.[1];
  const spent = costLine ? parseDollarAmount(costLine) : null;
  if (spent === null) {
    const known = detectKnownError(text);
    if (known) throw new ProbeError(known);
    throw ProbeError.parseFailed("No cost data found in output");
  }

  const durationLine = /Total duration \(API\):\s*(.+)/i.exec(text)?.[1];
  const apiDuration = durationLine ? parseDurationSeconds(durationLine) : null;

  const costUsage: CostUsage = { spent, budget: null, currency: "USD" };
  if (apiDuration !== null) costUsage.apiDuration = apiDuration;

  return createSnapshot({
    providerId: "claude",
    quotas: [],
    capturedAt: now,
    accountEmail: extractEmail(text),
    accountTier: CLAUDE_TIERS.api,
    costUsage,
  });
}
