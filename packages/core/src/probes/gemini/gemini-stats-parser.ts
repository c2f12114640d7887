import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { parseResetDate } from "../parse-helpers.js";
import { ProbeError } from "../probe-error.js";

/** "gemini-2.5-pro   -   100.0% (Resets in 24h)" */
const MODEL_ROW_RE = /(gemini[-\w.]+)\s+.*?(\d+(?:\.\d+)?)\s*%\s*\(([^)]+)\)/i;

const LOGIN_PROMPTS = ["login with google", "use gemini api key", "waiting for auth"];

/** Parses the model usage table of the Gemini CLI's `/stats` screen */
export function parseGeminiStats(text: string, now: Date = new Date()): UsageSnapshot {
  const lower = text.toLowerCase();
  if (LOGIN_PROMPTS.some((p) => lower.includes(p))) throw ProbeError.of("authenticationRequired");

  const quotas: UsageQuota[] = [];
  for (const line of text.split("\n")) {
    const match = MODEL_ROW_RE.exec(line.replace(/│/g, " "));
    if (!match?.[1] || !match[2]) continue;
    const resetText = match[3]?.trim() ?? null;
    quotas.push(
      createQuota({
        percentRemaining: parseFloat(match[2]),
        quotaType: QuotaTypes.model(match[1]),
        providerId: "gemini",
        resetsAt: resetText ? parseResetDate(resetText, now) : null,
        resetText,
      }),
    );
  }

  if (quotas.length === 0) throw ProbeError.parseFailed("No usage data found in output");
  return createSnapshot({ providerId: "gemini", quotas, capturedAt: now });
}
