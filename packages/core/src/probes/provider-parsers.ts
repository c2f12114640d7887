import type { ProviderId, UsageSnapshot } from "@usagebar/shared";
import { parseAmpUsage } from "./amp/amp-usage-parser.js";
import { parseClaudeUsage } from "./claude/claude-usage-parser.js";
import { parseRateLimitsResponse, rateLimitsToSnapshot } from "./codex/codex-rate-limits.js";
import { parseCopilotUser } from "./copilot/copilot-user-parser.js";
import { parseCursorUsageSummary } from "./cursor/cursor-usage-parser.js";
import { parseGeminiQuota } from "./gemini/gemini-quota.js";
import { parseKimiUsages } from "./kimi/kimi-parsers.js";
import { parseKiroUsage } from "./kiro/kiro-usage-parser.js";
import { parseMiniMaxRemains } from "./minimax/minimax-parser.js";
import { ProbeError } from "./probe-error.js";

/** A provider's primary parser, tagged with the kind of input it folds */
export type ProviderParser =
  | { input: "text"; parse: (text: string, now?: Date) => UsageSnapshot }
  | { input: "json"; parse: (body: unknown, now?: Date) => UsageSnapshot };

export const providerParsers = {
  claude: { input: "text", parse: parseClaudeUsage },
  codex: {
    input: "json",
    parse: (body: unknown, now?: Date) => rateLimitsToSnapshot(parseRateLimitsResponse(body, now), now),
  },
  gemini: { input: "json", parse: parseGeminiQuota },
  kimi: { input: "json", parse: parseKimiUsages },
  kiro: { input: "text", parse: parseKiroUsage },
  amp: { input: "text", parse: parseAmpUsage },
  minimax: { input: "json", parse: parseMiniMaxRemains },
  cursor: { input: "json", parse: parseCursorUsageSummary },
  copilot: { input: "json", parse: parseCopilotUser },
} as const satisfies Record<ProviderId, ProviderParser>;

/** Runs a provider's parser over captured output, decoding JSON first where needed */
export function parseProviderOutput(providerId: ProviderId, raw: string, now: Date = new Date()): UsageSnapshot {
  const parser: ProviderParser = providerParsers[providerId];
  if (parser.input === "text") return parser.parse(raw, now);

  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    throw ProbeError.parseFailed("Invalid JSON response");
  }
  return parser.parse(body, now);
}
