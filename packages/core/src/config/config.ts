import { homedir } from "node:os";
import { z } from "zod";
import type { ProviderId } from "@usagebar/shared";
import { isDebugFlag } from "../utils/debug.js";
import type { CopilotProbeMode } from "../probes/copilot/copilot-probe.js";

// ---------------------------------------------------------------------------
// Environment-driven configuration
// ---------------------------------------------------------------------------

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const PROVIDER_IDS = [
  "claude",
  "codex",
  "gemini",
  "kimi",
  "kiro",
  "amp",
  "minimax",
  "cursor",
  "copilot",
] as const satisfies readonly ProviderId[];

const providerListSchema = z
  .string()
  .transform((value) => value.split(",").map((id) => id.trim()).filter(Boolean))
  .pipe(z.array(z.enum(PROVIDER_IDS)));

const envSchema = z.object({
  USAGEBAR_HOME: z.string().min(1).optional(),
  USAGEBAR_PROBE_TIMEOUT_MS: intFromEnv(20_000),
  USAGEBAR_HTTP_TIMEOUT_MS: intFromEnv(10_000),
  USAGEBAR_MAX_RECENT_SESSIONS: intFromEnv(10),
  USAGEBAR_DEBUG: z.string().optional(),
  USAGEBAR_PROVIDERS: providerListSchema.optional(),
  USAGEBAR_CLAUDE_MODE: z.enum(["cli", "api"]).default("cli"),
  MINIMAX_REGION: z.enum(["international", "china"]).default("international"),
  GEMINI_OAUTH_CLIENT_ID: z.string().optional(),
  GEMINI_OAUTH_CLIENT_SECRET: z.string().optional(),
  CLAUDE_CODE_OAUTH_TOKEN: z.string().optional(),
  KIMI_AUTH_TOKEN: z.string().optional(),
  MINIMAX_API_KEY: z.string().optional(),
  GITHUB_TOKEN: z.string().optional(),
  GH_TOKEN: z.string().optional(),
  CURSOR_SESSION_TOKEN: z.string().optional(),
  COPILOT_MODE: z.enum(["billing", "api"]).default("billing"),
  GITHUB_USERNAME: z.string().optional(),
  COPILOT_MONTHLY_LIMIT: intFromEnv(50),
  COPILOT_MANUAL_USAGE: z.coerce.number().int().nonnegative().optional(),
});

export interface UsagebarConfig {
  homeDir: string;
  probeTimeoutMs: number;
  httpTimeoutMs: number;
  maxRecentSessions: number;
  debug: boolean;
  /** Providers the registry builds, in display order */
  providers: ProviderId[];
  claudeMode: "cli" | "api";
  minimaxRegion: "international" | "china";
  /** OAuth client for refreshing Gemini CLI tokens; null leaves them unrefreshed */
  googleOAuth: { clientId: string; clientSecret: string } | null;
  copilot: {
    mode: CopilotProbeMode;
    username: string | null;
    monthlyLimit: number;
    /** Hand-entered premium request count; overrides the billing API */
    manualUsage: number | null;
  };
  tokens: {
    claudeSetupToken: string | null;
    kimi: string | null;
    minimax: string | null;
    github: string | null;
    cursor: string | null;
  };
}

/** Blank values count as unset */
function token(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): UsagebarConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const parsed = result.data;
  const googleClientId = token(parsed.GEMINI_OAUTH_CLIENT_ID);
  const googleClientSecret = token(parsed.GEMINI_OAUTH_CLIENT_SECRET);

  return {
    homeDir: parsed.USAGEBAR_HOME ?? homedir(),
    probeTimeoutMs: parsed.USAGEBAR_PROBE_TIMEOUT_MS,
    httpTimeoutMs: parsed.USAGEBAR_HTTP_TIMEOUT_MS,
    maxRecentSessions: parsed.USAGEBAR_MAX_RECENT_SESSIONS,
    debug: isDebugFlag(parsed.USAGEBAR_DEBUG),
    providers: parsed.USAGEBAR_PROVIDERS ?? [...PROVIDER_IDS],
    claudeMode: parsed.USAGEBAR_CLAUDE_MODE,
    minimaxRegion: parsed.MINIMAX_REGION,
    googleOAuth:
      googleClientId && googleClientSecret ? { clientId: googleClientId, clientSecret: googleClientSecret } : null,
    copilot: {
      mode: parsed.COPILOT_MODE,
      username: token(parsed.GITHUB_USERNAME),
      monthlyLimit: parsed.COPILOT_MONTHLY_LIMIT,
      manualUsage: parsed.COPILOT_MANUAL_USAGE ?? null,
    },
    tokens: {
      claudeSetupToken: token(parsed.CLAUDE_CODE_OAUTH_TOKEN),
      kimi: token(parsed.KIMI_AUTH_TOKEN),
      minimax: token(parsed.MINIMAX_API_KEY),
      github: token(parsed.GITHUB_TOKEN) ?? token(parsed.GH_TOKEN),
      cursor: token(parsed.CURSOR_SESSION_TOKEN),
    },
  };
}
