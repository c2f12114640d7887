export * from "@usagebar/shared";

export { loadConfig, PROVIDER_IDS, type UsagebarConfig } from "./config/config.js";

// Process automation and rendering
export { PtyExecutor, type CliExecutor, type CliRequest, type CliResult, type PtyExecutorOptions } from "./cli/pty-executor.js";
export { BinaryLocator, type BinaryLocatorOptions } from "./cli/binary-locator.js";
export { AutoResponder } from "./cli/auto-responder.js";
export { CliRunError, type CliRunFailure } from "./cli/cli-run-error.js";
export { renderTerminal, stripAnsi, TerminalScreen, DEFAULT_SCREEN_SIZE, type ScreenSize } from "./utils/terminal.js";

// Quota model
export * from "./quota/usage-quota.js";
export * from "./quota/usage-snapshot.js";

// Probes and parsers
export { ProbeError, describeProbeError, isProbeError, toProbeError } from "./probes/probe-error.js";
export { classifyRunError, type UsageProbe } from "./probes/usage-probe.js";
export * from "./probes/parse-helpers.js";
export { parseProviderOutput, providerParsers, type ProviderParser } from "./probes/provider-parsers.js";
export { ClaudeCliProbe } from "./probes/claude/claude-cli-probe.js";
export { ClaudeApiProbe, parseClaudeApiUsage } from "./probes/claude/claude-api-probe.js";
export { parseClaudeUsage, parseClaudeCost } from "./probes/claude/claude-usage-parser.js";
export { CodexProbe } from "./probes/codex/codex-probe.js";
export { parseCodexStatus } from "./probes/codex/codex-status-parser.js";
export { parseRateLimitsResponse, rateLimitsToSnapshot } from "./probes/codex/codex-rate-limits.js";
export { GeminiProbe } from "./probes/gemini/gemini-probe.js";
export { parseGeminiQuota } from "./probes/gemini/gemini-quota.js";
export { parseGeminiStats } from "./probes/gemini/gemini-stats-parser.js";
export { KimiProbe } from "./probes/kimi/kimi-probe.js";
export { parseKimiCliUsage, parseKimiUsages } from "./probes/kimi/kimi-parsers.js";
export { KiroProbe } from "./probes/kiro/kiro-probe.js";
export { parseKiroUsage } from "./probes/kiro/kiro-usage-parser.js";
export { AmpProbe } from "./probes/amp/amp-probe.js";
export { parseAmpUsage } from "./probes/amp/amp-usage-parser.js";
export { MiniMaxProbe } from "./probes/minimax/minimax-probe.js";
export { parseMiniMaxRemains, type MiniMaxRegion } from "./probes/minimax/minimax-parser.js";
export { CursorProbe } from "./probes/cursor/cursor-probe.js";
export { parseCursorUsageSummary } from "./probes/cursor/cursor-usage-parser.js";
export {
  CopilotBillingProbe,
  CopilotProbe,
  copilotBillingUrl,
  type CopilotProbeMode,
} from "./probes/copilot/copilot-probe.js";
export { parseCopilotBillingUsage } from "./probes/copilot/copilot-billing-parser.js";
export { parseCopilotUser } from "./probes/copilot/copilot-user-parser.js";

// Credentials
export { CredentialManager, InvalidGrantError, type TokenRefresher, type RefreshedTokens } from "./credentials/credential-manager.js";
export { ClaudeCredentialStore } from "./credentials/claude-credential-store.js";
export { GeminiCredentialStore } from "./credentials/gemini-credential-store.js";
export { needsRefresh, isExpired, type StoredCredential, type CredentialStore } from "./credentials/stored-credential.js";
export { createClaudeRefresher, createGoogleRefresher, createJsonTokenRefresher } from "./credentials/token-refreshers.js";

// Registry
export { createProviderRegistry, type ProviderRegistry, type ProviderRegistryDeps } from "./registry/provider-registry.js";
export { runOnce, formatProbeResult } from "./run-once.js";

// Sessions
export { Session, phaseLabel, formatSessionDuration } from "./sessions/session.js";
export { SessionMonitor, type SessionState } from "./sessions/session-monitor.js";
export { parseHookEvent } from "./sessions/hook-event-parser.js";
export { EventChannel, consumeEvents } from "./sessions/event-channel.js";
export { DEFAULT_HOOK_PORT, portFilePath, readPort, writePort, removePortFile } from "./sessions/port-discovery.js";
