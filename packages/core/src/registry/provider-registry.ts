/**
 * Explicitly constructed provider registry.
 *
 * Built once at startup from the loaded configuration and handed to whatever
 * needs probes or display names; nothing here is a module-level singleton.
 */

import { join } from "node:path";
import { nanoid } from "nanoid";
import type { ProbeCycle, ProbeResult, ProviderId } from "@usagebar/shared";
import { BinaryLocator } from "../cli/binary-locator.js";
import { PtyExecutor, type CliExecutor } from "../cli/pty-executor.js";
import type { UsagebarConfig } from "../config/config.js";
import { CLAUDE_SETUP_TOKEN_ENV, ClaudeCredentialStore } from "../credentials/claude-credential-store.js";
import { CredentialManager } from "../credentials/credential-manager.js";
import { GeminiCredentialStore } from "../credentials/gemini-credential-store.js";
import { createClaudeRefresher, createGoogleRefresher } from "../credentials/token-refreshers.js";
import { AmpProbe } from "../probes/amp/amp-probe.js";
import { ClaudeApiProbe } from "../probes/claude/claude-api-probe.js";
import { ClaudeCliProbe } from "../probes/claude/claude-cli-probe.js";
import { CodexProbe } from "../probes/codex/codex-probe.js";
import type { RpcTransportFactory } from "../probes/codex/rpc-transport.js";
import { CopilotBillingProbe, CopilotProbe } from "../probes/copilot/copilot-probe.js";
import { CursorProbe } from "../probes/cursor/cursor-probe.js";
import { GeminiProbe } from "../probes/gemini/gemini-probe.js";
import type { HttpOptions } from "../probes/http.js";
import { KimiProbe } from "../probes/kimi/kimi-probe.js";
import { KiroProbe } from "../probes/kiro/kiro-probe.js";
import { MiniMaxProbe } from "../probes/minimax/minimax-probe.js";
import { ProbeError, toProbeError } from "../probes/probe-error.js";
import type { UsageProbe } from "../probes/usage-probe.js";
import { debug } from "../utils/debug.js";

const DISPLAY_NAMES: Record<ProviderId, string> = {
  claude: "Claude",
  codex: "Codex",
  gemini: "Gemini",
  kimi: "Kimi",
  kiro: "Kiro",
  amp: "Amp",
  minimax: "MiniMax",
  cursor: "Cursor",
  copilot: "Copilot",
};

export interface ProviderRegistryDeps {
  fetch?: typeof fetch;
  /** Executor for every CLI probe; Claude otherwise gets its own without the setup token */
  executor?: CliExecutor;
  transportFactory?: RpcTransportFactory;
  env?: NodeJS.ProcessEnv;
}

export interface ProviderRegistry {
  get(id: ProviderId): UsageProbe | undefined;
  all(): UsageProbe[];
  displayName(id: ProviderId): string;
  /** Probes every registered provider in parallel, each under its own timeout */
  probeAll(signal?: AbortSignal): Promise<ProbeCycle>;
}

export function createProviderRegistry(config: UsagebarConfig, deps: ProviderRegistryDeps = {}): ProviderRegistry {
  const probes = new Map<ProviderId, UsageProbe>();
  const build = buildProbeFactories(config, deps);
  for (const id of config.providers) {
    if (!probes.has(id)) probes.set(id, build[id]());
  }

  return {
    get: (id) => probes.get(id),
    all: () => [...probes.values()],
    displayName: (id) => DISPLAY_NAMES[id],
    async probeAll(signal?: AbortSignal): Promise<ProbeCycle> {
      const cycleId = nanoid(10);
      const startedAt = new Date();
      debug("registry", `cycle ${cycleId}: probing ${[...probes.keys()].join(", ")}`);
      const results = await Promise.all(
        [...probes.values()].map((probe) => runProbe(probe, config.probeTimeoutMs, signal)),
      );
      return { cycleId, startedAt, results };
    },
  };
}

function buildProbeFactories(config: UsagebarConfig, deps: ProviderRegistryDeps): Record<ProviderId, () => UsageProbe> {
  const http: HttpOptions = { fetch: deps.fetch, timeoutMs: config.httpTimeoutMs };
  const locator = new BinaryLocator();
  const executor = deps.executor ?? new PtyExecutor({ locator, defaultTimeoutMs: config.probeTimeoutMs });
  // Claude CLI runs must use the interactive login, not a setup token meant for API calls
  const claudeExecutor =
    deps.executor ??
    new PtyExecutor({
      locator,
      defaultTimeoutMs: config.probeTimeoutMs,
      environmentExclusions: [CLAUDE_SETUP_TOKEN_ENV],
    });

  return {
    claude: () => {
      if (config.claudeMode === "cli") {
        return new ClaudeCliProbe({
          executor: claudeExecutor,
          workingDirectory: join(config.homeDir, ".usagebar", "probe"),
          timeoutMs: config.probeTimeoutMs,
        });
      }
      const store = new ClaudeCredentialStore({ homeDir: config.homeDir, env: deps.env });
      const credentials = new CredentialManager({
        label: "claude",
        store,
        refresher: createClaudeRefresher({ fetch: deps.fetch, timeoutMs: config.httpTimeoutMs }),
      });
      return new ClaudeApiProbe({ store, credentials, http });
    },
    codex: () =>
      new CodexProbe({ executor, transportFactory: deps.transportFactory, timeoutMs: config.probeTimeoutMs }),
    gemini: () => {
      const store = new GeminiCredentialStore({ homeDir: config.homeDir });
      const oauth = config.googleOAuth;
      const credentials = new CredentialManager({
        label: "gemini",
        store,
        refresher: oauth ? createGoogleRefresher(oauth.clientId, oauth.clientSecret) : null,
      });
      return new GeminiProbe({ store, credentials, executor, http, timeoutMs: config.probeTimeoutMs });
    },
    kimi: () => new KimiProbe({ executor, authToken: config.tokens.kimi, http, timeoutMs: config.probeTimeoutMs }),
    kiro: () => new KiroProbe({ executor }),
    amp: () => new AmpProbe({ executor }),
    minimax: () => new MiniMaxProbe({ apiKey: config.tokens.minimax, region: config.minimaxRegion, http }),
    cursor: () => new CursorProbe({ homeDir: config.homeDir, accessToken: config.tokens.cursor, http }),
    copilot: () =>
      config.copilot.mode === "api"
        ? new CopilotProbe({ token: config.tokens.github, http })
        : new CopilotBillingProbe({
            token: config.tokens.github,
            username: config.copilot.username,
            monthlyLimit: config.copilot.monthlyLimit,
            manualUsage: config.copilot.manualUsage,
            http,
          }),
  };
}

/** Settles one probe; a timeout or failure never affects the other providers */
async function runProbe(probe: UsageProbe, timeoutMs: number, parent?: AbortSignal): Promise<ProbeResult> {
  const controller = new AbortController();
  const abortFromParent = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", abortFromParent, { once: true });
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(ProbeError.of("timeout"));
    }, timeoutMs);
  });

  try {
    const snapshot = await Promise.race([probe.probe(controller.signal), deadline]);
    return { providerId: probe.id, ok: true, snapshot };
  } catch (err) {
    const error = toProbeError(err);
    console.warn(`[Registry] ${probe.id} probe failed: ${error.message}`);
    return { providerId: probe.id, ok: false, error: error.kind, message: error.message };
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", abortFromParent);
  }
}
