import type { ProbeCycle, ProbeResult } from "@usagebar/shared";
import { loadConfig } from "./config/config.js";
import { quotaStatus, quotaTypeLabel, resetDescription } from "./quota/usage-quota.js";
import { createProviderRegistry, type ProviderRegistry, type ProviderRegistryDeps } from "./registry/provider-registry.js";
import { setDebugEnabled } from "./utils/debug.js";

export interface RunOnceOptions {
  env?: NodeJS.ProcessEnv;
  deps?: ProviderRegistryDeps;
  signal?: AbortSignal;
  now?: () => Date;
  log?: (line: string) => void;
}

/** Human-readable lines for one provider's result */
export function formatProbeResult(registry: ProviderRegistry, result: ProbeResult, now: Date = new Date()): string[] {
  const name = registry.displayName(result.providerId);
  if (!result.ok) return [`${name}: ${result.message}`];

  const { snapshot } = result;
  const account = [snapshot.accountEmail, snapshot.accountTier].filter(Boolean).join(", ");
  const lines = [account ? `${name} (${account})` : name];
  for (const quota of snapshot.quotas) {
    const reset = resetDescription(quota, now);
    const percent = Math.round(quota.percentRemaining * 10) / 10;
    lines.push(
      `  ${quotaTypeLabel(quota.quotaType)}: ${percent}% remaining [${quotaStatus(quota.percentRemaining)}]` +
        (reset ? ` (${reset})` : ""),
    );
  }
  if (snapshot.costUsage) {
    const { spent, budget, currency } = snapshot.costUsage;
    lines.push(`  Cost: ${spent.toFixed(2)}${budget !== null ? ` / ${budget.toFixed(2)}` : ""} ${currency}`);
  }
  return lines;
}

/** Loads configuration, probes every configured provider once and prints the results */
export async function runOnce(options: RunOnceOptions = {}): Promise<ProbeCycle> {
  const config = loadConfig(options.env);
  setDebugEnabled(config.debug);
  const registry = createProviderRegistry(config, { env: options.env, ...options.deps });
  const log = options.log ?? ((line: string) => console.log(line));

  console.log(`[usagebar] Probing ${registry.all().length} providers...`);
  const cycle = await registry.probeAll(options.signal);
  const now = options.now?.() ?? new Date();
  for (const result of cycle.results) {
    for (const line of formatProbeResult(registry, result, now)) log(line);
  }
  return cycle;
}
