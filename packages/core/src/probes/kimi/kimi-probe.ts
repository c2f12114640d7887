import type { UsageSnapshot } from "@usagebar/shared";
import type { CliExecutor } from "../../cli/pty-executor.js";
import { debug } from "../../utils/debug.js";
import { renderTerminal } from "../../utils/terminal.js";
import { readJson, sendRequest, type HttpOptions } from "../http.js";
import { ProbeError } from "../probe-error.js";
import { classifyRunError, type UsageProbe } from "../usage-probe.js";
import { parseKimiCliUsage, parseKimiUsages } from "./kimi-parsers.js";

export const KIMI_USAGES_URL = "https://www.kimi.com/apiv2/kimi.gateway.billing.v1.BillingService/GetUsages";

/** The CLI prompt glyph; typing before it appears is lost */
const PROMPT_GLYPH = "💫";

export interface KimiProbeOptions {
  executor: CliExecutor;
  /** kimi-auth token; when set the billing API is used instead of the CLI */
  authToken: string | null;
  http?: HttpOptions;
  timeoutMs?: number;
}

export class KimiProbe implements UsageProbe {
  readonly id = "kimi" as const;
  private readonly options: KimiProbeOptions;

  constructor(options: KimiProbeOptions) {
    this.options = options;
  }

  get mode(): "api" | "cli" {
    return this.options.authToken ? "api" : "cli";
  }

  async isAvailable(): Promise<boolean> {
    if (this.mode === "api") return true;
    return (await this.options.executor.locate("kimi")) !== null;
  }

  probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const token = this.options.authToken;
    return token ? this.probeApi(token, signal) : this.probeCli(signal);
  }

  private async probeCli(signal?: AbortSignal): Promise<UsageSnapshot> {
    let output: string;
    try {
      const result = await this.options.executor.execute({
        binary: "kimi",
        timeoutMs: this.options.timeoutMs ?? 15_000,
        autoResponses: { [PROMPT_GLYPH]: "/usage\r" },
        signal,
      });
      output = renderTerminal(result.output);
    } catch (err) {
      throw classifyRunError(err);
    }
    return parseKimiCliUsage(output);
  }

  private async probeApi(token: string, signal?: AbortSignal): Promise<UsageSnapshot> {
    const response = await sendRequest(
      KIMI_USAGES_URL,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "*/*",
          Authorization: `Bearer ${token}`,
          Cookie: `kimi-auth=${token}`,
          Origin: "https://www.kimi.com",
          Referer: "https://www.kimi.com/code/console",
          "connect-protocol-version": "1",
          "x-msh-platform": "web",
          "r-timezone": Intl.DateTimeFormat().resolvedOptions().timeZone,
        },
        body: JSON.stringify({ scope: ["FEATURE_CODING"] }),
      },
      { ...this.options.http, signal: signal ?? this.options.http?.signal },
    );

    if (response.status === 401 || response.status === 403) {
      console.warn(`[Kimi] Authentication error (HTTP ${response.status})`);
      throw ProbeError.of("authenticationRequired");
    }
    if (!response.ok) {
      const body = await response.text();
      debug("kimi", `HTTP ${response.status}:`, body.slice(0, 500));
      throw ProbeError.executionFailed(`Kimi API returned HTTP ${response.status}`);
    }
    return parseKimiUsages(await readJson(response));
  }
}
