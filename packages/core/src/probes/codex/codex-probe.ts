import type { UsageSnapshot } from "@usagebar/shared";
import { CliRunError } from "../../cli/cli-run-error.js";
import type { CliExecutor } from "../../cli/pty-executor.js";
import { debug } from "../../utils/debug.js";
import { renderTerminal } from "../../utils/terminal.js";
import { ProbeError } from "../probe-error.js";
import { classifyRunError, type UsageProbe } from "../usage-probe.js";
import { parseRateLimitsResponse, rateLimitsToSnapshot, type CodexRateLimits } from "./codex-rate-limits.js";
import { parseCodexStatus } from "./codex-status-parser.js";
import { stdioTransportFactory, type RpcTransport, type RpcTransportFactory } from "./rpc-transport.js";

const CLIENT_INFO = { name: "usagebar", version: "0.1.0" };

export interface CodexProbeOptions {
  executor: CliExecutor;
  transportFactory?: RpcTransportFactory;
  timeoutMs?: number;
}

/** Waits for the reply to `id`, skipping notifications the server interleaves */
async function receiveReply(transport: RpcTransport, id: number): Promise<unknown> {
  for (;;) {
    const message = await transport.receive();
    if (typeof message === "object" && message !== null && "id" in message && message.id === id) {
      return message;
    }
    debug("codex-rpc", "skipping message", JSON.stringify(message).slice(0, 200));
  }
}

/**
 * Reads Codex rate limits through `codex app-server`, falling back to the
 * TUI's `/status` screen when the RPC route fails.
 */
export class CodexProbe implements UsageProbe {
  readonly id = "codex" as const;
  private readonly options: CodexProbeOptions;

  constructor(options: CodexProbeOptions) {
    this.options = options;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.options.executor.locate("codex")) !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const executable = await this.options.executor.locate("codex");
    if (!executable) throw ProbeError.cliNotFound("codex");

    let limits: CodexRateLimits;
    try {
      limits = await this.fetchOverRpc(executable, signal);
    } catch (err) {
      if (signal?.aborted) throw classifyRunError(new CliRunError("cancelled", "codex"));
      console.warn("[Codex] RPC read failed, trying /status:", err instanceof Error ? err.message : err);
      return this.readStatusScreen(signal);
    }
    return rateLimitsToSnapshot(limits);
  }

  private async fetchOverRpc(executable: string, signal?: AbortSignal): Promise<CodexRateLimits> {
    if (signal?.aborted) throw new CliRunError("cancelled", "codex");
    const transport = (this.options.transportFactory ?? stdioTransportFactory)(executable, ["app-server"]);
    const onAbort = () => {
      debug("codex-rpc", "cancelled, closing app-server");
      transport.close();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      await transport.send({ id: 1, method: "initialize", params: { clientInfo: CLIENT_INFO } });
      await receiveReply(transport, 1);
      await transport.send({ method: "initialized" });
      await transport.send({ id: 2, method: "account/rateLimits/read", params: {} });
      return parseRateLimitsResponse(await receiveReply(transport, 2));
    } finally {
      signal?.removeEventListener("abort", onAbort);
      transport.close();
    }
  }

  private async readStatusScreen(signal?: AbortSignal): Promise<UsageSnapshot> {
    let output: string;
    try {
      const result = await this.options.executor.execute({
        binary: "codex",
        args: ["-s", "read-only", "-a", "untrusted"],
        input: "/status\r",
        timeoutMs: this.options.timeoutMs ?? 20_000,
        signal,
      });
      output = renderTerminal(result.output);
    } catch (err) {
      throw classifyRunError(err);
    }
    return parseCodexStatus(output);
  }
}
