import type { UsageSnapshot } from "@usagebar/shared";
import type { CliExecutor } from "../../cli/pty-executor.js";
import { renderTerminal } from "../../utils/terminal.js";
import { classifyRunError, type UsageProbe } from "../usage-probe.js";
import { parseKiroUsage } from "./kiro-usage-parser.js";

export class KiroProbe implements UsageProbe {
  readonly id = "kiro" as const;
  private readonly executor: CliExecutor;
  private readonly timeoutMs: number;

  constructor(options: { executor: CliExecutor; timeoutMs?: number }) {
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.executor.locate("kiro-cli")) !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    let output: string;
    try {
      const result = await this.executor.execute({
        binary: "kiro-cli",
        input: "/usage\n/quit\n",
        timeoutMs: this.timeoutMs,
        signal,
      });
      output = renderTerminal(result.output);
    } catch (err) {
      throw classifyRunError(err);
    }
    return parseKiroUsage(output);
  }
}
