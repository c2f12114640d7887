import type { UsageSnapshot } from "@usagebar/shared";
import type { CliExecutor } from "../../cli/pty-executor.js";
import { debug } from "../../utils/debug.js";
import { stripAnsi } from "../../utils/terminal.js";
import { ProbeError } from "../probe-error.js";
import { classifyRunError, type UsageProbe } from "../usage-probe.js";
import { parseAmpUsage } from "./amp-usage-parser.js";

/** "u***@example.com" */
function redactEmail(email: string): string {
  const [name, domain] = email.split("@");
  return name && domain ? `${name.charAt(0)}***@${domain}` : "***";
}

export class AmpProbe implements UsageProbe {
  readonly id = "amp" as const;
  private readonly executor: CliExecutor;
  private readonly timeoutMs: number;

  constructor(options: { executor: CliExecutor; timeoutMs?: number }) {
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs ?? 8_000;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.executor.locate("amp")) !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    let output: string;
    try {
      const result = await this.executor.execute({
        binary: "amp",
        args: ["usage", "--no-color"],
        timeoutMs: this.timeoutMs,
        signal,
      });
      if (result.exitCode !== null && result.exitCode !== 0) {
        throw ProbeError.executionFailed(`amp usage exited with code ${result.exitCode}`);
      }
      output = stripAnsi(result.output).replace(/\r/g, "");
    } catch (err) {
      throw classifyRunError(err);
    }

    const snapshot = parseAmpUsage(output);
    debug("amp", `${snapshot.quotas.length} quotas, account ${snapshot.accountEmail ? redactEmail(snapshot.accountEmail) : "none"}`);
    return snapshot;
  }
}
