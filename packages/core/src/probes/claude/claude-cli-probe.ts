import { mkdirSync } from "node:fs";
import type { UsageSnapshot } from "@usagebar/shared";
import type { CliExecutor } from "../../cli/pty-executor.js";
import { renderTerminal } from "../../utils/terminal.js";
import { debug } from "../../utils/debug.js";
import { isProbeError } from "../probe-error.js";
import { classifyRunError, type UsageProbe } from "../usage-probe.js";
import { extractTrustFolder, parseClaudeCost, parseClaudeUsage } from "./claude-usage-parser.js";

export interface ClaudeCliProbeOptions {
  /** Executor that withholds CLAUDE_CODE_OAUTH_TOKEN so the CLI uses its own login */
  executor: CliExecutor;
  /** Dedicated folder the CLI runs in, so trust prompts concern only this folder */
  workingDirectory: string;
  timeoutMs?: number;
}

/** Reads quotas by driving `claude /usage`, falling back to `/cost` for API billing */
export class ClaudeCliProbe implements UsageProbe {
  readonly id = "claude" as const;
  private readonly options: ClaudeCliProbeOptions;

  constructor(options: ClaudeCliProbeOptions) {
    this.options = options;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.options.executor.locate("claude")) !== null;
  }

  async probe(signal?: AbortSignal): Promise<UsageSnapshot> {
    const usage = await this.run("/usage", signal);
    try {
      return parseClaudeUsage(usage);
    } catch (err) {
      if (isProbeError(err, "subscriptionRequired")) {
        debug("claude-cli", "no subscription quotas, reading /cost instead");
        return parseClaudeCost(await this.run("/cost", signal));
      }
      if (isProbeError(err, "folderTrustRequired")) {
        console.warn(`[Claude CLI] Trust prompt for ${extractTrustFolder(usage) ?? this.options.workingDirectory}`);
      }
      throw err;
    }
  }

  private async run(command: string, signal?: AbortSignal): Promise<string> {
    mkdirSync(this.options.workingDirectory, { recursive: true });
    try {
      const result = await this.options.executor.execute({
        binary: "claude",
        args: [command],
        timeoutMs: this.options.timeoutMs ?? 20_000,
        workingDirectory: this.options.workingDirectory,
        signal,
      });
      debug("claude-cli", `${command} exited with ${result.exitCode}`);
      return renderTerminal(result.output);
    } catch (err) {
      throw classifyRunError(err);
    }
  }
}
