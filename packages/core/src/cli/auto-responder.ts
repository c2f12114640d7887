import { stripAnsi } from "../utils/terminal.js";

/**
 * Tracks scripted replies to interactive prompts.
 *
 * Each trigger is answered at most once, the first time it shows up in the
 * accumulated output.
 */
export class AutoResponder {
  private readonly responses: ReadonlyMap<string, string>;
  private readonly fired = new Set<string>();

  constructor(responses: Record<string, string> = {}) {
    this.responses = new Map(Object.entries(responses));
  }

  /** Replies owed for triggers that appeared since the last scan, in declaration order */
  scan(output: string): string[] {
    if (this.fired.size === this.responses.size) return [];
    const visible = stripAnsi(output);
    const replies: string[] = [];
    for (const [trigger, response] of this.responses) {
      if (this.fired.has(trigger) || !visible.includes(trigger)) continue;
      this.fired.add(trigger);
      replies.push(response);
    }
    return replies;
  }

  hasFired(trigger: string): boolean {
    return this.fired.has(trigger);
  }

  get pendingTriggers(): string[] {
    return [...this.responses.keys()].filter((t) => !this.fired.has(t));
  }
}
