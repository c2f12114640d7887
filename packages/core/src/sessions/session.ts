import type { SessionPhase, SessionSummary } from "@usagebar/shared";

const PHASE_LABELS: Record<SessionPhase, string> = {
  active: "Active",
  subagentsWorking: "Agents Working",
  stopped: "Stopped",
  ended: "Ended",
};

export function phaseLabel(phase: SessionPhase): string {
  return PHASE_LABELS[phase];
}

/** "45s", "12m 5s", "1h 5m" */
export function formatSessionDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

/**
 * One coding-assistant session as seen through its lifecycle hooks.
 *
 * Only the monitor mutates a session. Subagent events are ignored once the
 * session has stopped; nothing changes it after it has ended.
 */
export class Session {
  readonly id: string;
  readonly cwd: string;
  readonly startedAt: Date;
  private _phase: SessionPhase = "active";
  private _activeSubagentCount = 0;
  private _completedTaskCount = 0;
  private _endedAt: Date | null = null;

  constructor(id: string, cwd: string, startedAt: Date = new Date()) {
    this.id = id;
    this.cwd = cwd;
    this.startedAt = startedAt;
  }

  get phase(): SessionPhase {
    return this._phase;
  }

  get activeSubagentCount(): number {
    return this._activeSubagentCount;
  }

  get completedTaskCount(): number {
    return this._completedTaskCount;
  }

  get endedAt(): Date | null {
    return this._endedAt;
  }

  get isActive(): boolean {
    return this._phase !== "ended";
  }

  subagentStarted(): void {
    if (this._phase === "stopped" || this._phase === "ended") return;
    this._activeSubagentCount += 1;
    this.updatePhase();
  }

  subagentStopped(): void {
    if (this._phase === "stopped" || this._phase === "ended") return;
    this._activeSubagentCount = Math.max(0, this._activeSubagentCount - 1);
    this.updatePhase();
  }

  taskCompleted(): void {
    if (this._phase === "ended") return;
    this._completedTaskCount += 1;
  }

  stop(): void {
    if (this._phase === "ended") return;
    this._phase = "stopped";
    this._activeSubagentCount = 0;
  }

  end(at: Date = new Date()): void {
    if (this._phase === "ended") return;
    this._phase = "ended";
    this._activeSubagentCount = 0;
    this._endedAt = at;
  }

  durationMs(now: Date = new Date()): number {
    return (this._endedAt ?? now).getTime() - this.startedAt.getTime();
  }

  durationDescription(now: Date = new Date()): string {
    return formatSessionDuration(this.durationMs(now));
  }

  toSummary(): SessionSummary {
    const summary: SessionSummary = {
      id: this.id,
      cwd: this.cwd,
      phase: this._phase,
      activeSubagentCount: this._activeSubagentCount,
      completedTaskCount: this._completedTaskCount,
      startedAt: this.startedAt.toISOString(),
    };
    if (this._endedAt) summary.endedAt = this._endedAt.toISOString();
    return summary;
  }

  private updatePhase(): void {
    this._phase = this._activeSubagentCount > 0 ? "subagentsWorking" : "active";
  }
}
