/** Types for coding-assistant sessions observed through lifecycle hooks. */

export type SessionPhase = "active" | "subagentsWorking" | "stopped" | "ended";

export type HookEventName =
  | "SessionStart"
  | "SessionEnd"
  | "TaskCompleted"
  | "SubagentStart"
  | "SubagentStop"
  | "Stop";

export interface HookEvent {
  sessionId: string;
  eventName: HookEventName;
  cwd: string;
  receivedAt: Date;
}

export interface SessionSummary {
  id: string;
  cwd: string;
  phase: SessionPhase;
  activeSubagentCount: number;
  completedTaskCount: number;
  startedAt: string;
  endedAt?: string;
}
