import type { HookEvent, SessionSummary } from "@usagebar/shared";
import { debug } from "../utils/debug.js";
import { Session } from "./session.js";

export interface SessionState {
  active: SessionSummary | null;
  recent: SessionSummary[];
}

type ChangeListener = (state: SessionState) => void;

export const DEFAULT_MAX_RECENT_SESSIONS = 10;

/**
 * Single owner of session state, fed one hook event at a time.
 *
 * `process` runs to completion synchronously, so events are applied strictly
 * in arrival order. Readers get summaries, never the live sessions.
 */
export class SessionMonitor {
  private readonly maxRecent: number;
  private active: Session | null = null;
  private recent: Session[] = [];
  private listeners: ChangeListener[] = [];

  constructor(maxRecent: number = DEFAULT_MAX_RECENT_SESSIONS) {
    this.maxRecent = maxRecent;
  }

  get activeSession(): SessionSummary | null {
    return this.active?.toSummary() ?? null;
  }

  get recentSessions(): SessionSummary[] {
    return this.recent.map((s) => s.toSummary());
  }

  get hasActiveSession(): boolean {
    return this.active !== null;
  }

  /** Applies one event; returns whether it changed anything */
  process(event: HookEvent): boolean {
    if (event.eventName === "SessionStart") {
      if (this.active) this.endActive(event.receivedAt);
      this.active = new Session(event.sessionId, event.cwd, event.receivedAt);
      this.emit();
      return true;
    }

    const session = this.active;
    if (!session || session.id !== event.sessionId) {
      debug("sessions", `ignoring ${event.eventName} for unknown session ${event.sessionId}`);
      return false;
    }

    switch (event.eventName) {
      case "SessionEnd":
        this.endActive(event.receivedAt);
        break;
      case "TaskCompleted":
        session.taskCompleted();
        break;
      case "SubagentStart":
        session.subagentStarted();
        break;
      case "SubagentStop":
        session.subagentStopped();
        break;
      case "Stop":
        session.stop();
        break;
    }
    this.emit();
    return true;
  }

  /** Forgets the active session and the history */
  clear(): void {
    this.active = null;
    this.recent = [];
    this.emit();
  }

  onChange(listener: ChangeListener): void {
    this.listeners.push(listener);
  }

  offChange(listener: ChangeListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  private endActive(at: Date): void {
    const session = this.active;
    if (!session) return;
    session.end(at);
    this.recent = [session, ...this.recent].slice(0, this.maxRecent);
    this.active = null;
  }

  private emit(): void {
    if (this.listeners.length === 0) return;
    const state: SessionState = { active: this.activeSession, recent: this.recentSessions };
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (err) {
        console.error("[Sessions] Change listener failed:", err);
      }
    }
  }
}
