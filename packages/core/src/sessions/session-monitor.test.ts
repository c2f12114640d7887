import { describe, it, expect, vi } from "vitest";
import type { HookEvent, HookEventName } from "@usagebar/shared";
import { formatSessionDuration, phaseLabel, Session } from "./session.js";
import { SessionMonitor } from "./session-monitor.js";

const T0 = new Date("2026-01-10T12:00:00Z");

function event(eventName: HookEventName, sessionId = "s1", offsetSeconds = 0): HookEvent {
  return { sessionId, eventName, cwd: "/work/app", receivedAt: new Date(T0.getTime() + offsetSeconds * 1000) };
}

describe("Session", () => {
  it("tracks subagents through the working phase", () => {
    const session = new Session("s1", "/work/app", T0);

    session.subagentStarted();
    session.subagentStarted();
    expect(session.phase).toBe("subagentsWorking");
    session.subagentStopped();
    session.subagentStopped();
    session.subagentStopped();

    expect(session.phase).toBe("active");
    expect(session.activeSubagentCount).toBe(0);
  });

  it("ignores subagent events after a stop but still counts tasks", () => {
    const session = new Session("s1", "/work/app", T0);
    session.subagentStarted();
    session.stop();

    session.subagentStarted();
    session.taskCompleted();

    expect(session.phase).toBe("stopped");
    expect(session.activeSubagentCount).toBe(0);
    expect(session.completedTaskCount).toBe(1);
  });

  it("does not change once ended", () => {
    const session = new Session("s1", "/work/app", T0);
    const endedAt = new Date(T0.getTime() + 65_000);
    session.end(endedAt);

    session.taskCompleted();
    session.stop();
    session.end(new Date(T0.getTime() + 999_000));

    expect(session.phase).toBe("ended");
    expect(session.completedTaskCount).toBe(0);
    expect(session.endedAt).toEqual(endedAt);
    expect(session.durationDescription()).toBe("1m 5s");
  });

  it("describes durations and phases", () => {
    expect(formatSessionDuration(45_000)).toBe("45s");
    expect(formatSessionDuration(725_000)).toBe("12m 5s");
    expect(formatSessionDuration(3_900_000)).toBe("1h 5m");
    expect(phaseLabel("subagentsWorking")).toBe("Agents Working");
    expect(new Session("s1", "/", T0).durationDescription(new Date(T0.getTime() + 9_500))).toBe("9s");
  });
});

describe("SessionMonitor", () => {
  it("walks a session from start to end", () => {
    const monitor = new SessionMonitor();

    monitor.process(event("SessionStart"));
    monitor.process(event("SubagentStart", "s1", 1));
    monitor.process(event("SubagentStart", "s1", 2));
    monitor.process(event("SubagentStop", "s1", 3));
    expect(monitor.activeSession).toMatchObject({ phase: "subagentsWorking", activeSubagentCount: 1 });

    monitor.process(event("TaskCompleted", "s1", 4));
    monitor.process(event("TaskCompleted", "s1", 5));
    monitor.process(event("Stop", "s1", 6));
    expect(monitor.activeSession).toMatchObject({ phase: "stopped", activeSubagentCount: 0 });

    monitor.process(event("SessionEnd", "s1", 7));
    expect(monitor.activeSession).toBeNull();
    expect(monitor.recentSessions).toEqual([
      {
        id: "s1",
        cwd: "/work/app",
        phase: "ended",
        activeSubagentCount: 0,
        completedTaskCount: 2,
        startedAt: "2026-01-10T12:00:00.000Z",
        endedAt: "2026-01-10T12:00:07.000Z",
      },
    ]);
  });

  it("ends the previous session when another starts", () => {
    const monitor = new SessionMonitor();
    monitor.process(event("SessionStart", "s1"));

    monitor.process(event("SessionStart", "s2", 30));

    expect(monitor.activeSession?.id).toBe("s2");
    expect(monitor.recentSessions.map((s) => [s.id, s.endedAt])).toEqual([["s1", "2026-01-10T12:00:30.000Z"]]);
  });

  it("ignores events for sessions it does not know", () => {
    const monitor = new SessionMonitor();
    monitor.process(event("SessionStart", "s1"));

    expect(monitor.process(event("TaskCompleted", "other"))).toBe(false);
    expect(monitor.process(event("SessionEnd", "other"))).toBe(false);
    expect(monitor.activeSession).toMatchObject({ id: "s1", completedTaskCount: 0 });
    expect(new SessionMonitor().process(event("Stop"))).toBe(false);
  });

  it("keeps only the newest concluded sessions", () => {
    const monitor = new SessionMonitor(3);

    for (let i = 1; i <= 5; i++) {
      monitor.process(event("SessionStart", `s${i}`, i * 10));
      monitor.process(event("SessionEnd", `s${i}`, i * 10 + 5));
    }

    expect(monitor.recentSessions.map((s) => s.id)).toEqual(["s5", "s4", "s3"]);
  });

  it("hands out copies rather than live sessions", () => {
    const monitor = new SessionMonitor();
    monitor.process(event("SessionStart"));
    const before = monitor.activeSession;

    monitor.process(event("TaskCompleted", "s1", 1));

    expect(before?.completedTaskCount).toBe(0);
    expect(monitor.activeSession?.completedTaskCount).toBe(1);
  });

  it("notifies listeners of each change and on clear", () => {
    const monitor = new SessionMonitor();
    const listener = vi.fn();
    monitor.onChange(listener);

    monitor.process(event("SessionStart"));
    monitor.process(event("Stop", "unknown"));
    monitor.clear();
    monitor.offChange(listener);
    monitor.process(event("SessionStart", "s2"));

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener).toHaveBeenLastCalledWith({ active: null, recent: [] });
    expect(monitor.hasActiveSession).toBe(true);
  });
});
