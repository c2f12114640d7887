import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { HookEvent } from "@usagebar/shared";
import { consumeEvents, EventChannel } from "./event-channel.js";
import { parseHookEvent } from "./hook-event-parser.js";
import { DEFAULT_HOOK_PORT, portFilePath, readPort, removePortFile, writePort } from "./port-discovery.js";
import { SessionMonitor } from "./session-monitor.js";

const AT = new Date("2026-01-10T12:00:00Z");

describe("parseHookEvent", () => {
  it("decodes a hook payload", () => {
    const raw = JSON.stringify({
      session_id: "abc-123",
      hook_event_name: "SubagentStart",
      cwd: "/work/app",
      transcript_path: "/tmp/t.jsonl",
    });

    expect(parseHookEvent(raw, AT)).toEqual({
      sessionId: "abc-123",
      eventName: "SubagentStart",
      cwd: "/work/app",
      receivedAt: AT,
    });
  });

  it("defaults a missing cwd to empty", () => {
    const raw = new TextEncoder().encode('{"session_id":"abc","hook_event_name":"Stop"}');

    expect(parseHookEvent(raw, AT)?.cwd).toBe("");
  });

  it("returns null for malformed or unknown payloads", () => {
    expect(parseHookEvent("not json", AT)).toBeNull();
    expect(parseHookEvent("[]", AT)).toBeNull();
    expect(parseHookEvent('{"session_id":"abc","hook_event_name":"PreToolUse"}', AT)).toBeNull();
    expect(parseHookEvent('{"hook_event_name":"Stop"}', AT)).toBeNull();
  });
});

describe("port discovery", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "usagebar-port-"));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it("writes and reads the port beside the assistant's config", () => {
    writePort(home, DEFAULT_HOOK_PORT);

    expect(portFilePath(home)).toBe(join(home, ".claude", "usagebar-hook-port"));
    expect(readPort(home)).toBe(19847);
  });

  it("trims whitespace and rejects non-integers", () => {
    mkdirSync(join(home, ".claude"));
    writeFileSync(portFilePath(home), " 4242\n");
    expect(readPort(home)).toBe(4242);

    writeFileSync(portFilePath(home), "port");
    expect(readPort(home)).toBeNull();
  });

  it("removes the file and tolerates it being gone", () => {
    writePort(home, 5000);

    removePortFile(home);
    removePortFile(home);

    expect(readPort(home)).toBeNull();
  });

  it("refuses invalid ports", () => {
    expect(() => writePort(home, 70000)).toThrow("Invalid port: 70000");
  });
});

describe("EventChannel", () => {
  const start: HookEvent = { sessionId: "s1", eventName: "SessionStart", cwd: "/w", receivedAt: AT };
  const task: HookEvent = { sessionId: "s1", eventName: "TaskCompleted", cwd: "/w", receivedAt: AT };
  const stray: HookEvent = { sessionId: "s9", eventName: "Stop", cwd: "/w", receivedAt: AT };

  it("feeds queued and later events into the monitor until closed", async () => {
    const channel = new EventChannel<HookEvent>();
    const monitor = new SessionMonitor();
    channel.send(start);

    const done = consumeEvents(channel, monitor);
    channel.send(task);
    channel.send(stray);
    channel.close();

    expect(await done).toBe(2);
    expect(monitor.activeSession?.completedTaskCount).toBe(1);
    expect(channel.send(task)).toBe(false);
  });

  it("allows a single consumer", () => {
    const channel = new EventChannel<HookEvent>();
    channel[Symbol.asyncIterator]();

    expect(() => channel[Symbol.asyncIterator]()).toThrow("EventChannel supports a single consumer");
  });
});
