import { z } from "zod";
import type { HookEvent } from "@usagebar/shared";
import { debug } from "../utils/debug.js";

const hookPayloadSchema = z.object({
  session_id: z.string().min(1),
  hook_event_name: z.enum(["SessionStart", "SessionEnd", "TaskCompleted", "SubagentStart", "SubagentStop", "Stop"]),
  cwd: z.string().catch(""),
});

/**
 * Decodes a hook payload as posted by the assistant's hook scripts.
 * Anything malformed or of an unknown event type yields null.
 */
export function parseHookEvent(raw: string | Uint8Array, receivedAt: Date = new Date()): HookEvent | null {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf-8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    debug("hooks", "payload is not JSON");
    return null;
  }

  const parsed = hookPayloadSchema.safeParse(json);
  if (!parsed.success) {
    debug("hooks", "unrecognized payload:", parsed.error.issues[0]?.message);
    return null;
  }

  return {
    sessionId: parsed.data.session_id,
    eventName: parsed.data.hook_event_name,
    cwd: parsed.data.cwd,
    receivedAt,
  };
}
