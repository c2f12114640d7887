import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ClaudeCredentialStore } from "../../credentials/claude-credential-store.js";
import { CredentialManager } from "../../credentials/credential-manager.js";
import { createClaudeRefresher } from "../../credentials/token-refreshers.js";
import { headerOf, json, rejection, thrown, urlOf } from "../../testing/helpers.js";
import { CLAUDE_USAGE_URL, ClaudeApiProbe, parseClaudeApiUsage, tierForSubscription } from "./claude-api-probe.js";

const HOUR = 60 * 60 * 1000;

let home: string;

function writeCredentials(oauth: Record<string, unknown>): void {
  mkdirSync(join(home, ".claude"), { recursive: true });
  writeFileSync(join(home, ".claude", ".credentials.json"), JSON.stringify({ claudeAiOauth: oauth }));
}

function createProbe(respond: (url: string, init?: RequestInit) => Response) {
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => respond(urlOf(input), init));
  const store = new ClaudeCredentialStore({ homeDir: home, env: {} });
  const credentials = new CredentialManager({
    label: "Claude API",
    store,
    refresher: createClaudeRefresher({ fetch: fetchMock }),
  });
  const probe = new ClaudeApiProbe({ store, credentials, http: { fetch: fetchMock } });
  return { probe, fetchMock };
}

beforeEach(() => {
  home = mkdtempSync(join(tmpdir(), "usagebar-claude-api-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  rmSync(home, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("parseClaudeApiUsage", () => {
  it("turns utilization into remaining percentages", () => {
    const snapshot = parseClaudeApiUsage(
      {
        five_hour: { utilization: 25.5, resets_at: "2025-01-15T10:00:00Z" },
        seven_day: { utilization: 45, resets_at: "2025-01-20T00:00:00Z" },
        seven_day_sonnet: { utilization: 30 },
        seven_day_opus: { utilization: 60 },
      },
      "claude_max",
    );

    expect(snapshot.accountTier).toBe("Claude Max");
    expect(snapshot.quotas.map((q) => [q.quotaType, q.percentRemaining])).toEqual([
      [{ kind: "session" }, 74.5],
      [{ kind: "weekly" }, 55],
      [{ kind: "modelSpecific", model: "sonnet" }, 70],
      [{ kind: "modelSpecific", model: "opus" }, 40],
    ]);
    expect(snapshot.quotas[0]?.resetsAt).toEqual(new Date("2025-01-15T10:00:00Z"));
    expect(snapshot.quotas[2]?.resetsAt).toBeNull();
  });

  it("keeps utilization past the limit as a negative remainder", () => {
    const snapshot = parseClaudeApiUsage({ five_hour: { utilization: 120 } }, null);
    expect(snapshot.quotas[0]?.percentRemaining).toBe(-20);
  });

  it("converts extra usage credits from cents to dollars", () => {
    const snapshot = parseClaudeApiUsage(
      {
        five_hour: { utilization: 10 },
        extra_usage: { is_enabled: true, used_credits: 2672, monthly_limit: 5000 },
      },
      "claude_pro",
    );

    expect(snapshot.accountTier).toBe("Claude Pro");
    expect(snapshot.costUsage).toEqual({ spent: 26.72, budget: 50, currency: "USD" });
  });

  it("ignores disabled extra usage", () => {
    const snapshot = parseClaudeApiUsage(
      { extra_usage: { is_enabled: false, used_credits: 100, monthly_limit: 1000 } },
      null,
    );
    expect(snapshot.costUsage).toBeUndefined();
    expect(snapshot.accountTier).toBeUndefined();
  });

  it("accepts an empty body as a snapshot without quotas", () => {
    expect(parseClaudeApiUsage({}, null).quotas).toEqual([]);
  });

  it("rejects a body of the wrong shape", () => {
    expect(thrown(() => parseClaudeApiUsage({ five_hour: { utilization: "high" } }, null))).toMatchObject({
      code: "parseFailed",
    });
  });
});

describe("tierForSubscription", () => {
  it.each([
    ["claude_max", "Claude Max"],
    ["pro", "Claude Pro"],
    ["claude_team", "Claude Team"],
    ["enterprise", "Claude Enterprise"],
    ["free", null],
    [null, null],
  ])("%s -> %s", (input, expected) => {
    expect(tierForSubscription(input)).toBe(expected);
  });
});

describe("ClaudeApiProbe", () => {
  it("sends the OAuth headers and parses the response", async () => {
    writeCredentials({ accessToken: "test-token", expiresAt: Date.now() + HOUR, subscriptionType: "claude_max" });
    const { probe, fetchMock } = createProbe(() =>
      json(200, { five_hour: { utilization: 20, resets_at: "2025-01-15T10:00:00Z" } }),
    );

    const snapshot = await probe.probe();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(input).toBe(CLAUDE_USAGE_URL);
    expect(headerOf(init, "Authorization")).toBe("Bearer test-token");
    expect(headerOf(init, "anthropic-beta")).toBe("oauth-2025-04-20");
    expect(snapshot.accountTier).toBe("Claude Max");
    expect(snapshot.quotas[0]?.percentRemaining).toBe(80);
  });

  it("reports sessionExpired when a token without refresh token is rejected", async () => {
    writeCredentials({ accessToken: "test-token", expiresAt: Date.now() + HOUR });
    const { probe } = createProbe(() => json(401, { error: "unauthorized" }));

    expect(await rejection(probe.probe())).toMatchObject({ code: "sessionExpired" });
  });

  it("reports other HTTP failures as executionFailed", async () => {
    writeCredentials({ accessToken: "test-token", expiresAt: Date.now() + HOUR });
    const { probe } = createProbe(() => json(500, {}));

    expect(await rejection(probe.probe())).toMatchObject({
      code: "executionFailed",
      message: "Probe failed: HTTP 500",
    });
  });

  it("is unavailable and requires authentication without credentials", async () => {
    const { probe, fetchMock } = createProbe(() => json(200, {}));

    expect(await probe.isAvailable()).toBe(false);
    expect(await rejection(probe.probe())).toMatchObject({ code: "authenticationRequired" });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
