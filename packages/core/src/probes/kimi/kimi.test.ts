import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { FakeExecutor } from "../../testing/fake-executor.js";
import { headerOf, json, rejection, thrown } from "../../testing/helpers.js";
import { KIMI_USAGES_URL, KimiProbe } from "./kimi-probe.js";
import { parseKimiCliUsage, parseKimiUsages, usageNumbers } from "./kimi-parsers.js";

const NOW = new Date("2026-01-10T12:00:00Z");

const CLI_PANEL = [
  "╭─────────────────────────────── API Usage ───────────────────────────────╮",
  "│  Weekly limit  ━━━━━━━━━━━━━━━━━━━━  100% left  (resets in 6d 23h 22m)  │",
  "│  5h limit      ━━━━━━━━━━━━━━━━━━━━  75% left  (resets in 4h 22m)       │",
  "╰─────────────────────────────────────────────────────────────────────────╯",
].join("\n");

const USAGES = {
  usages: [
    {
      scope: "FEATURE_CODING",
      detail: { limit: "2048", used: "214", remaining: "1834", resetTime: "2026-01-16T00:00:00.000Z" },
      limits: [
        {
          window: { duration: 300, timeUnit: "TIME_UNIT_MINUTE" },
          detail: { limit: "200", used: "139", remaining: "61", resetTime: "2026-01-10T15:30:00.000Z" },
        },
      ],
    },
  ],
};

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseKimiCliUsage", () => {
  it("reads weekly and 5h limits with relative resets", () => {
    const snapshot = parseKimiCliUsage(CLI_PANEL, NOW);

    expect(snapshot.quotas.map((q) => [q.quotaType.kind, q.percentRemaining, q.resetText])).toEqual([
      ["weekly", 100, "Resets in 6d 23h 22m"],
      ["session", 75, "Resets in 4h 22m"],
    ]);
    expect(snapshot.quotas[1]?.resetsAt).toEqual(new Date("2026-01-10T16:22:00Z"));
  });

  it("fails on output without a usage panel", () => {
    expect(thrown(() => parseKimiCliUsage("Welcome to Kimi CLI", NOW))).toMatchObject({ code: "parseFailed" });
  });
});

describe("parseKimiUsages", () => {
  it("reads the weekly quota, the 5h window and the tier", () => {
    const snapshot = parseKimiUsages(USAGES, NOW);

    expect(snapshot.accountTier).toBe("Moderato");
    const [weekly, session] = snapshot.quotas;
    expect(weekly?.quotaType).toEqual({ kind: "weekly" });
    expect(weekly?.percentRemaining).toBeCloseTo(89.55, 2);
    expect(weekly?.resetText).toBe("214/2048 requests");
    expect(session?.percentRemaining).toBe(30.5);
    expect(session?.resetText).toBe("139/200 requests (5h)");
    expect(session?.resetsAt).toEqual(new Date("2026-01-10T15:30:00.000Z"));
  });

  it("fails without the coding scope", () => {
    expect(thrown(() => parseKimiUsages({ usages: [] }))).toMatchObject({
      code: "parseFailed",
      message: "Failed to parse usage output: Missing FEATURE_CODING scope in response",
    });
  });
});

describe("usageNumbers", () => {
  it("derives whichever count is missing", () => {
    expect(usageNumbers({ limit: "100", used: "30", resetTime: "" })).toEqual({ used: 30, limit: 100, remaining: 70 });
    expect(usageNumbers({ limit: "100", remaining: "10", resetTime: "" })).toEqual({ used: 90, limit: 100, remaining: 10 });
    expect(usageNumbers({ limit: "100", resetTime: "" })).toEqual({ used: 0, limit: 100, remaining: 100 });
  });
});

describe("KimiProbe", () => {
  it("answers the prompt glyph with /usage in CLI mode", async () => {
    const executor = new FakeExecutor().on("kimi", { output: CLI_PANEL, exitCode: null });
    const probe = new KimiProbe({ executor, authToken: null });

    const snapshot = await probe.probe();

    expect(probe.mode).toBe("cli");
    expect(executor.requests[0]?.autoResponses).toEqual({ "💫": "/usage\r" });
    expect(snapshot.quotas).toHaveLength(2);
  });

  it("posts the coding scope with the auth cookie in API mode", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json(200, USAGES));
    const probe = new KimiProbe({ executor: new FakeExecutor(), authToken: "test-token", http: { fetch: fetchMock } });

    const snapshot = await probe.probe();

    const [input, init] = fetchMock.mock.calls[0] ?? [];
    expect(input).toBe(KIMI_USAGES_URL);
    expect(init?.body).toBe('{"scope":["FEATURE_CODING"]}');
    expect(headerOf(init, "Cookie")).toBe("kimi-auth=test-token");
    expect(snapshot.accountTier).toBe("Moderato");
    expect(await probe.isAvailable()).toBe(true);
  });

  it("maps a rejected token to authenticationRequired", async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => json(401, {}));
    const probe = new KimiProbe({ executor: new FakeExecutor(), authToken: "test-token", http: { fetch: fetchMock } });

    expect(await rejection(probe.probe())).toMatchObject({ code: "authenticationRequired" });
  });
});
