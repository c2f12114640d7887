import { describe, it, expect } from "vitest";
import { FakeExecutor } from "../../testing/fake-executor.js";
import { rejection, thrown } from "../../testing/helpers.js";
import { KiroProbe } from "./kiro-probe.js";
import { parseKiroUsage } from "./kiro-usage-parser.js";

const NOW = new Date(2026, 0, 10, 12, 0);

const USAGE = [
  "Estimated Usage | resets on 03/01 | KIRO FREE",
  "",
  "🎁 Bonus credits: 125/500 credits used, expires in 29 days",
  "",
  "Credits (10.00 of 50 covered in plan)",
  "████████████████████████████████████████ 20%",
].join("\n");

describe("parseKiroUsage", () => {
  it("reads bonus and monthly credits", () => {
    const snapshot = parseKiroUsage(USAGE, NOW);

    expect(snapshot.accountTier).toBe("KIRO FREE");
    expect(snapshot.quotas.map((q) => [q.quotaType, q.percentRemaining, q.resetText])).toEqual([
      [{ kind: "weekly" }, 75, "Expires in 29 days"],
      [{ kind: "timeLimit", label: "Monthly" }, 80, "Resets on 03/01"],
    ]);
    expect(snapshot.quotas[0]?.resetsAt?.getTime()).toBe(NOW.getTime() + 29 * 24 * 60 * 60 * 1000);
    expect(snapshot.quotas[1]?.resetsAt).toEqual(new Date(2026, 2, 1));
  });

  it("rolls a month/day that already passed into next year", () => {
    const snapshot = parseKiroUsage("Estimated Usage | resets on 01/01 | KIRO PRO\nCredits (0.00 of 1000 covered in plan)", NOW);
    expect(snapshot.quotas[0]?.resetsAt).toEqual(new Date(2027, 0, 1));
    expect(snapshot.quotas[0]?.percentRemaining).toBe(100);
  });

  it("fails on output without credits", () => {
    expect(thrown(() => parseKiroUsage("Welcome to Kiro", NOW))).toMatchObject({ code: "parseFailed" });
  });
});

describe("KiroProbe", () => {
  it("types /usage then /quit", async () => {
    const executor = new FakeExecutor().on("kiro-cli", { output: USAGE, exitCode: 0 });

    const snapshot = await new KiroProbe({ executor }).probe();

    expect(executor.requests[0]?.input).toBe("/usage\n/quit\n");
    expect(snapshot.quotas).toHaveLength(2);
  });

  it("reports a missing binary", async () => {
    const probe = new KiroProbe({ executor: new FakeExecutor() });
    expect(await probe.isAvailable()).toBe(false);
    expect(await rejection(probe.probe())).toMatchObject({ code: "cliNotFound" });
  });
});
