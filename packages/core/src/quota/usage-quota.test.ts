import { describe, it, expect } from "vitest";
import type { QuotaStatus, UsageQuota } from "@usagebar/shared";
import {
  QuotaTypes,
  createQuota,
  displayPercent,
  displayProgressPercent,
  expectedProgressPercent,
  formatResetCountdown,
  needsAttention,
  paceInsight,
  pacePercent,
  paceStatus,
  percentTimeElapsed,
  percentUsed,
  quotaStatus,
  resetDescription,
  windowDurationMs,
} from "./usage-quota.js";
import { createSnapshot, lowestQuota, overallStatus, quotaOfType } from "./usage-snapshot.js";

const NOW = new Date("2026-03-10T12:00:00Z");
const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

function quota(percentRemaining: number, overrides: Partial<UsageQuota> = {}): UsageQuota {
  return createQuota({
    percentRemaining,
    quotaType: QuotaTypes.session,
    providerId: "claude",
    ...overrides,
  });
}

describe("createQuota", () => {
  it("caps remaining percentage at 100", () => {
    expect(quota(120).percentRemaining).toBe(100);
  });

  it("keeps negative values for over-quota usage", () => {
    const q = quota(-15);
    expect(q.percentRemaining).toBe(-15);
    expect(percentUsed(q)).toBe(115);
  });
});

describe("quotaStatus", () => {
  it("maps sample percentages to statuses", () => {
    expect(quotaStatus(65)).toBe("healthy");
    expect(quotaStatus(51)).toBe("healthy");
    expect(quotaStatus(50)).toBe("warning");
    expect(quotaStatus(35)).toBe("warning");
    expect(quotaStatus(20)).toBe("critical");
    expect(quotaStatus(5)).toBe("critical");
    expect(quotaStatus(0)).toBe("depleted");
    expect(quotaStatus(-10)).toBe("depleted");
  });

  it("is a monotonic step function over 0..100", () => {
    const severity: Record<QuotaStatus, number> = { depleted: 3, critical: 2, warning: 1, healthy: 0 };
    let previous = severity[quotaStatus(0)];
    for (let p = 0; p <= 100; p += 0.5) {
      const current = severity[quotaStatus(p)];
      expect(current).toBeLessThanOrEqual(previous);
      previous = current;
    }
  });

  it("accepts custom thresholds", () => {
    expect(quotaStatus(60, { healthyAbove: 70, warningAbove: 40 })).toBe("warning");
  });

  it("flags every status below healthy as needing attention", () => {
    expect(needsAttention(quota(10))).toBe(true);
    expect(needsAttention(quota(0))).toBe(true);
    expect(needsAttention(quota(40))).toBe(true);
    expect(needsAttention(quota(51))).toBe(false);
  });
});

describe("window durations", () => {
  it("knows session, weekly, model and monthly windows", () => {
    expect(windowDurationMs(QuotaTypes.session)).toBe(5 * HOUR);
    expect(windowDurationMs(QuotaTypes.weekly)).toBe(7 * DAY);
    expect(windowDurationMs(QuotaTypes.model("opus"))).toBe(7 * DAY);
    expect(windowDurationMs(QuotaTypes.timeLimit("Monthly"))).toBe(30 * DAY);
    expect(windowDurationMs(QuotaTypes.timeLimit("On-Demand"))).toBeNull();
  });
});

describe("pace", () => {
  it("reports behind when usage trails elapsed time", () => {
    const q = quota(50, { resetsAt: new Date(NOW.getTime() + HOUR) });
    expect(percentTimeElapsed(q, NOW)).toBe(80);
    expect(pacePercent(q, NOW)).toBe(-30);
    expect(paceStatus(q, NOW)).toBe("behind");
    expect(paceInsight(q, NOW)).toBe("30% below expected usage");
  });

  it("reports ahead when usage outruns elapsed time", () => {
    const q = quota(60, { quotaType: QuotaTypes.weekly, resetsAt: new Date(NOW.getTime() + 6 * DAY) });
    expect(paceStatus(q, NOW)).toBe("ahead");
    expect(paceInsight(q, NOW)).toBe("26% above expected usage");
  });

  it("treats small differences as on pace", () => {
    const q = quota(48, { quotaType: QuotaTypes.weekly, resetsAt: new Date(NOW.getTime() + 3.5 * DAY) });
    expect(percentTimeElapsed(q, NOW)).toBe(50);
    expect(paceStatus(q, NOW)).toBe("onPace");
    expect(paceInsight(q, NOW)).toBe("Right on track");
  });

  it("is symmetric around zero", () => {
    const ahead = quota(40, { quotaType: QuotaTypes.weekly, resetsAt: new Date(NOW.getTime() + 3.5 * DAY) });
    const behind = quota(60, { quotaType: QuotaTypes.weekly, resetsAt: new Date(NOW.getTime() + 3.5 * DAY) });
    expect(pacePercent(ahead, NOW)).toBe(10);
    expect(pacePercent(behind, NOW)).toBe(-10);
    expect(paceStatus(ahead, NOW)).toBe("ahead");
    expect(paceStatus(behind, NOW)).toBe("behind");
  });

  it("is unknown without a reset time", () => {
    const q = quota(50);
    expect(percentTimeElapsed(q, NOW)).toBeNull();
    expect(paceStatus(q, NOW)).toBe("unknown");
    expect(paceInsight(q, NOW)).toBeNull();
  });

  it("is unknown when the window length is unknown", () => {
    const q = quota(50, {
      quotaType: QuotaTypes.timeLimit("On-Demand"),
      resetsAt: new Date(NOW.getTime() + DAY),
    });
    expect(percentTimeElapsed(q, NOW)).toBeNull();
  });

  it("clamps elapsed time once the reset has passed", () => {
    const q = quota(50, { resetsAt: new Date(NOW.getTime() - HOUR) });
    expect(percentTimeElapsed(q, NOW)).toBe(100);
  });
});

describe("reset descriptions", () => {
  it("formats countdowns by magnitude", () => {
    expect(formatResetCountdown(2 * DAY + 3 * HOUR + 5 * 60_000)).toBe("Resets in 2d 3h");
    expect(formatResetCountdown(25 * HOUR)).toBe("Resets in 1d 1h");
    expect(formatResetCountdown(DAY + 30 * 60_000)).toBe("Resets in 24h 30m");
    expect(formatResetCountdown(4 * HOUR + 12 * 60_000)).toBe("Resets in 4h 12m");
    expect(formatResetCountdown(9 * 60_000 + 30_000)).toBe("Resets in 9m");
    expect(formatResetCountdown(30_000)).toBe("Resets soon");
  });

  it("falls back to the provider phrase without a reset instant", () => {
    expect(resetDescription(quota(50, { resetText: "Resets on 03/01" }), NOW)).toBe("Resets on 03/01");
  });

  it("uses the countdown when the instant is known", () => {
    const q = quota(50, { resetsAt: new Date(NOW.getTime() + 90 * 60_000), resetText: "ignored" });
    expect(resetDescription(q, NOW)).toBe("Resets in 1h 30m");
  });
});

describe("display modes", () => {
  // 4h of a 5h session window have passed
  const q = quota(30, { resetsAt: new Date(NOW.getTime() + HOUR) });

  it("shows remaining in remaining and pace modes, used in used mode", () => {
    expect(displayPercent(q, "remaining")).toBe(30);
    expect(displayPercent(q, "used")).toBe(70);
    expect(displayPercent(q, "pace")).toBe(30);
  });

  it("fills the bar the same way", () => {
    expect(displayProgressPercent(q, "remaining")).toBe(30);
    expect(displayProgressPercent(q, "used")).toBe(70);
    expect(displayProgressPercent(q, "pace")).toBe(30);
  });

  it("places the expected marker from elapsed time", () => {
    expect(expectedProgressPercent(q, "remaining", NOW)).toBe(20);
    expect(expectedProgressPercent(q, "pace", NOW)).toBe(20);
    expect(expectedProgressPercent(q, "used", NOW)).toBe(80);
  });

  it("has no expected marker without a reset instant", () => {
    expect(expectedProgressPercent(quota(30), "used", NOW)).toBeNull();
  });
});

describe("snapshot helpers", () => {
  const snapshot = createSnapshot({
    providerId: "claude",
    quotas: [
      quota(70),
      quota(15, { quotaType: QuotaTypes.weekly }),
      quota(40, { quotaType: QuotaTypes.model("opus") }),
    ],
    capturedAt: NOW,
    accountEmail: "dev@example.com",
    accountTier: null,
  });

  it("omits absent account fields", () => {
    expect(snapshot.accountEmail).toBe("dev@example.com");
    expect("accountTier" in snapshot).toBe(false);
  });

  it("finds the lowest quota and overall status", () => {
    expect(lowestQuota(snapshot)?.percentRemaining).toBe(15);
    expect(overallStatus(snapshot)).toBe("critical");
  });

  it("looks quotas up by type", () => {
    expect(quotaOfType(snapshot, QuotaTypes.model("opus"))?.percentRemaining).toBe(40);
    expect(quotaOfType(snapshot, QuotaTypes.model("sonnet"))).toBeUndefined();
  });

  it("treats an empty snapshot as healthy", () => {
    expect(overallStatus(createSnapshot({ providerId: "kiro", quotas: [] }))).toBe("healthy");
  });
});
