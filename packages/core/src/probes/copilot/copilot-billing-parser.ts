import { z } from "zod";
import type { UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { debug } from "../../utils/debug.js";
import { ProbeError } from "../probe-error.js";

/** Free and Pro plans get 50 premium requests a month */
export const DEFAULT_COPILOT_MONTHLY_LIMIT = 50;

const usageItemSchema = z.object({
  product: z.string().nullish(),
  model: z.string().nullish(),
  grossQuantity: z.number().nullish(),
  netQuantity: z.number().nullish(),
  netAmount: z.number().nullish(),
});

const billingResponseSchema = z.object({
  timePeriod: z.object({ year: z.number().int(), month: z.number().int().min(1).max(12) }),
  user: z.string().nullish(),
  usageItems: z.array(usageItemSchema),
});

export interface CopilotBillingOptions {
  username: string;
  monthlyLimit: number;
  /** Requests used this month, entered by hand for org-managed seats the API reports empty */
  manualUsage: number | null;
}

/**
 * Parses `GET /users/{username}/settings/billing/premium_request/usage`.
 * Usage is the gross quantity over every Copilot line item; the month
 * resets at the start of the next UTC month.
 */
export function parseCopilotBillingUsage(
  body: unknown,
  options: CopilotBillingOptions,
  now: Date = new Date(),
): UsageSnapshot {
  const parsed = billingResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw ProbeError.parseFailed(
      `Failed to parse billing response: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`,
    );
  }
  const { timePeriod, usageItems } = parsed.data;
  const copilotItems = usageItems.filter((item) => item.product?.toLowerCase().includes("copilot"));

  // Org-billed seats come back with no items at all
  const manual = options.manualUsage !== null || usageItems.length === 0;
  if (usageItems.length === 0) {
    console.info("[Copilot] Billing API returned no usage items (likely an org-managed subscription)");
  }

  const used = manual
    ? (options.manualUsage ?? 0)
    : copilotItems.reduce((sum, item) => sum + (item.grossQuantity ?? 0), 0);
  const limit = options.monthlyLimit;
  const remaining = Math.max(0, limit - used);
  debug("copilot", `${copilotItems.length} copilot items for ${timePeriod.month}/${timePeriod.year}, used ${used}/${limit}`);

  return createSnapshot({
    providerId: "copilot",
    quotas: [
      createQuota({
        percentRemaining: (remaining / limit) * 100,
        quotaType: QuotaTypes.timeLimit("Monthly"),
        providerId: "copilot",
        // timePeriod.month is 1-based, so this is the first of the following month
        resetsAt: new Date(Date.UTC(timePeriod.year, timePeriod.month, 1)),
        resetText: `${Math.round(used)}/${limit} requests${manual ? " (manual)" : ""}`,
      }),
    ],
    capturedAt: now,
    accountEmail: options.username,
  });
}
