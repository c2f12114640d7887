import { z } from "zod";
import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { debug } from "../../utils/debug.js";
import { ProbeError } from "../probe-error.js";

export type MiniMaxRegion = "international" | "china";

const API_BASE: Record<MiniMaxRegion, string> = {
  international: "https://api.minimax.io",
  china: "https://api.minimaxi.com",
};

export function codingPlanRemainsUrl(region: MiniMaxRegion): string {
  return `${API_BASE[region]}/v1/api/openplatform/coding_plan/remains`;
}

const remainsResponseSchema = z.object({
  base_resp: z.object({
    status_code: z.number(),
    status_msg: z.string().nullish(),
  }),
  model_remains: z
    .array(
      z.object({
        model_name: z.string(),
        current_interval_total_count: z.number().int(),
        // Despite the name this is the count still available, not the count used
        current_interval_usage_count: z.number().int(),
        remains_time: z.number().nullish(),
        end_time: z.number().nullish(),
      }),
    )
    .nullish(),
});

export function parseMiniMaxRemains(body: unknown, now: Date = new Date()): UsageSnapshot {
  const parsed = remainsResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw ProbeError.parseFailed(`Invalid JSON: ${parsed.error.issues[0]?.message ?? "unexpected shape"}`);
  }

  const { base_resp: status, model_remains: models } = parsed.data;
  if (status.status_code !== 0) {
    const message = status.status_msg ?? "Unknown error";
    console.error(`[MiniMax] API error: ${status.status_code} - ${message}`);
    throw ProbeError.executionFailed(`MiniMax API error: ${message}`);
  }
  if (!models || models.length === 0) {
    debug("minimax", "empty model_remains");
    throw ProbeError.of("noData");
  }

  const quotas: UsageQuota[] = models.map((model) => {
    const total = model.current_interval_total_count;
    const remaining = Math.min(Math.max(model.current_interval_usage_count, 0), total);
    return createQuota({
      percentRemaining: total > 0 ? (remaining / total) * 100 : 0,
      quotaType: QuotaTypes.model(model.model_name),
      providerId: "minimax",
      // end_time is epoch milliseconds
      resetsAt: typeof model.end_time === "number" ? new Date(model.end_time) : null,
      resetText: `${total - remaining}/${total} requests`,
    });
  });

  return createSnapshot({ providerId: "minimax", quotas, capturedAt: now });
}
