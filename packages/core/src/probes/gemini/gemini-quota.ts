import { z } from "zod";
import type { UsageQuota, UsageSnapshot } from "@usagebar/shared";
import { createQuota, QuotaTypes } from "../../quota/usage-quota.js";
import { createSnapshot } from "../../quota/usage-snapshot.js";
import { ProbeError } from "../probe-error.js";

const bucketSchema = z.object({
  modelId: z.string().nullish(),
  remainingFraction: z.number().nullish(),
  resetTime: z.string().nullish(),
  tokenType: z.string().nullish(),
});

const quotaResponseSchema = z.object({
  buckets: z.array(bucketSchema).nullish(),
});

const projectsResponseSchema = z.object({
  projects: z
    .array(
      z.object({
        projectId: z.string(),
        labels: z.record(z.string()).nullish(),
      }),
    )
    .default([]),
});

export type GeminiProject = z.infer<typeof projectsResponseSchema>["projects"][number];

/**
 * Picks the project whose quota the Gemini CLI draws from: the auto-created
 * "gen-lang-client" project first, then one labelled for generative language.
 */
export function pickQuotaProject(body: unknown): string | null {
  const parsed = projectsResponseSchema.safeParse(body);
  if (!parsed.success) return null;
  const { projects } = parsed.data;
  const generated = projects.find((p) => p.projectId.startsWith("gen-lang-client"));
  if (generated) return generated.projectId;
  return projects.find((p) => p.labels?.["generative-language"] !== undefined)?.projectId ?? null;
}

/** Folds quota buckets into one model quota per model, keeping each model's lowest fraction */
export function parseGeminiQuota(body: unknown, now: Date = new Date()): UsageSnapshot {
  const parsed = quotaResponseSchema.safeParse(body);
  if (!parsed.success) throw ProbeError.parseFailed("Unexpected quota response");
  const buckets = parsed.data.buckets ?? [];
  if (buckets.length === 0) throw ProbeError.parseFailed("No quota buckets in response");

  const lowest = new Map<string, { fraction: number; resetTime: string | null }>();
  for (const bucket of buckets) {
    if (!bucket.modelId || typeof bucket.remainingFraction !== "number") continue;
    const existing = lowest.get(bucket.modelId);
    if (!existing || bucket.remainingFraction < existing.fraction) {
      lowest.set(bucket.modelId, { fraction: bucket.remainingFraction, resetTime: bucket.resetTime ?? null });
    }
  }

  const quotas: UsageQuota[] = [...lowest.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([model, { fraction, resetTime }]) => {
      const resetsAt = resetTime ? new Date(resetTime) : null;
      const valid = resetsAt !== null && !Number.isNaN(resetsAt.getTime());
      return createQuota({
        percentRemaining: fraction * 100,
        quotaType: QuotaTypes.model(model),
        providerId: "gemini",
        resetsAt: valid ? resetsAt : null,
        resetText: resetTime && !valid ? `Resets ${resetTime}` : null,
      });
    });

  if (quotas.length === 0) throw ProbeError.parseFailed("No valid quotas found");
  return createSnapshot({ providerId: "gemini", quotas, capturedAt: now });
}
