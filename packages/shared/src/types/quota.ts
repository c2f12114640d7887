/** Types for provider usage quotas and the snapshots that carry them. */

export type ProviderId =
  | "claude"
  | "codex"
  | "gemini"
  | "kimi"
  | "kiro"
  | "amp"
  | "minimax"
  | "cursor"
  | "copilot";

export type QuotaType =
  | { kind: "session" }
  | { kind: "weekly" }
  | { kind: "modelSpecific"; model: string }
  | { kind: "timeLimit"; label: string };

export type QuotaStatus = "healthy" | "warning" | "critical" | "depleted";

export type PaceStatus = "ahead" | "behind" | "onPace" | "unknown";

export type QuotaDisplayMode = "remaining" | "used" | "pace";

export interface UsageQuota {
  /** Capped at 100; negative means the limit has been exceeded */
  percentRemaining: number;
  quotaType: QuotaType;
  providerId: ProviderId;
  resetsAt: Date | null;
  /** Reset phrase exactly as the provider printed it */
  resetText: string | null;
}

export interface CostUsage {
  spent: number;
  budget: number | null;
  currency: string;
  /** Seconds of API time reported alongside the cost */
  apiDuration?: number;
  resetsAt?: Date | null;
  resetText?: string | null;
}

export interface UsageSnapshot {
  providerId: ProviderId;
  quotas: UsageQuota[];
  capturedAt: Date;
  accountEmail?: string;
  accountOrganization?: string;
  accountTier?: string;
  loginMethod?: string;
  costUsage?: CostUsage;
}
