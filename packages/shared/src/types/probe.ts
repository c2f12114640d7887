import type { ProviderId, UsageSnapshot } from "./quota.js";

export type ProbeErrorKind =
  | { kind: "cliNotFound"; binary: string }
  | { kind: "executionFailed"; reason: string }
  | { kind: "timeout" }
  | { kind: "authenticationRequired" }
  | { kind: "sessionExpired" }
  | { kind: "subscriptionRequired" }
  | { kind: "parseFailed"; reason: string }
  | { kind: "noData" }
  | { kind: "updateRequired" }
  | { kind: "folderTrustRequired" };

export type ProbeErrorCode = ProbeErrorKind["kind"];

/** Settled outcome of one provider's probe within a cycle */
export type ProbeResult =
  | { providerId: ProviderId; ok: true; snapshot: UsageSnapshot }
  | { providerId: ProviderId; ok: false; error: ProbeErrorKind; message: string };

/** Results of one "probe every provider now" call */
export interface ProbeCycle {
  cycleId: string;
  startedAt: Date;
  results: ProbeResult[];
}
