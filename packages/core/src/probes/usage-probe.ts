import type { ProviderId, UsageSnapshot } from "@usagebar/shared";
import { CliRunError } from "../cli/cli-run-error.js";
import { ProbeError, toProbeError } from "./probe-error.js";

/** One provider's "probe now" entry point */
export interface UsageProbe {
  readonly id: ProviderId;
  isAvailable(): Promise<boolean>;
  probe(signal?: AbortSignal): Promise<UsageSnapshot>;
}

/** Translates process-level failures into the probe taxonomy */
export function classifyRunError(err: unknown): ProbeError {
  if (err instanceof CliRunError) {
    switch (err.failure) {
      case "binaryNotFound":
        return ProbeError.cliNotFound(err.binary);
      case "timedOut":
        return ProbeError.of("timeout");
      case "launchFailed":
      case "cancelled":
        return ProbeError.executionFailed(err.message);
    }
  }
  return toProbeError(err);
}
