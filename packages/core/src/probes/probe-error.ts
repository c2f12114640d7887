import type { ProbeErrorCode, ProbeErrorKind } from "@usagebar/shared";

/** Maps a failure kind to the message shown next to the provider */
export function describeProbeError(kind: ProbeErrorKind): string {
  switch (kind.kind) {
    case "cliNotFound":
      return `${kind.binary} CLI not found. Please install it and ensure it's on your PATH.`;
    case "executionFailed":
      return `Probe failed: ${kind.reason}`;
    case "timeout":
      return "Command timed out. Try again or check your connection.";
    case "authenticationRequired":
      return "Authentication required. Please log in to the CLI.";
    case "sessionExpired":
      return "Session expired. Run `claude` in terminal to log in again.";
    case "subscriptionRequired":
      return "Usage quotas are only available for subscription plans.";
    case "parseFailed":
      return `Failed to parse usage output: ${kind.reason}`;
    case "noData":
      return "No usage data available.";
    case "updateRequired":
      return "CLI update required. Update the tool and try again.";
    case "folderTrustRequired":
      return "Folder trust required. Run the CLI once in this folder and accept the trust prompt.";
  }
}

export class ProbeError extends Error {
  readonly kind: ProbeErrorKind;
  readonly code: ProbeErrorCode;

  constructor(kind: ProbeErrorKind) {
    super(describeProbeError(kind));
    this.name = "ProbeError";
    this.kind = kind;
    this.code = kind.kind;
  }

  static cliNotFound(binary: string): ProbeError {
    return new ProbeError({ kind: "cliNotFound", binary });
  }

  static executionFailed(reason: string): ProbeError {
    return new ProbeError({ kind: "executionFailed", reason });
  }

  static parseFailed(reason: string): ProbeError {
    return new ProbeError({ kind: "parseFailed", reason });
  }

  static of(code: "timeout" | "authenticationRequired" | "sessionExpired" | "subscriptionRequired" | "noData" | "updateRequired" | "folderTrustRequired"): ProbeError {
    return new ProbeError({ kind: code });
  }
}

export function isProbeError(err: unknown, code?: ProbeErrorCode): err is ProbeError {
  if (!(err instanceof ProbeError)) return false;
  return code === undefined || err.code === code;
}

/** Wraps anything thrown into a ProbeError without losing classified failures */
export function toProbeError(err: unknown): ProbeError {
  if (err instanceof ProbeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return ProbeError.executionFailed(message);
}
