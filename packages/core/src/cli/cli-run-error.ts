export type CliRunFailure = "binaryNotFound" | "launchFailed" | "timedOut" | "cancelled";

/** Raised by the process layer; probes decide what it means for their provider */
export class CliRunError extends Error {
  readonly failure: CliRunFailure;
  readonly binary: string;

  constructor(failure: CliRunFailure, binary: string, detail?: string) {
    const base = {
      binaryNotFound: `${binary} not found on PATH`,
      launchFailed: `Failed to launch ${binary}`,
      timedOut: `${binary} timed out`,
      cancelled: `${binary} run was cancelled`,
    }[failure];
    super(detail ? `${base}: ${detail}` : base);
    this.name = "CliRunError";
    this.failure = failure;
    this.binary = binary;
  }
}
