import { ProbeError } from "./probe-error.js";

export interface HttpOptions {
  fetch?: typeof fetch;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** fetch with a timeout; transport failures become executionFailed */
export async function sendRequest(url: string, init: RequestInit, options: HttpOptions = {}): Promise<Response> {
  const fetchImpl = options.fetch ?? fetch;
  const timeout = AbortSignal.timeout(options.timeoutMs ?? 10_000);
  const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;
  try {
    return await fetchImpl(url, { ...init, signal });
  } catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") throw ProbeError.of("timeout");
    throw ProbeError.executionFailed(err instanceof Error ? err.message : String(err));
  }
}

export async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    throw ProbeError.parseFailed("Invalid JSON response");
  }
}

export function httpFailure(status: number): ProbeError {
  return ProbeError.executionFailed(`HTTP ${status}`);
}
