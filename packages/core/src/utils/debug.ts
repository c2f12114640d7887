/** Verbose tracing for the PTY, RPC and probe layers */

export function isDebugFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

let enabled = isDebugFlag(process.env.USAGEBAR_DEBUG);

/** Overrides the USAGEBAR_DEBUG default, e.g. from a loaded config */
export function setDebugEnabled(on: boolean): void {
  enabled = on;
}

export function debug(tag: string, ...args: unknown[]): void {
  if (enabled) console.log(`[DEBUG:${tag}]`, ...args);
}
