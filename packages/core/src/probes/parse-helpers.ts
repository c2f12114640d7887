/**
 * Text helpers shared by the provider parsers: percentages, reset times,
 * known error prompts, header lines and dollar amounts.
 */

import type { ProbeErrorKind } from "@usagebar/shared";

// ---------------------------------------------------------------------------
// Percentages
// ---------------------------------------------------------------------------

const PERCENT_RE = /(-?\d+(?:\.\d+)?)\s*%\s*(left|remaining|used)/i;

/** "27% used" and "73% left" both yield 73 */
export function extractPercentRemaining(text: string): number | null {
  const match = PERCENT_RE.exec(text);
  if (!match?.[1] || !match[2]) return null;
  const value = parseFloat(match[1]);
  return match[2].toLowerCase() === "used" ? 100 - value : value;
}

// ---------------------------------------------------------------------------
// Durations and relative resets
// ---------------------------------------------------------------------------

const UNIT_MS: Record<string, number> = {
  d: 86_400_000,
  h: 3_600_000,
  m: 60_000,
  s: 1_000,
};

const DURATION_TOKEN_RE = /(\d+(?:\.\d+)?)\s*(days?|d|hours?|hrs?|h|minutes?|mins?|m|seconds?|secs?|s)(?![a-z])/gi;

function unitKey(unit: string): string {
  const lower = unit.toLowerCase();
  if (lower.startsWith("mi") || lower === "m") return "m";
  return lower.charAt(0);
}

/** Sums every duration token ("6m 19.7s" -> 379.7); null when there are none */
export function parseDurationSeconds(text: string): number | null {
  let total = 0;
  let found = false;
  for (const match of text.matchAll(DURATION_TOKEN_RE)) {
    if (!match[1] || !match[2]) continue;
    total += (parseFloat(match[1]) * (UNIT_MS[unitKey(match[2])] ?? 0)) / 1000;
    found = true;
  }
  return found ? total : null;
}

const RELATIVE_RE = /\bin\s+((?:\d+(?:\.\d+)?\s*(?:days?|d|hours?|hrs?|h|minutes?|mins?|m|seconds?|secs?|s)(?![a-z])[\s,]*)+)/i;
const BARE_DURATION_RE = /^(?:resets?\s*)?((?:\d+\s*[dhms](?![a-z])\s*)+)$/i;

/** "Resets in 2h 15m", "resets in 6d 23h 22m", "30m" -> now + duration */
export function parseRelativeReset(text: string, now: Date = new Date()): Date | null {
  const phrase = RELATIVE_RE.exec(text)?.[1] ?? BARE_DURATION_RE.exec(text.trim())?.[1];
  if (!phrase) return null;
  const seconds = parseDurationSeconds(phrase);
  if (seconds === null) return null;
  return new Date(now.getTime() + seconds * 1000);
}

// ---------------------------------------------------------------------------
// Absolute resets
// ---------------------------------------------------------------------------

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const MONTH_NAME = "(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\\.?";
const TIME = "(\\d{1,2})(?::(\\d{2}))?\\s*(am|pm)?";
const ZONE_RE = /\(([A-Za-z_]+(?:\/[A-Za-z0-9_+-]+)*)\)/;

/** "Dec 25 at 4:59am", "Jan 15, 3:30pm", "Jan 1, 2026" */
const MONTH_FIRST_RE = new RegExp(`\\b${MONTH_NAME}\\s+(\\d{1,2})(?:,?\\s+(\\d{4}))?(?:(?:,|\\s+at)?\\s+${TIME})?(?![\\d:])`, "i");
/** "09:00 on 22 Oct" */
const DAY_FIRST_RE = new RegExp(`${TIME}\\s+on\\s+(\\d{1,2})\\s+${MONTH_NAME}`, "i");
/** "4:59pm", "9pm", "14:02" */
const TIME_ONLY_RE = /\b(\d{1,2})(?::(\d{2}))?\s*(am|pm)\b|\b(\d{1,2}):(\d{2})\b/i;

interface WallTime {
  year: number;
  month: number; // 0-based
  day: number;
  hour: number;
  minute: number;
}

function to24h(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toLowerCase() === "pm";
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

function localTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** Wall clock of `instant` in `zone` */
function wallTimeIn(instant: Date, zone: string): WallTime {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone: zone,
    hourCycle: "h23",
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
  }).formatToParts(instant);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parseInt(parts.find((p) => p.type === type)?.value ?? "0", 10);
  return {
    year: get("year"),
    month: get("month") - 1,
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
  };
}

function offsetMs(instant: Date, zone: string): number {
  const wall = wallTimeIn(instant, zone);
  const asUtc = Date.UTC(wall.year, wall.month, wall.day, wall.hour, wall.minute);
  return asUtc - Math.floor(instant.getTime() / 60_000) * 60_000;
}

/** Instant at which the wall clock in `zone` reads `wall` */
export function zonedTimeToInstant(wall: WallTime, zone: string): Date {
  const guess = Date.UTC(wall.year, wall.month, wall.day, wall.hour, wall.minute);
  const first = guess - offsetMs(new Date(guess), zone);
  // Re-check once across DST boundaries
  const second = guess - offsetMs(new Date(first), zone);
  return new Date(second);
}

function addDays(wall: WallTime, days: number): WallTime {
  const shifted = new Date(Date.UTC(wall.year, wall.month, wall.day + days));
  return { ...wall, year: shifted.getUTCFullYear(), month: shifted.getUTCMonth(), day: shifted.getUTCDate() };
}

/**
 * Absolute reset phrases resolved in the named zone (local zone otherwise).
 * Without an explicit year the next future occurrence is chosen.
 */
export function parseAbsoluteReset(text: string, now: Date = new Date()): Date | null {
  const zoneName = ZONE_RE.exec(text)?.[1];
  const zone = zoneName && isValidTimeZone(zoneName) ? zoneName : localTimeZone();
  const today = wallTimeIn(now, zone);

  const monthFirst = MONTH_FIRST_RE.exec(text);
  if (monthFirst?.[1] && monthFirst[2]) {
    const month = MONTHS.indexOf(monthFirst[1].toLowerCase());
    const day = parseInt(monthFirst[2], 10);
    const explicitYear = monthFirst[3] ? parseInt(monthFirst[3], 10) : null;
    const hour = monthFirst[4] ? to24h(parseInt(monthFirst[4], 10), monthFirst[6]) : 0;
    const minute = monthFirst[5] ? parseInt(monthFirst[5], 10) : 0;
    return resolveDate(month, day, hour, minute, explicitYear, today, zone, now);
  }

  const dayFirst = DAY_FIRST_RE.exec(text);
  if (dayFirst?.[1] && dayFirst[4] && dayFirst[5]) {
    const month = MONTHS.indexOf(dayFirst[5].toLowerCase());
    const hour = to24h(parseInt(dayFirst[1], 10), dayFirst[3]);
    const minute = dayFirst[2] ? parseInt(dayFirst[2], 10) : 0;
    return resolveDate(month, parseInt(dayFirst[4], 10), hour, minute, null, today, zone, now);
  }

  const timeOnly = TIME_ONLY_RE.exec(text);
  if (timeOnly) {
    const hour = timeOnly[1]
      ? to24h(parseInt(timeOnly[1], 10), timeOnly[3])
      : parseInt(timeOnly[4] ?? "0", 10);
    const minute = parseInt(timeOnly[2] ?? timeOnly[5] ?? "0", 10);
    if (hour > 23 || minute > 59) return null;
    let candidate = zonedTimeToInstant({ ...today, hour, minute }, zone);
    if (candidate.getTime() <= now.getTime()) {
      candidate = zonedTimeToInstant({ ...addDays(today, 1), hour, minute }, zone);
    }
    return candidate;
  }

  return null;
}

function resolveDate(
  month: number,
  day: number,
  hour: number,
  minute: number,
  explicitYear: number | null,
  today: WallTime,
  zone: string,
  now: Date,
): Date | null {
  if (month < 0 || day < 1 || day > 31 || hour > 23 || minute > 59) return null;
  const year = explicitYear ?? today.year;
  const candidate = zonedTimeToInstant({ year, month, day, hour, minute }, zone);
  if (explicitYear === null && candidate.getTime() <= now.getTime()) {
    return zonedTimeToInstant({ year: year + 1, month, day, hour, minute }, zone);
  }
  return candidate;
}

/** Relative phrasing first, then absolute */
export function parseResetDate(text: string, now: Date = new Date()): Date | null {
  return parseRelativeReset(text, now) ?? parseAbsoluteReset(text, now);
}

// ---------------------------------------------------------------------------
// Repetition
// ---------------------------------------------------------------------------

/** Collapses a phrase printed twice back to back ("Resets 9pmResets 9pm" -> "Resets 9pm") */
export function dedupeRepeated(text: string): string {
  const trimmed = text.trim();
  const match = /^(.+?)(?:\s*\1)+$/s.exec(trimmed);
  return match?.[1] ? match[1].trim() : trimmed;
}

/** Reset phrase on a line, starting at the first "Resets", deduplicated */
export function extractResetText(line: string): string | null {
  const index = line.search(/\bresets?\b/i);
  if (index < 0) return null;
  const phrase = line.slice(index).trim();
  // A second "Resets" on the same line is a redraw artefact
  const repeat = phrase.slice(1).search(/\bresets?\b/i);
  const single = repeat >= 0 ? phrase.slice(0, repeat + 1) : phrase;
  return dedupeRepeated(single) || null;
}

// ---------------------------------------------------------------------------
// Known error prompts
// ---------------------------------------------------------------------------

const KNOWN_ERRORS: Array<{ pattern: RegExp; kind: ProbeErrorKind }> = [
  { pattern: /do you trust the files in this folder/i, kind: { kind: "folderTrustRequired" } },
  { pattern: /is this a project you created or one you trust/i, kind: { kind: "folderTrustRequired" } },
  { pattern: /only available for subscription plans/i, kind: { kind: "subscriptionRequired" } },
  { pattern: /(session|token) (has )?expired|token_expired/i, kind: { kind: "sessionExpired" } },
  {
    pattern: /authentication_error|please run [`'"]?\w+ login|not logged in|please log ?in|login required|invalid api key/i,
    kind: { kind: "authenticationRequired" },
  },
  { pattern: /update available.*\b(codex|claude|gemini|kimi|amp)\b|update required|please update/is, kind: { kind: "updateRequired" } },
];

export function detectKnownError(text: string): ProbeErrorKind | null {
  for (const { pattern, kind } of KNOWN_ERRORS) {
    if (pattern.test(text)) return kind;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Header lines ("Opus 4.5 · Claude Pro · Some User")
// ---------------------------------------------------------------------------

export interface HeaderLine {
  product: string;
  plan: string;
  account: string | null;
}

export function parseHeaderLine(text: string): HeaderLine | null {
  for (const line of text.split("\n")) {
    // Cost lines use the same separator
    if (/\bresets?\b|\bspent\b/i.test(line)) continue;
    const parts = line
      .split("·")
      .map((p) => p.trim())
      .filter((p) => p.length > 0);
    if (parts.length < 2) continue;
    const [product, plan, account] = parts;
    if (!product || !plan) continue;
    return { product, plan, account: account ?? null };
  }
  return null;
}

// ---------------------------------------------------------------------------
// Money
// ---------------------------------------------------------------------------

/** "$1,234.56" -> 1234.56 */
export function parseDollarAmount(text: string): number | null {
  const match = /\$?\s*(-?[\d,]*\d(?:\.\d+)?)/.exec(text);
  if (!match?.[1]) return null;
  const value = parseFloat(match[1].replace(/,/g, ""));
  return Number.isFinite(value) ? value : null;
}

const COST_LINE_RE = /\$?\s*([\d,]*\d(?:\.\d+)?)\s*\/\s*\$?\s*([\d,]*\d(?:\.\d+)?)\s*spent/i;

/** "$5.41 / $20.00 spent" -> { spent: 5.41, budget: 20 } */
export function parseCostLine(text: string): { spent: number; budget: number } | null {
  const match = COST_LINE_RE.exec(text);
  if (!match?.[1] || !match[2]) return null;
  const spent = parseDollarAmount(match[1]);
  const budget = parseDollarAmount(match[2]);
  if (spent === null || budget === null) return null;
  return { spent, budget };
}

/** Integer minor units to major units: 2672 -> 26.72 */
export function centsToDollars(cents: number): number {
  return Math.round(cents) / 100;
}
