/**
 * CareDesk - Calendar Helpers
 *
 * Dates travel as ISO `YYYY-MM-DD` strings, matching the postgres DATE
 * columns. "Today" is the calendar day in the hospital's time zone; day
 * arithmetic from there is done in UTC.
 */

import type { CaredeskConfig } from "../config/caredesk-config.ts";
import { InvalidInputError } from "../errors.ts";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Validate a calendar date such as "2024-01-10". Rejects "2024-02-30". */
export function parseCalendarDate(input: string): string {
  const match = ISO_DATE.exec(input.trim());
  if (!match) throw new InvalidInputError("Invalid date.");

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new InvalidInputError("Invalid date.");
  }
  return `${y}-${m}-${d}`;
}

/**
 * Midnight UTC of the calendar day `now` falls on in `timeZone`, so the
 * UTC helpers below see the hospital's date.
 */
export function todayIn(timeZone: string, now: Date = new Date()): Date {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(now);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);
  return new Date(Date.UTC(part("year"), part("month") - 1, part("day")));
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `count` consecutive dates starting at `from` (inclusive). */
export function upcomingDates(from: Date, count: number): string[] {
  const start = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  return Array.from({ length: count }, (_, i) => toIsoDate(new Date(start + i * DAY_MS)));
}

export function assertKnownSlot(config: CaredeskConfig, timeSlot: string): string {
  const slot = timeSlot.trim();
  if (!config.scheduling.timeSlots.includes(slot)) {
    throw new InvalidInputError(`Unknown time slot "${slot}".`);
  }
  return slot;
}
