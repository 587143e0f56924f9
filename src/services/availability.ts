/**
 * CareDesk - Doctor Availability
 *
 * A doctor declares, slot by slot, which of the coming days they work.
 * Booking refuses slots declared unavailable; undeclared slots stay open.
 */

import { and, asc, eq, gte, sql } from "drizzle-orm";

import { doctorAvailability } from "../db/schema/scheduling.ts";
import { withTransaction } from "../db/transaction.ts";
import { InvalidInputError } from "../errors.ts";
import { assertKnownSlot, parseCalendarDate, todayIn, toIsoDate, upcomingDates } from "./calendar.ts";
import { assertRole, type RequestContext } from "./context.ts";
import type { AvailabilityEntry } from "./directory.ts";

/** Every (date, slot) pair a doctor may declare from `from`. */
export function availabilityGrid(ctx: RequestContext, from: Date): { date: string; timeSlot: string }[] {
  const { timeSlots, availabilityWindowDays } = ctx.config.scheduling;
  return upcomingDates(from, availabilityWindowDays).flatMap((date) =>
    timeSlots.map((timeSlot) => ({ date, timeSlot })),
  );
}

/**
 * Upsert the signed-in doctor's declarations. Dates outside the window
 * starting at `from` are rejected; a slot listed twice keeps its last value.
 */
export async function setAvailability(
  ctx: RequestContext,
  entries: AvailabilityEntry[],
  from: Date = todayIn(ctx.config.hospital.timezone),
): Promise<number> {
  assertRole(ctx, "doctor");
  const window = new Set(upcomingDates(from, ctx.config.scheduling.availabilityWindowDays));

  // keyed by date and slot: a repeated slot keeps its last value
  const bySlot = new Map<string, { doctorId: number; date: string; timeSlot: string; isAvailable: boolean }>();
  for (const entry of entries) {
    const date = parseCalendarDate(entry.date);
    if (!window.has(date)) {
      throw new InvalidInputError(`Availability for ${date} is outside the scheduling window.`);
    }
    const timeSlot = assertKnownSlot(ctx.config, entry.timeSlot);
    bySlot.set(`${date}|${timeSlot}`, { doctorId: ctx.principal.id, date, timeSlot, isAvailable: entry.isAvailable });
  }
  const rows = [...bySlot.values()];
  if (rows.length === 0) return 0;

  return withTransaction(ctx.db, async (tx) => {
    const written = await tx
      .insert(doctorAvailability)
      .values(rows)
      .onConflictDoUpdate({
        target: [doctorAvailability.doctorId, doctorAvailability.date, doctorAvailability.timeSlot],
        set: { isAvailable: sql`excluded.is_available` },
      })
      .returning({ id: doctorAvailability.id });
    return written.length;
  });
}

/** The signed-in doctor's declarations from `from` on. */
export async function listOwnAvailability(
  ctx: RequestContext,
  from: Date = todayIn(ctx.config.hospital.timezone),
): Promise<AvailabilityEntry[]> {
  assertRole(ctx, "doctor");
  return ctx.db
    .select({
      date: doctorAvailability.date,
      timeSlot: doctorAvailability.timeSlot,
      isAvailable: doctorAvailability.isAvailable,
    })
    .from(doctorAvailability)
    .where(and(eq(doctorAvailability.doctorId, ctx.principal.id), gte(doctorAvailability.date, toIsoDate(from))))
    .orderBy(asc(doctorAvailability.date), asc(doctorAvailability.timeSlot));
}
