/**
 * CareDesk - Appointment Booking
 *
 * Patients book a doctor's slot and cancel their own bookings. Slot
 * uniqueness among non-cancelled appointments is held by the partial unique
 * index idx_appt_active_slot; the pre-check only gives a friendlier path.
 */

import { and, asc, eq, ne } from "drizzle-orm";

import { doctors } from "../db/schema/doctors.ts";
import { departments } from "../db/schema/departments.ts";
import { appointments, doctorAvailability, type Appointment, type AppointmentStatus } from "../db/schema/scheduling.ts";
import { withTransaction } from "../db/transaction.ts";
import { ConflictError, NotFoundError } from "../errors.ts";
import { assertKnownSlot, parseCalendarDate } from "./calendar.ts";
import { assertRole, type RequestContext } from "./context.ts";

export const SLOT_TAKEN = "Slot already booked.";
export const SLOT_UNAVAILABLE = "Doctor is not available in that slot.";

export type BookingRequest = {
  doctorId: number;
  date: string;
  timeSlot: string;
};

export async function bookAppointment(ctx: RequestContext, request: BookingRequest): Promise<Appointment> {
  assertRole(ctx, "patient");
  const appointmentDate = parseCalendarDate(request.date);
  const timeSlot = assertKnownSlot(ctx.config, request.timeSlot);

  return withTransaction(
    ctx.db,
    async (tx) => {
      const [doctor] = await tx
        .select({ id: doctors.id })
        .from(doctors)
        .where(eq(doctors.id, request.doctorId))
        .limit(1);
      if (!doctor) throw new NotFoundError("Doctor", request.doctorId);

      const [declared] = await tx
        .select({ isAvailable: doctorAvailability.isAvailable })
        .from(doctorAvailability)
        .where(
          and(
            eq(doctorAvailability.doctorId, doctor.id),
            eq(doctorAvailability.date, appointmentDate),
            eq(doctorAvailability.timeSlot, timeSlot),
          ),
        )
        .limit(1);
      if (declared && !declared.isAvailable) throw new ConflictError(SLOT_UNAVAILABLE);

      const [taken] = await tx
        .select({ id: appointments.id })
        .from(appointments)
        .where(
          and(
            eq(appointments.doctorId, doctor.id),
            eq(appointments.appointmentDate, appointmentDate),
            eq(appointments.timeSlot, timeSlot),
            ne(appointments.status, "Cancelled"),
          ),
        )
        .limit(1);
      if (taken) throw new ConflictError(SLOT_TAKEN);

      const [appointment] = await tx
        .insert(appointments)
        .values({
          appointmentDate,
          timeSlot,
          status: "Booked",
          patientId: ctx.principal.id,
          doctorId: doctor.id,
        })
        .returning();
      if (!appointment) throw new Error("appointment insert returned no row");
      return appointment;
    },
    { idx_appt_active_slot: SLOT_TAKEN },
  );
}

export type CancelOutcome =
  | { cancelled: true; appointment: Appointment }
  | { cancelled: false; reason: "not_owner" | "not_cancellable"; status?: AppointmentStatus };

/**
 * Cancel one of the signed-in patient's own bookings.
 *
 * Only a Booked appointment owned by the caller moves to Cancelled; anything
 * else is a denial, never a second transition.
 */
export async function cancelAppointment(ctx: RequestContext, appointmentId: number): Promise<CancelOutcome> {
  assertRole(ctx, "patient");

  return withTransaction(ctx.db, async (tx) => {
    const [appointment] = await tx
      .update(appointments)
      .set({ status: "Cancelled", updatedAt: new Date() })
      .where(
        and(
          eq(appointments.id, appointmentId),
          eq(appointments.patientId, ctx.principal.id),
          eq(appointments.status, "Booked"),
        ),
      )
      .returning();
    if (appointment) return { cancelled: true, appointment };

    const [current] = await tx
      .select({ patientId: appointments.patientId, status: appointments.status })
      .from(appointments)
      .where(eq(appointments.id, appointmentId))
      .limit(1);
    if (!current) throw new NotFoundError("Appointment", appointmentId);
    if (current.patientId !== ctx.principal.id) return { cancelled: false, reason: "not_owner" };
    return { cancelled: false, reason: "not_cancellable", status: current.status };
  });
}

export type PatientAppointment = {
  id: number;
  appointmentDate: string;
  timeSlot: string;
  status: AppointmentStatus;
  doctorId: number | null;
  doctorName: string | null;
  departmentName: string | null;
};

export async function listPatientAppointments(ctx: RequestContext): Promise<PatientAppointment[]> {
  assertRole(ctx, "patient");
  return ctx.db
    .select({
      id: appointments.id,
      appointmentDate: appointments.appointmentDate,
      timeSlot: appointments.timeSlot,
      status: appointments.status,
      doctorId: appointments.doctorId,
      doctorName: doctors.fullName,
      departmentName: departments.name,
    })
    .from(appointments)
    .leftJoin(doctors, eq(appointments.doctorId, doctors.id))
    .leftJoin(departments, eq(doctors.departmentId, departments.id))
    .where(eq(appointments.patientId, ctx.principal.id))
    .orderBy(asc(appointments.appointmentDate), asc(appointments.timeSlot), asc(appointments.id));
}
