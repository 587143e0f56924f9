/**
 * CareDesk - Clinical Workflow
 *
 * Doctors close out their own appointments and keep the single treatment
 * record per appointment. History views join treatments back to patients.
 */

import { and, asc, eq, sql } from "drizzle-orm";

import type { CaredeskDb } from "../db/connection.ts";
import { doctors } from "../db/schema/doctors.ts";
import { departments } from "../db/schema/departments.ts";
import { patients, type Patient } from "../db/schema/patients.ts";
import { appointments, type Appointment, type AppointmentStatus } from "../db/schema/scheduling.ts";
import { treatments, type Treatment } from "../db/schema/emr.ts";
import { withTransaction } from "../db/transaction.ts";
import { AuthorizationError, ConflictError, InvalidInputError, NotFoundError } from "../errors.ts";
import { getPatient, listPatientsByIds } from "./directory.ts";
import { assertRole, type RequestContext, type ServiceContext } from "./context.ts";

export const DOCTOR_ACTIONS = ["complete", "cancel"] as const;
export type DoctorAction = (typeof DOCTOR_ACTIONS)[number];

const ACTION_STATUS: Record<DoctorAction, AppointmentStatus> = {
  complete: "Completed",
  cancel: "Cancelled",
};

export function parseDoctorAction(action: string): DoctorAction {
  const match = DOCTOR_ACTIONS.find((a) => a === action);
  if (!match) throw new InvalidInputError(`Unknown appointment action "${action}".`);
  return match;
}

/** Load an appointment the signed-in doctor owns, optionally locking the row. */
async function ownAppointment(
  db: CaredeskDb,
  ctx: RequestContext,
  appointmentId: number,
  lock: boolean,
): Promise<Appointment> {
  const query = db.select().from(appointments).where(eq(appointments.id, appointmentId)).limit(1);
  const [appointment] = lock ? await query.for("update") : await query;
  if (!appointment) throw new NotFoundError("Appointment", appointmentId);
  if (appointment.doctorId !== ctx.principal.id) {
    throw new AuthorizationError("This appointment belongs to another doctor.");
  }
  return appointment;
}

/**
 * Complete or cancel one of the doctor's own Booked appointments.
 * Completed and Cancelled are terminal.
 */
export async function applyDoctorAction(
  ctx: RequestContext,
  appointmentId: number,
  action: DoctorAction,
): Promise<Appointment> {
  assertRole(ctx, "doctor");

  return withTransaction(ctx.db, async (tx) => {
    const current = await ownAppointment(tx, ctx, appointmentId, true);
    if (current.status !== "Booked") {
      throw new ConflictError(`Appointment is already ${current.status}.`);
    }

    const [updated] = await tx
      .update(appointments)
      .set({ status: ACTION_STATUS[action], updatedAt: new Date() })
      .where(and(eq(appointments.id, appointmentId), eq(appointments.status, "Booked")))
      .returning();
    if (!updated) throw new ConflictError("Appointment changed while updating; reload and retry.");
    return updated;
  });
}

export type TreatmentInput = {
  diagnosis: string;
  prescription: string;
  medicines: string;
};

/**
 * Write the appointment's treatment record (insert or overwrite the single
 * row keyed by appointment_id) and mark the appointment Completed.
 */
export async function recordTreatment(
  ctx: RequestContext,
  appointmentId: number,
  input: TreatmentInput,
): Promise<Treatment> {
  assertRole(ctx, "doctor");

  return withTransaction(ctx.db, async (tx) => {
    const appointment = await ownAppointment(tx, ctx, appointmentId, true);
    if (appointment.status === "Cancelled") {
      throw new ConflictError("Cannot record treatment for a cancelled appointment.");
    }

    const now = new Date();
    const values = {
      diagnosis: input.diagnosis,
      prescription: input.prescription,
      medicines: input.medicines,
    };
    const [treatment] = await tx
      .insert(treatments)
      .values({ ...values, appointmentId })
      .onConflictDoUpdate({
        target: treatments.appointmentId,
        set: { ...values, updatedAt: now },
      })
      .returning();
    if (!treatment) throw new Error("treatment upsert returned no row");

    await tx
      .update(appointments)
      .set({ status: "Completed", updatedAt: now })
      .where(eq(appointments.id, appointmentId));
    return treatment;
  });
}

/** Data behind the doctor's treatment form. */
export async function getTreatmentForm(
  ctx: RequestContext,
  appointmentId: number,
): Promise<{ appointment: Appointment; patient: Patient | null; treatment: Treatment | null }> {
  assertRole(ctx, "doctor");
  const appointment = await ownAppointment(ctx.db, ctx, appointmentId, false);
  const [treatment] = await ctx.db
    .select()
    .from(treatments)
    .where(eq(treatments.appointmentId, appointmentId))
    .limit(1);
  const patient = appointment.patientId === null ? null : await getPatient(ctx, appointment.patientId);
  return { appointment, patient, treatment: treatment ?? null };
}

export type HistoryEntry = {
  treatmentId: number;
  appointmentId: number;
  appointmentDate: string;
  timeSlot: string;
  doctorName: string | null;
  departmentName: string | null;
  diagnosis: string | null;
  prescription: string | null;
  medicines: string | null;
};

/** Every treatment recorded for a patient, oldest appointment first. */
export async function patientHistory(
  ctx: ServiceContext,
  patientId: number,
): Promise<{ patient: Patient; treatments: HistoryEntry[] }> {
  const patient = await getPatient(ctx, patientId);
  const rows = await ctx.db
    .select({
      treatmentId: treatments.id,
      appointmentId: appointments.id,
      appointmentDate: appointments.appointmentDate,
      timeSlot: appointments.timeSlot,
      doctorName: doctors.fullName,
      departmentName: departments.name,
      diagnosis: treatments.diagnosis,
      prescription: treatments.prescription,
      medicines: treatments.medicines,
    })
    .from(treatments)
    .innerJoin(appointments, eq(treatments.appointmentId, appointments.id))
    .leftJoin(doctors, eq(appointments.doctorId, doctors.id))
    .leftJoin(departments, eq(doctors.departmentId, departments.id))
    .where(eq(appointments.patientId, patientId))
    .orderBy(asc(appointments.appointmentDate), asc(appointments.timeSlot), asc(treatments.id));

  return { patient, treatments: rows };
}

export type DoctorAppointment = {
  id: number;
  appointmentDate: string;
  timeSlot: string;
  status: AppointmentStatus;
  patientId: number | null;
  patientName: string | null;
  hasTreatment: boolean;
};

export async function doctorDashboard(
  ctx: RequestContext,
): Promise<{ appointments: DoctorAppointment[]; assignedPatients: Patient[] }> {
  assertRole(ctx, "doctor");
  const rows = await ctx.db
    .select({
      id: appointments.id,
      appointmentDate: appointments.appointmentDate,
      timeSlot: appointments.timeSlot,
      status: appointments.status,
      patientId: appointments.patientId,
      patientName: sql<string | null>`coalesce(${patients.fullName}, ${patients.username})`,
      hasTreatment: sql<boolean>`${treatments.id} is not null`,
    })
    .from(appointments)
    .leftJoin(patients, eq(appointments.patientId, patients.id))
    .leftJoin(treatments, eq(treatments.appointmentId, appointments.id))
    .where(eq(appointments.doctorId, ctx.principal.id))
    .orderBy(asc(appointments.appointmentDate), asc(appointments.timeSlot), asc(appointments.id));

  const patientIds = [...new Set(rows.flatMap((r) => (r.patientId === null ? [] : [r.patientId])))];
  const assignedPatients = await listPatientsByIds(ctx.db, patientIds);
  return { appointments: rows, assignedPatients };
}
