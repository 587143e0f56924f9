/**
 * CareDesk - Directory Management
 *
 * Departments, doctors and patient accounts as the admin manages them,
 * plus the read-only directory views patients browse.
 */

import { and, asc, eq, gte, inArray } from "drizzle-orm";

import type { CaredeskDb } from "../db/connection.ts";
import { departments, type Department } from "../db/schema/departments.ts";
import { doctors, type Doctor } from "../db/schema/doctors.ts";
import { patients, type Patient } from "../db/schema/patients.ts";
import { appointments, doctorAvailability } from "../db/schema/scheduling.ts";
import { hashPassword } from "../auth/password.ts";
import { withTransaction } from "../db/transaction.ts";
import { ConflictError, InvalidInputError, NotFoundError } from "../errors.ts";
import { claimUsername, isUsernameTaken, releaseUsername, USERNAME_CONFLICTS } from "./identity.ts";
import { assertRole, type RequestContext, type ServiceContext } from "./context.ts";

const DOCTOR_CONFLICTS = {
  ...USERNAME_CONFLICTS,
  doctors_email_unique: "A doctor with that email already exists.",
};

export type DoctorSummary = {
  id: number;
  username: string;
  fullName: string;
  email: string | null;
  experienceYears: number;
  departmentId: number | null;
  departmentName: string | null;
};

const doctorSummaryColumns = {
  id: doctors.id,
  username: doctors.username,
  fullName: doctors.fullName,
  email: doctors.email,
  experienceYears: doctors.experienceYears,
  departmentId: doctors.departmentId,
  departmentName: departments.name,
};

/** "Jane  Doe" -> "jane.doe" */
export function deriveDoctorUsername(fullName: string): string {
  return fullName.trim().toLowerCase().split(/\s+/).join(".");
}

function requireText(value: string, field: string, max: number): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) throw new InvalidInputError(`${field} is required.`);
  if (trimmed.length > max) throw new InvalidInputError(`${field} must be at most ${max} characters.`);
  return trimmed;
}

function requireExperience(years: number): number {
  if (!Number.isInteger(years) || years < 0 || years > 80) {
    throw new InvalidInputError("Experience must be a whole number of years between 0 and 80.");
  }
  return years;
}

/**
 * Fetch a department by name, creating it if absent.
 * Insert-or-fetch under the unique name constraint, so two concurrent
 * callers end up with the same row.
 */
export async function getOrCreateDepartment(db: CaredeskDb, name: string): Promise<Department> {
  const deptName = requireText(name, "Specialization", 100);

  const [created] = await db
    .insert(departments)
    .values({ name: deptName })
    .onConflictDoNothing({ target: departments.name })
    .returning();
  if (created) return created;

  const [existing] = await db.select().from(departments).where(eq(departments.name, deptName)).limit(1);
  if (!existing) throw new NotFoundError("Department", deptName);
  return existing;
}

export type NewDoctorInput = {
  fullName: string;
  specialization: string;
  experienceYears: number;
  email?: string;
};

export type CreatedDoctor = {
  doctor: Doctor;
  department: Department;
  username: string;
  initialPassword: string;
};

export async function createDoctor(ctx: ServiceContext, input: NewDoctorInput): Promise<CreatedDoctor> {
  const fullName = requireText(input.fullName, "Full name", 120);
  const experienceYears = requireExperience(input.experienceYears);
  const username = deriveDoctorUsername(fullName);
  const initialPassword = ctx.config.security.defaultDoctorPassword;
  const passwordHash = await hashPassword(initialPassword);

  return withTransaction(
    ctx.db,
    async (tx) => {
      if (await isUsernameTaken(tx, username)) {
        throw new ConflictError(`Doctor with username "${username}" already exists.`);
      }

      const department = await getOrCreateDepartment(tx, input.specialization);
      const [doctor] = await tx
        .insert(doctors)
        .values({
          username,
          passwordHash,
          fullName,
          email: input.email?.trim() || null,
          experienceYears,
          departmentId: department.id,
        })
        .returning();
      if (!doctor) throw new Error("doctor insert returned no row");

      await claimUsername(tx, username, "doctor", doctor.id);
      return { doctor, department, username, initialPassword };
    },
    {
      ...DOCTOR_CONFLICTS,
      principals_pkey: `Doctor with username "${username}" already exists.`,
      doctors_username_unique: `Doctor with username "${username}" already exists.`,
    },
  );
}

export type DoctorUpdate = {
  fullName: string;
  experienceYears: number;
  specialization: string;
  email?: string;
};

/** Update a doctor's details. The username stays as first derived. */
export async function editDoctor(ctx: ServiceContext, doctorId: number, input: DoctorUpdate): Promise<Doctor> {
  const fullName = requireText(input.fullName, "Full name", 120);
  const experienceYears = requireExperience(input.experienceYears);

  return withTransaction(
    ctx.db,
    async (tx) => {
      const department = await getOrCreateDepartment(tx, input.specialization);
      const [updated] = await tx
        .update(doctors)
        .set({
          fullName,
          experienceYears,
          departmentId: department.id,
          ...(input.email !== undefined ? { email: input.email.trim() || null } : {}),
          updatedAt: new Date(),
        })
        .where(eq(doctors.id, doctorId))
        .returning();
      if (!updated) throw new NotFoundError("Doctor", doctorId);
      return updated;
    },
    DOCTOR_CONFLICTS,
  );
}

/**
 * Remove a doctor. Availability goes with them; their still-booked
 * appointments are cancelled, and all their appointments keep their history
 * with doctor_id set to NULL.
 */
export async function deleteDoctor(ctx: ServiceContext, doctorId: number): Promise<{ cancelledAppointments: number }> {
  return withTransaction(ctx.db, async (tx) => {
    const cancelled = await tx
      .update(appointments)
      .set({ status: "Cancelled", updatedAt: new Date() })
      .where(and(eq(appointments.doctorId, doctorId), eq(appointments.status, "Booked")))
      .returning({ id: appointments.id });

    const [removed] = await tx.delete(doctors).where(eq(doctors.id, doctorId)).returning({ id: doctors.id });
    if (!removed) throw new NotFoundError("Doctor", doctorId);

    await releaseUsername(tx, "doctor", doctorId);
    return { cancelledAppointments: cancelled.length };
  });
}

/** Remove a patient account; same appointment handling as deleteDoctor. */
export async function deletePatient(ctx: ServiceContext, patientId: number): Promise<{ cancelledAppointments: number }> {
  return withTransaction(ctx.db, async (tx) => {
    const cancelled = await tx
      .update(appointments)
      .set({ status: "Cancelled", updatedAt: new Date() })
      .where(and(eq(appointments.patientId, patientId), eq(appointments.status, "Booked")))
      .returning({ id: appointments.id });

    const [removed] = await tx.delete(patients).where(eq(patients.id, patientId)).returning({ id: patients.id });
    if (!removed) throw new NotFoundError("Patient", patientId);

    await releaseUsername(tx, "patient", patientId);
    return { cancelledAppointments: cancelled.length };
  });
}

export async function getDoctor(ctx: ServiceContext, doctorId: number): Promise<DoctorSummary> {
  const [doctor] = await ctx.db
    .select(doctorSummaryColumns)
    .from(doctors)
    .leftJoin(departments, eq(doctors.departmentId, departments.id))
    .where(eq(doctors.id, doctorId))
    .limit(1);
  if (!doctor) throw new NotFoundError("Doctor", doctorId);
  return doctor;
}

export async function getPatient(ctx: ServiceContext, patientId: number): Promise<Patient> {
  const [patient] = await ctx.db.select().from(patients).where(eq(patients.id, patientId)).limit(1);
  if (!patient) throw new NotFoundError("Patient", patientId);
  return patient;
}

export async function listDepartments(ctx: ServiceContext): Promise<Department[]> {
  return ctx.db.select().from(departments).orderBy(asc(departments.name));
}

export async function getDepartmentWithDoctors(
  ctx: ServiceContext,
  departmentId: number,
): Promise<{ department: Department; doctors: DoctorSummary[] }> {
  const [department] = await ctx.db.select().from(departments).where(eq(departments.id, departmentId)).limit(1);
  if (!department) throw new NotFoundError("Department", departmentId);

  const members = await ctx.db
    .select(doctorSummaryColumns)
    .from(doctors)
    .leftJoin(departments, eq(doctors.departmentId, departments.id))
    .where(eq(doctors.departmentId, departmentId))
    .orderBy(asc(doctors.fullName));

  return { department, doctors: members };
}

export type AvailabilityEntry = {
  date: string;
  timeSlot: string;
  isAvailable: boolean;
};

/** Doctor plus their declared availability from `fromDate` on. */
export async function getDoctorProfile(
  ctx: ServiceContext,
  doctorId: number,
  fromDate: string,
): Promise<{ doctor: DoctorSummary; availability: AvailabilityEntry[] }> {
  const doctor = await getDoctor(ctx, doctorId);
  const availability = await ctx.db
    .select({
      date: doctorAvailability.date,
      timeSlot: doctorAvailability.timeSlot,
      isAvailable: doctorAvailability.isAvailable,
    })
    .from(doctorAvailability)
    .where(and(eq(doctorAvailability.doctorId, doctorId), gte(doctorAvailability.date, fromDate)))
    .orderBy(asc(doctorAvailability.date), asc(doctorAvailability.timeSlot));

  return { doctor, availability };
}

export async function listPatientsByIds(db: CaredeskDb, ids: number[]): Promise<Patient[]> {
  if (ids.length === 0) return [];
  return db.select().from(patients).where(inArray(patients.id, ids)).orderBy(asc(patients.id));
}

export type ProfileUpdate = {
  fullName: string;
  contact: string;
};

export async function updatePatientProfile(ctx: RequestContext, input: ProfileUpdate): Promise<Patient> {
  assertRole(ctx, "patient");
  const fullName = input.fullName.trim();
  const contact = input.contact.trim();
  if (fullName.length > 120) throw new InvalidInputError("Full name must be at most 120 characters.");
  if (contact.length > 20) throw new InvalidInputError("Contact must be at most 20 characters.");

  const [updated] = await ctx.db
    .update(patients)
    .set({ fullName: fullName || null, contact: contact || null, updatedAt: new Date() })
    .where(eq(patients.id, ctx.principal.id))
    .returning();
  if (!updated) throw new NotFoundError("Patient", ctx.principal.id);
  return updated;
}
