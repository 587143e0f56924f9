/**
 * CareDesk - Admin Dashboard
 *
 * Case-insensitive substring search over doctors (name, department) and
 * patients (username, name). An empty query lists everything.
 */

import { asc, eq, ilike, or, type SQL } from "drizzle-orm";

import { departments } from "../db/schema/departments.ts";
import { doctors } from "../db/schema/doctors.ts";
import { patients } from "../db/schema/patients.ts";
import { appointments, type AppointmentStatus } from "../db/schema/scheduling.ts";
import type { ServiceContext } from "./context.ts";
import type { DoctorSummary } from "./directory.ts";

/** Quote LIKE metacharacters so the query matches literally. */
export function escapeLikePattern(query: string): string {
  return query.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

export type PatientRow = {
  id: number;
  username: string;
  fullName: string | null;
  contact: string | null;
};

export type AppointmentRow = {
  id: number;
  appointmentDate: string;
  timeSlot: string;
  status: AppointmentStatus;
  patientName: string | null;
  doctorName: string | null;
};

export type AdminDashboard = {
  searchQuery: string;
  doctorCount: number;
  patientCount: number;
  doctors: DoctorSummary[];
  patients: PatientRow[];
  appointments: AppointmentRow[];
};

export async function adminDashboard(ctx: ServiceContext, searchQuery?: string): Promise<AdminDashboard> {
  const query = searchQuery?.trim() ?? "";
  const pattern = `%${escapeLikePattern(query)}%`;

  let doctorFilter: SQL | undefined;
  let patientFilter: SQL | undefined;
  if (query) {
    doctorFilter = or(ilike(doctors.fullName, pattern), ilike(departments.name, pattern));
    patientFilter = or(ilike(patients.username, pattern), ilike(patients.fullName, pattern));
  }

  const doctorRows = await ctx.db
    .select({
      id: doctors.id,
      username: doctors.username,
      fullName: doctors.fullName,
      email: doctors.email,
      experienceYears: doctors.experienceYears,
      departmentId: doctors.departmentId,
      departmentName: departments.name,
    })
    .from(doctors)
    .leftJoin(departments, eq(doctors.departmentId, departments.id))
    .where(doctorFilter)
    .orderBy(asc(doctors.fullName), asc(doctors.id));

  const patientRows = await ctx.db
    .select({
      id: patients.id,
      username: patients.username,
      fullName: patients.fullName,
      contact: patients.contact,
    })
    .from(patients)
    .where(patientFilter)
    .orderBy(asc(patients.username));

  const appointmentRows = await ctx.db
    .select({
      id: appointments.id,
      appointmentDate: appointments.appointmentDate,
      timeSlot: appointments.timeSlot,
      status: appointments.status,
      patientName: patients.username,
      doctorName: doctors.fullName,
    })
    .from(appointments)
    .leftJoin(patients, eq(appointments.patientId, patients.id))
    .leftJoin(doctors, eq(appointments.doctorId, doctors.id))
    .orderBy(asc(appointments.appointmentDate), asc(appointments.id));

  return {
    searchQuery: query,
    doctorCount: doctorRows.length,
    patientCount: patientRows.length,
    doctors: doctorRows,
    patients: patientRows,
    appointments: appointmentRows,
  };
}
