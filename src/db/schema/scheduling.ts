/**
 * CareDesk - Scheduling Schema
 *
 * Patient appointments and per-doctor slot availability.
 */

import { sql } from "drizzle-orm";
import {
  pgTable,
  serial,
  integer,
  varchar,
  date,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";

import { doctors } from "./doctors.ts";
import { patients } from "./patients.ts";

export const APPOINTMENT_STATUSES = ["Booked", "Completed", "Cancelled"] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

/**
 * Appointments: one patient, one doctor, one slot.
 * patient_id / doctor_id become NULL when the referenced account is deleted;
 * the row stays as history.
 */
export const appointments = pgTable(
  "appointments",
  {
    id: serial("id").primaryKey(),
    appointmentDate: date("appointment_date").notNull(),
    timeSlot: varchar("time_slot", { length: 30 }).notNull(), // "08:00-12:00"
    status: varchar("status", { length: 20, enum: APPOINTMENT_STATUSES }).default("Booked").notNull(),
    patientId: integer("patient_id").references(() => patients.id, { onDelete: "set null" }),
    doctorId: integer("doctor_id").references(() => doctors.id, { onDelete: "set null" }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("idx_appt_patient_id").on(table.patientId),
    index("idx_appt_doctor_id").on(table.doctorId),
    index("idx_appt_date").on(table.appointmentDate),
    // a cancelled booking frees its slot
    uniqueIndex("idx_appt_active_slot")
      .on(table.doctorId, table.appointmentDate, table.timeSlot)
      .where(sql`${table.status} <> 'Cancelled'`),
  ],
);

/** Availability declarations. An absent row means "not declared", not "unavailable". */
export const doctorAvailability = pgTable(
  "doctor_availability",
  {
    id: serial("id").primaryKey(),
    date: date("date").notNull(),
    timeSlot: varchar("time_slot", { length: 30 }).notNull(),
    isAvailable: boolean("is_available").default(true).notNull(),
    doctorId: integer("doctor_id").notNull().references(() => doctors.id, { onDelete: "cascade" }),
  },
  (table) => [
    uniqueIndex("idx_avail_doctor_date_slot").on(table.doctorId, table.date, table.timeSlot),
  ],
);

export type Appointment = typeof appointments.$inferSelect;
export type NewAppointment = typeof appointments.$inferInsert;
export type DoctorAvailability = typeof doctorAvailability.$inferSelect;
export type NewDoctorAvailability = typeof doctorAvailability.$inferInsert;
