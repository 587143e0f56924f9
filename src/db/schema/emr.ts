/**
 * CareDesk - Treatment Record Schema
 *
 * At most one treatment per appointment, written by the appointment's doctor.
 */

import {
  pgTable,
  serial,
  integer,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

import { appointments } from "./scheduling.ts";

export const treatments = pgTable("treatments", {
  id: serial("id").primaryKey(),
  diagnosis: text("diagnosis"),
  prescription: text("prescription"),
  medicines: text("medicines"),
  appointmentId: integer("appointment_id")
    .unique()
    .notNull()
    .references(() => appointments.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export type Treatment = typeof treatments.$inferSelect;
export type NewTreatment = typeof treatments.$inferInsert;
