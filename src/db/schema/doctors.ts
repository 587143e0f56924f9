/**
 * CareDesk - Doctor Schema
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  timestamp,
  index,
} from "drizzle-orm/pg-core";

import { departments } from "./departments.ts";

export const doctors = pgTable(
  "doctors",
  {
    id: serial("id").primaryKey(),
    username: varchar("username", { length: 80 }).unique().notNull(), // derived from full name: "jane.doe"
    passwordHash: varchar("password_hash", { length: 255 }).notNull(),
    fullName: varchar("full_name", { length: 120 }).notNull(),
    email: varchar("email", { length: 120 }).unique(),
    experienceYears: integer("experience_years").default(0).notNull(),
    departmentId: integer("department_id").references(() => departments.id),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("idx_doctors_department_id").on(table.departmentId),
  ],
);

export type Doctor = typeof doctors.$inferSelect;
export type NewDoctor = typeof doctors.$inferInsert;
