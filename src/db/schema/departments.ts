/**
 * CareDesk - Department Schema
 *
 * Departments double as doctor specializations ("Cardiology", "Oncology").
 * Created on demand when an admin assigns a new specialization.
 */

import { pgTable, serial, varchar, timestamp } from "drizzle-orm/pg-core";

export const departments = pgTable("departments", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 100 }).unique().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

export type Department = typeof departments.$inferSelect;
export type NewDepartment = typeof departments.$inferInsert;
