/**
 * CareDesk - Identity Schema
 *
 * Admin accounts and the principal directory. Doctors and patients keep their
 * credentials in their own tables; every username of every role is also
 * claimed here, so a name can belong to one principal only.
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const ROLES = ["admin", "doctor", "patient"] as const;
export type Role = (typeof ROLES)[number];

export const admins = pgTable("admins", {
  id: serial("id").primaryKey(),
  username: varchar("username", { length: 80 }).unique().notNull(),
  passwordHash: varchar("password_hash", { length: 255 }).notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
});

/**
 * One row per username across all three identity tables.
 * Written in the same transaction as the admin/doctor/patient row it points at.
 */
export const principals = pgTable(
  "principals",
  {
    username: varchar("username", { length: 80 }).primaryKey(),
    role: varchar("role", { length: 10, enum: ROLES }).notNull(),
    principalId: integer("principal_id").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex("idx_principals_role_id").on(table.role, table.principalId),
  ],
);

export type Admin = typeof admins.$inferSelect;
export type NewAdmin = typeof admins.$inferInsert;
export type PrincipalEntry = typeof principals.$inferSelect;
