/**
 * CareDesk - Drizzle ORM Configuration
 *
 * Used by `drizzle-kit` for migrations and studio.
 * Run: npm run db:generate
 * Run: npm run db:studio
 */

import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./src/db/schema/index.ts",
  out: "./drizzle",
  dialect: "postgresql",
  dbCredentials: {
    host: process.env.CAREDESK_DB_HOST ?? "localhost",
    port: Number(process.env.CAREDESK_DB_PORT ?? 5432),
    database: process.env.CAREDESK_DB_NAME ?? "caredesk",
    user: process.env.CAREDESK_DB_USER ?? "caredesk",
    password: process.env.CAREDESK_DB_PASSWORD ?? "caredesk",
  },
});
