/**
 * CareDesk - Database Seed Script
 *
 * Creates the tables, the bootstrap admin account and a few departments.
 * Run: npm run seed
 */

import { configFromEnv } from "../config/caredesk-config.ts";
import { getDb, closeDb } from "./connection.ts";
import { applySchema } from "./migrate.ts";
import { ensureDefaultAdmin } from "../services/identity.ts";
import { getOrCreateDepartment } from "../services/directory.ts";

const DEMO_DEPARTMENTS = ["General Medicine", "Cardiology", "Pediatrics", "Orthopedics", "Dermatology"];

async function seed() {
  const config = configFromEnv();
  const db = getDb(config.database);
  console.log("[seed] Starting CareDesk database seed...");

  const statements = await applySchema(db);
  console.log(`[seed] Schema applied (${statements} statements)`);

  if (await ensureDefaultAdmin({ db, config })) {
    console.log(
      `[seed] Admin user created (User: ${config.security.defaultAdminUsername}, Pass: ${config.security.defaultAdminPassword})`,
    );
  } else {
    console.log("[seed] Admin user already exists");
  }

  for (const name of DEMO_DEPARTMENTS) {
    const dept = await getOrCreateDepartment(db, name);
    console.log(`[seed] Department ready: ${dept.name} (#${dept.id})`);
  }

  console.log("[seed] Done.");
}

try {
  await seed();
} catch (err) {
  console.error("[seed] Failed:", err);
  process.exitCode = 1;
} finally {
  await closeDb();
}
