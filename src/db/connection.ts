/**
 * CareDesk - Database Connection Layer
 *
 * PostgreSQL connection pool management using Drizzle ORM.
 * Services type their handle as the driver-neutral `CaredeskDb`, so the
 * same code runs on node-postgres in production and PGlite in tests.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";

import * as schema from "./schema/index.ts";
import type { CaredeskConfig } from "../config/caredesk-config.ts";
import { createSubsystemLogger } from "../logging/subsystem.ts";

export type CaredeskSchema = typeof schema;
export type CaredeskDb = PgDatabase<PgQueryResultHKT, CaredeskSchema>;

const log = createSubsystemLogger("db");

let pool: pg.Pool | undefined;
let db: CaredeskDb | undefined;

export function getConnectionConfig(
  database: CaredeskConfig["database"],
  env: NodeJS.ProcessEnv = process.env,
): pg.PoolConfig {
  return {
    host: database.host,
    port: database.port,
    database: database.name,
    user: database.user,
    password: env.CAREDESK_DB_PASSWORD ?? "caredesk",
    max: database.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  };
}

export function getPool(database: CaredeskConfig["database"]): pg.Pool {
  if (!pool) {
    pool = new pg.Pool(getConnectionConfig(database));
    pool.on("error", (err) => {
      log.error("Unexpected pool error", err);
    });
  }
  return pool;
}

export function getDb(database: CaredeskConfig["database"]): CaredeskDb {
  if (!db) {
    db = drizzle(getPool(database), { schema });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    db = undefined;
  }
}

export { schema };
