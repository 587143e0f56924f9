/**
 * In-process postgres (PGlite) with the CareDesk schema applied.
 */

import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";

import { loadCaredeskConfig, type CaredeskConfig } from "../config/caredesk-config.ts";
import { schema, type CaredeskDb } from "../db/connection.ts";
import { applySchema } from "../db/migrate.ts";
import type { Principal, RequestContext, ServiceContext } from "../services/context.ts";

export type TestDatabase = {
  db: CaredeskDb;
  client: PGlite;
  close(): Promise<void>;
};

export async function createTestDb(): Promise<TestDatabase> {
  const client = new PGlite();
  const db: CaredeskDb = drizzle(client, { schema });
  await applySchema(db);
  return { db, client, close: () => client.close() };
}

export function testConfig(raw: unknown = {}): CaredeskConfig {
  return loadCaredeskConfig(raw);
}

export function serviceContext(db: CaredeskDb, config: CaredeskConfig = testConfig()): ServiceContext {
  return { db, config };
}

export function as(ctx: ServiceContext, principal: Principal): RequestContext {
  return { ...ctx, principal };
}
