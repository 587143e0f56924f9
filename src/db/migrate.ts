/**
 * CareDesk - Schema Bootstrap
 *
 * Applies schema.sql statement by statement. Every statement is
 * IF NOT EXISTS, so this runs on every start.
 */

import { readFileSync } from "node:fs";
import { sql } from "drizzle-orm";

import type { CaredeskDb } from "./connection.ts";

const SCHEMA_FILE = new URL("./schema.sql", import.meta.url);

export function schemaStatements(source: string = readFileSync(SCHEMA_FILE, "utf8")): string[] {
  return source
    .split(/;\s*$/m)
    .map((chunk) =>
      chunk
        .split("\n")
        .filter((line) => !line.trimStart().startsWith("--"))
        .join("\n")
        .trim(),
    )
    .filter((statement) => statement.length > 0);
}

export async function applySchema(db: CaredeskDb): Promise<number> {
  const statements = schemaStatements();
  // one statement per call: extended-protocol drivers reject batches
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
  return statements.length;
}
