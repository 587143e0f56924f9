/**
 * CareDesk - Transaction Helper
 *
 * Runs multi-row work in one transaction and maps driver errors onto the
 * CareDesk error taxonomy. Any throw rolls the whole transaction back.
 */

import type { CaredeskDb } from "./connection.ts";
import { ConflictError, StorageError, isCaredeskError, type CaredeskError } from "../errors.ts";

const UNIQUE_VIOLATION = "23505";

type DriverError = {
  code: string;
  constraint?: string;
};

function toDriverError(err: unknown): DriverError | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") {
    const constraint = "constraint" in err && typeof err.constraint === "string" ? err.constraint : undefined;
    return { code: err.code, constraint };
  }
  if ("cause" in err) return toDriverError(err.cause);
  return undefined;
}

/** Unique-violation constraint name, or undefined for any other error. */
export function uniqueViolation(err: unknown): string | undefined {
  const driverError = toDriverError(err);
  if (driverError?.code !== UNIQUE_VIOLATION) return undefined;
  return driverError.constraint ?? "";
}

export type ConflictMessages = Record<string, string>;

export function mapStorageError(err: unknown, conflicts: ConflictMessages = {}): CaredeskError {
  if (isCaredeskError(err)) return err;
  const constraint = uniqueViolation(err);
  if (constraint !== undefined) {
    return new ConflictError(conflicts[constraint] ?? "Record already exists.");
  }
  return new StorageError(err);
}

export async function withTransaction<T>(
  db: CaredeskDb,
  work: (tx: CaredeskDb) => Promise<T>,
  conflicts?: ConflictMessages,
): Promise<T> {
  try {
    return await db.transaction((tx) => work(tx));
  } catch (err) {
    throw mapStorageError(err, conflicts);
  }
}
