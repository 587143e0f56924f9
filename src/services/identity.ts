/**
 * CareDesk - Identity & Authentication
 *
 * Admins, doctors and patients live in separate tables. Each username is also
 * claimed in the principal directory inside the same transaction, so
 * uniqueness across roles holds as a storage constraint even when two
 * registrations race past the pre-check.
 */

import { and, eq } from "drizzle-orm";

import type { CaredeskDb } from "../db/connection.ts";
import { admins, principals, ROLES, type Role } from "../db/schema/auth.ts";
import { doctors } from "../db/schema/doctors.ts";
import { patients } from "../db/schema/patients.ts";
import { hashPassword, verifyPassword } from "../auth/password.ts";
import { withTransaction } from "../db/transaction.ts";
import { AuthenticationError, ConflictError, InvalidInputError, NotFoundError } from "../errors.ts";
import type { Principal, RequestContext, ServiceContext } from "./context.ts";

export const USERNAME_TAKEN = "Username taken.";

/** Conflict messages for every constraint a new account can trip. */
export const USERNAME_CONFLICTS = {
  principals_pkey: USERNAME_TAKEN,
  admins_username_unique: USERNAME_TAKEN,
  doctors_username_unique: USERNAME_TAKEN,
  patients_username_unique: USERNAME_TAKEN,
};

type Credentials = {
  id: number;
  username: string;
  passwordHash: string;
};

/** Record that `username` now belongs to the given principal. */
export async function claimUsername(tx: CaredeskDb, username: string, role: Role, principalId: number): Promise<void> {
  await tx.insert(principals).values({ username, role, principalId });
}

export async function releaseUsername(tx: CaredeskDb, role: Role, principalId: number): Promise<void> {
  await tx.delete(principals).where(and(eq(principals.role, role), eq(principals.principalId, principalId)));
}

function credentialColumns(role: Role) {
  switch (role) {
    case "admin":
      return { table: admins, id: admins.id, username: admins.username, passwordHash: admins.passwordHash };
    case "doctor":
      return { table: doctors, id: doctors.id, username: doctors.username, passwordHash: doctors.passwordHash };
    case "patient":
      return { table: patients, id: patients.id, username: patients.username, passwordHash: patients.passwordHash };
  }
}

/** True when any principal, in any role table, already uses `username`. */
export async function isUsernameTaken(db: CaredeskDb, username: string): Promise<boolean> {
  const [entry] = await db
    .select({ role: principals.role })
    .from(principals)
    .where(eq(principals.username, username))
    .limit(1);
  if (entry) return true;

  for (const role of ROLES) {
    if (await findCredentials(db, role, username)) return true;
  }
  return false;
}

async function findCredentials(db: CaredeskDb, role: Role, username: string): Promise<Credentials | undefined> {
  const { table, ...columns } = credentialColumns(role);
  const [row] = await db.select(columns).from(table).where(eq(columns.username, username)).limit(1);
  return row;
}

async function findPasswordHash(db: CaredeskDb, principal: Principal): Promise<string | undefined> {
  const { table, ...columns } = credentialColumns(principal.role);
  const [row] = await db
    .select({ passwordHash: columns.passwordHash })
    .from(table)
    .where(eq(columns.id, principal.id))
    .limit(1);
  return row?.passwordHash;
}

/** False once the account behind a session has been deleted or renamed. */
export async function principalExists(db: CaredeskDb, principal: Principal): Promise<boolean> {
  const { table, ...columns } = credentialColumns(principal.role);
  const [row] = await db
    .select({ id: columns.id })
    .from(table)
    .where(and(eq(columns.id, principal.id), eq(columns.username, principal.username)))
    .limit(1);
  return row !== undefined;
}

async function storePasswordHash(db: CaredeskDb, principal: Principal, passwordHash: string): Promise<void> {
  switch (principal.role) {
    case "admin":
      await db.update(admins).set({ passwordHash }).where(eq(admins.id, principal.id));
      return;
    case "doctor":
      await db.update(doctors).set({ passwordHash, updatedAt: new Date() }).where(eq(doctors.id, principal.id));
      return;
    case "patient":
      await db.update(patients).set({ passwordHash, updatedAt: new Date() }).where(eq(patients.id, principal.id));
      return;
  }
}

let decoyHash: Promise<string> | undefined;

/** Hash checked when no account matches, so unknown usernames cost as much as wrong passwords. */
function decoy(): Promise<string> {
  if (!decoyHash) decoyHash = hashPassword("caredesk-decoy-password");
  return decoyHash;
}

/**
 * Resolve credentials to a principal, or null.
 *
 * The username is trimmed as at registration. The directory entry decides
 * the role; rows without one (written before the directory existed) are tried
 * in the fixed order admin, doctor, patient.
 */
export async function authenticate(
  ctx: ServiceContext,
  username: string,
  password: string,
): Promise<Principal | null> {
  const name = username.trim();
  const [entry] = await ctx.db
    .select({ role: principals.role })
    .from(principals)
    .where(eq(principals.username, name))
    .limit(1);

  let checked = false;
  const candidates: readonly Role[] = entry ? [entry.role] : ROLES;
  for (const role of candidates) {
    const row = await findCredentials(ctx.db, role, name);
    if (!row) continue;
    checked = true;
    if (await verifyPassword(password, row.passwordHash)) {
      return { id: row.id, role, username: row.username };
    }
  }

  if (!checked) await verifyPassword(password, await decoy());
  return null;
}

function assertPassword(ctx: ServiceContext, password: string): void {
  const min = ctx.config.security.minPasswordLength;
  if (password.length < min) {
    throw new InvalidInputError(`Password must be at least ${min} characters.`);
  }
}

function normalizeUsername(username: string): string {
  const trimmed = username.trim();
  if (trimmed.length === 0 || trimmed.length > 80) {
    throw new InvalidInputError("Username must be 1-80 characters.");
  }
  return trimmed;
}

export type PatientRegistration = {
  username: string;
  password: string;
  fullName?: string;
  contact?: string;
};

export async function registerPatient(ctx: ServiceContext, input: PatientRegistration): Promise<Principal> {
  const username = normalizeUsername(input.username);
  assertPassword(ctx, input.password);
  const passwordHash = await hashPassword(input.password);

  return withTransaction(
    ctx.db,
    async (tx) => {
      if (await isUsernameTaken(tx, username)) throw new ConflictError(USERNAME_TAKEN);

      const [patient] = await tx
        .insert(patients)
        .values({
          username,
          passwordHash,
          fullName: input.fullName || null,
          contact: input.contact || null,
        })
        .returning({ id: patients.id });
      if (!patient) throw new Error("patient insert returned no row");

      await claimUsername(tx, username, "patient", patient.id);
      return { id: patient.id, role: "patient" as const, username };
    },
    USERNAME_CONFLICTS,
  );
}

export async function changePassword(
  ctx: RequestContext,
  currentPassword: string,
  newPassword: string,
): Promise<void> {
  const { principal } = ctx;
  const storedHash = await findPasswordHash(ctx.db, principal);
  if (storedHash === undefined) throw new NotFoundError("Account", principal.username);

  if (!(await verifyPassword(currentPassword, storedHash))) {
    throw new AuthenticationError("Current password is incorrect.");
  }
  assertPassword(ctx, newPassword);

  await storePasswordHash(ctx.db, principal, await hashPassword(newPassword));
}

/**
 * Create the bootstrap admin account if it does not exist yet.
 * Returns true when an account was created.
 */
export async function ensureDefaultAdmin(ctx: ServiceContext): Promise<boolean> {
  const { defaultAdminUsername: username, defaultAdminPassword } = ctx.config.security;

  const existing = await findCredentials(ctx.db, "admin", username);
  if (existing) return false;

  const passwordHash = await hashPassword(defaultAdminPassword);
  return withTransaction(
    ctx.db,
    async (tx) => {
      const [admin] = await tx
        .insert(admins)
        .values({ username, passwordHash })
        .onConflictDoNothing({ target: admins.username })
        .returning({ id: admins.id });
      if (!admin) return false;

      await claimUsername(tx, username, "admin", admin.id);
      return true;
    },
    USERNAME_CONFLICTS,
  );
}
