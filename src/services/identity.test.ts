import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { eq } from "drizzle-orm";

import { hashPassword, verifyPassword } from "../auth/password.ts";
import { admins, principals } from "../db/schema/auth.ts";
import { patients } from "../db/schema/patients.ts";
import { AuthenticationError, ConflictError, InvalidInputError } from "../errors.ts";
import { addDoctor, addPatient, PATIENT_PASSWORD } from "../test-utils/fixtures.ts";
import { as, createTestDb, serviceContext, type TestDatabase } from "../test-utils/test-db.ts";
import type { ServiceContext } from "./context.ts";
import {
  authenticate,
  changePassword,
  ensureDefaultAdmin,
  principalExists,
  registerPatient,
  USERNAME_TAKEN,
} from "./identity.ts";

vi.mock("../auth/password.ts", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../auth/password.ts")>();
  return { ...actual, verifyPassword: vi.fn(actual.verifyPassword) };
});

describe("identity", () => {
  let testDb: TestDatabase;
  let ctx: ServiceContext;

  beforeEach(async () => {
    testDb = await createTestDb();
    ctx = serviceContext(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  describe("ensureDefaultAdmin", () => {
    it("creates the bootstrap admin once", async () => {
      await expect(ensureDefaultAdmin(ctx)).resolves.toBe(true);
      await expect(ensureDefaultAdmin(ctx)).resolves.toBe(false);

      const rows = await testDb.db.select().from(admins);
      expect(rows.map((r) => r.username)).toEqual(["admin"]);
      await expect(authenticate(ctx, "admin", "admin")).resolves.toEqual({ id: rows[0]?.id, role: "admin", username: "admin" });
    });
  });

  describe("registerPatient", () => {
    it("creates a patient that can sign in", async () => {
      const patient = await registerPatient(ctx, {
        username: "  alice ",
        password: PATIENT_PASSWORD,
        fullName: "Alice Smith",
        contact: "555-0100",
      });

      expect(patient.role).toBe("patient");
      expect(patient.username).toBe("alice");
      await expect(authenticate(ctx, "alice", PATIENT_PASSWORD)).resolves.toEqual(patient);

      const [row] = await testDb.db.select().from(patients).where(eq(patients.id, patient.id));
      expect(row?.fullName).toBe("Alice Smith");
      expect(row?.contact).toBe("555-0100");
    });

    it("stores empty optional fields as null", async () => {
      const patient = await registerPatient(ctx, { username: "bob", password: PATIENT_PASSWORD, fullName: "" });
      const [row] = await testDb.db.select().from(patients).where(eq(patients.id, patient.id));

      expect(row?.fullName).toBeNull();
      expect(row?.contact).toBeNull();
    });

    it("rejects a username held by another patient", async () => {
      await addPatient(ctx, "alice");
      await expect(addPatient(ctx, "alice")).rejects.toThrow(new ConflictError(USERNAME_TAKEN));
    });

    it("rejects a username held by a doctor", async () => {
      await addDoctor(ctx, "Jane Doe");

      await expect(addPatient(ctx, "jane.doe")).rejects.toBeInstanceOf(ConflictError);
      await expect(testDb.db.select().from(patients)).resolves.toEqual([]);
    });

    it("enforces the minimum password length", async () => {
      await expect(registerPatient(ctx, { username: "carol", password: "short" })).rejects.toThrow(
        "Password must be at least 8 characters.",
      );
    });

    it("rejects a blank username", async () => {
      await expect(registerPatient(ctx, { username: "   ", password: PATIENT_PASSWORD })).rejects.toBeInstanceOf(
        InvalidInputError,
      );
    });
  });

  describe("authenticate", () => {
    it("returns null for unknown users and wrong passwords", async () => {
      await addPatient(ctx, "alice");

      await expect(authenticate(ctx, "alice", "wrong-password")).resolves.toBeNull();
      await expect(authenticate(ctx, "nobody", PATIENT_PASSWORD)).resolves.toBeNull();
    });

    it("trims the username the way registration does", async () => {
      const bob = await registerPatient(ctx, { username: " bob", password: PATIENT_PASSWORD });

      expect(bob.username).toBe("bob");
      await expect(authenticate(ctx, " bob", PATIENT_PASSWORD)).resolves.toEqual(bob);
      await expect(authenticate(ctx, "bob  ", PATIENT_PASSWORD)).resolves.toEqual(bob);
    });

    it("checks a password hash even when the username is unknown", async () => {
      await addPatient(ctx, "alice");
      vi.mocked(verifyPassword).mockClear();

      await expect(authenticate(ctx, "nobody", PATIENT_PASSWORD)).resolves.toBeNull();
      expect(verifyPassword).toHaveBeenCalledTimes(1);

      vi.mocked(verifyPassword).mockClear();
      await expect(authenticate(ctx, "alice", "wrong-password")).resolves.toBeNull();
      expect(verifyPassword).toHaveBeenCalledTimes(1);
    });

    it("tries admin, doctor, then patient for rows outside the directory", async () => {
      await testDb.db.insert(admins).values({ username: "shared", passwordHash: await hashPassword("admin-pass") });
      await testDb.db
        .insert(patients)
        .values({ username: "shared", passwordHash: await hashPassword("patient-pass") });

      await expect(authenticate(ctx, "shared", "admin-pass")).resolves.toMatchObject({ role: "admin" });
      await expect(authenticate(ctx, "shared", "patient-pass")).resolves.toMatchObject({ role: "patient" });
    });

    it("follows the directory entry when one exists", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");
      const [entry] = await testDb.db.select().from(principals).where(eq(principals.username, "jane.doe"));

      expect(entry).toMatchObject({ role: "doctor", principalId: doctor.id });
      await expect(authenticate(ctx, "jane.doe", "doctor123")).resolves.toEqual(doctor);
    });
  });

  describe("principalExists", () => {
    it("tracks the account behind a principal", async () => {
      const alice = await addPatient(ctx, "alice");

      await expect(principalExists(testDb.db, alice)).resolves.toBe(true);
      await expect(principalExists(testDb.db, { ...alice, role: "doctor" })).resolves.toBe(false);
      await expect(principalExists(testDb.db, { ...alice, username: "mallory" })).resolves.toBe(false);

      await testDb.db.delete(patients).where(eq(patients.id, alice.id));
      await expect(principalExists(testDb.db, alice)).resolves.toBe(false);
    });
  });

  describe("changePassword", () => {
    it("replaces the password after checking the current one", async () => {
      const patient = await addPatient(ctx, "alice");

      await changePassword(as(ctx, patient), PATIENT_PASSWORD, "new-password");

      await expect(authenticate(ctx, "alice", PATIENT_PASSWORD)).resolves.toBeNull();
      await expect(authenticate(ctx, "alice", "new-password")).resolves.toEqual(patient);
    });

    it("refuses a wrong current password", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");

      await expect(changePassword(as(ctx, doctor), "not-it", "new-password")).rejects.toThrow(
        new AuthenticationError("Current password is incorrect."),
      );
      await expect(authenticate(ctx, "jane.doe", "doctor123")).resolves.toEqual(doctor);
    });

    it("applies the length rule to the new password", async () => {
      const patient = await addPatient(ctx, "alice");
      await expect(changePassword(as(ctx, patient), PATIENT_PASSWORD, "short")).rejects.toBeInstanceOf(
        InvalidInputError,
      );
    });
  });
});
