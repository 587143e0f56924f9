import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { eq } from "drizzle-orm";

import { principals } from "../db/schema/auth.ts";
import { appointments, doctorAvailability } from "../db/schema/scheduling.ts";
import { ConflictError, InvalidInputError, NotFoundError } from "../errors.ts";
import { addDoctor, addPatient } from "../test-utils/fixtures.ts";
import { as, createTestDb, serviceContext, type TestDatabase } from "../test-utils/test-db.ts";
import { bookAppointment } from "./booking.ts";
import { applyDoctorAction } from "./clinical.ts";
import type { ServiceContext } from "./context.ts";
import {
  createDoctor,
  deleteDoctor,
  deletePatient,
  deriveDoctorUsername,
  editDoctor,
  getDepartmentWithDoctors,
  getDoctor,
  getDoctorProfile,
  listDepartments,
  updatePatientProfile,
} from "./directory.ts";
import { authenticate } from "./identity.ts";

describe("deriveDoctorUsername", () => {
  it("lowercases and joins name parts with dots", () => {
    expect(deriveDoctorUsername("Jane Doe")).toBe("jane.doe");
    expect(deriveDoctorUsername("  Mary   Ann Smith ")).toBe("mary.ann.smith");
  });
});

describe("directory", () => {
  let testDb: TestDatabase;
  let ctx: ServiceContext;

  beforeEach(async () => {
    testDb = await createTestDb();
    ctx = serviceContext(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  describe("createDoctor", () => {
    it("derives the login and creates the department on first use", async () => {
      const created = await createDoctor(ctx, { fullName: "Jane Doe", specialization: "Cardiology", experienceYears: 10 });

      expect(created.username).toBe("jane.doe");
      expect(created.initialPassword).toBe("doctor123");
      expect(created.department.name).toBe("Cardiology");
      expect(created.doctor).toMatchObject({ fullName: "Jane Doe", experienceYears: 10, email: null });
      await expect(authenticate(ctx, "jane.doe", "doctor123")).resolves.toEqual({
        id: created.doctor.id,
        role: "doctor",
        username: "jane.doe",
      });
    });

    it("reuses an existing department", async () => {
      const first = await createDoctor(ctx, { fullName: "Jane Doe", specialization: "Cardiology", experienceYears: 3 });
      const second = await createDoctor(ctx, { fullName: "Raj Patel", specialization: "Cardiology", experienceYears: 8 });

      expect(second.department.id).toBe(first.department.id);
      expect((await listDepartments(ctx)).map((d) => d.name)).toEqual(["Cardiology"]);
    });

    it("rejects a second doctor with the same derived username", async () => {
      await addDoctor(ctx, "Jane Doe");

      await expect(
        createDoctor(ctx, { fullName: "jane  DOE", specialization: "Neurology", experienceYears: 1 }),
      ).rejects.toThrow(new ConflictError('Doctor with username "jane.doe" already exists.'));
      expect((await listDepartments(ctx)).map((d) => d.name)).toEqual(["Cardiology"]);
    });

    it("rejects a name that collides with a patient login", async () => {
      await addPatient(ctx, "jane.doe");
      await expect(addDoctor(ctx, "Jane Doe")).rejects.toBeInstanceOf(ConflictError);
    });

    it("validates experience", async () => {
      await expect(
        createDoctor(ctx, { fullName: "Jane Doe", specialization: "Cardiology", experienceYears: -1 }),
      ).rejects.toBeInstanceOf(InvalidInputError);
      await expect(
        createDoctor(ctx, { fullName: "Jane Doe", specialization: "Cardiology", experienceYears: 2.5 }),
      ).rejects.toBeInstanceOf(InvalidInputError);
    });
  });

  describe("editDoctor", () => {
    it("updates details and moves the doctor to another department", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");

      await editDoctor(ctx, doctor.id, {
        fullName: "Jane Doe-Smith",
        experienceYears: 12,
        specialization: "Neurology",
        email: "jane@example.test",
      });

      await expect(getDoctor(ctx, doctor.id)).resolves.toMatchObject({
        username: "jane.doe",
        fullName: "Jane Doe-Smith",
        experienceYears: 12,
        email: "jane@example.test",
        departmentName: "Neurology",
      });
    });

    it("fails for an unknown doctor", async () => {
      await expect(
        editDoctor(ctx, 999, { fullName: "Nobody", experienceYears: 1, specialization: "Cardiology" }),
      ).rejects.toThrow(new NotFoundError("Doctor", 999));
    });

    it("rejects an email another doctor uses", async () => {
      await createDoctor(ctx, {
        fullName: "Jane Doe",
        specialization: "Cardiology",
        experienceYears: 1,
        email: "shared@example.test",
      });
      const other = await addDoctor(ctx, "Raj Patel");

      await expect(
        editDoctor(ctx, other.id, {
          fullName: "Raj Patel",
          experienceYears: 1,
          specialization: "Cardiology",
          email: "shared@example.test",
        }),
      ).rejects.toThrow(new ConflictError("A doctor with that email already exists."));
    });
  });

  describe("deleteDoctor", () => {
    it("cancels open bookings, keeps history and frees the username", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");
      const patient = as(ctx, await addPatient(ctx, "alice"));
      const open = await bookAppointment(patient, { doctorId: doctor.id, date: "2024-01-10", timeSlot: "08:00-12:00" });
      const done = await bookAppointment(patient, { doctorId: doctor.id, date: "2024-01-11", timeSlot: "08:00-12:00" });
      await applyDoctorAction(as(ctx, doctor), done.id, "complete");
      await testDb.db
        .insert(doctorAvailability)
        .values({ doctorId: doctor.id, date: "2024-01-12", timeSlot: "08:00-12:00", isAvailable: true });

      await expect(deleteDoctor(ctx, doctor.id)).resolves.toEqual({ cancelledAppointments: 1 });

      const rows = await testDb.db
        .select({ id: appointments.id, status: appointments.status, doctorId: appointments.doctorId })
        .from(appointments)
        .orderBy(appointments.id);
      expect(rows).toEqual([
        { id: open.id, status: "Cancelled", doctorId: null },
        { id: done.id, status: "Completed", doctorId: null },
      ]);
      await expect(testDb.db.select().from(doctorAvailability)).resolves.toEqual([]);
      await expect(testDb.db.select().from(principals).where(eq(principals.username, "jane.doe"))).resolves.toEqual(
        [],
      );
      await expect(addPatient(ctx, "jane.doe")).resolves.toMatchObject({ username: "jane.doe" });
    });

    it("fails for an unknown doctor", async () => {
      await expect(deleteDoctor(ctx, 42)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("deletePatient", () => {
    it("cancels the patient's open bookings and detaches them", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");
      const alice = await addPatient(ctx, "alice");
      const booked = await bookAppointment(as(ctx, alice), {
        doctorId: doctor.id,
        date: "2024-01-10",
        timeSlot: "08:00-12:00",
      });

      await expect(deletePatient(ctx, alice.id)).resolves.toEqual({ cancelledAppointments: 1 });

      const [row] = await testDb.db.select().from(appointments).where(eq(appointments.id, booked.id));
      expect(row).toMatchObject({ status: "Cancelled", patientId: null, doctorId: doctor.id });
      await expect(authenticate(ctx, "alice", "test-password")).resolves.toBeNull();
    });

    it("fails for an unknown patient", async () => {
      await expect(deletePatient(ctx, 42)).rejects.toThrow(new NotFoundError("Patient", 42));
    });
  });

  describe("browsing", () => {
    it("lists a department's doctors by name", async () => {
      await addDoctor(ctx, "Raj Patel");
      await addDoctor(ctx, "Jane Doe");
      await addDoctor(ctx, "Omar Ali", "Neurology");
      const [cardiology] = await listDepartments(ctx);
      if (!cardiology) throw new Error("department missing");

      const view = await getDepartmentWithDoctors(ctx, cardiology.id);

      expect(view.department.name).toBe("Cardiology");
      expect(view.doctors.map((d) => d.fullName)).toEqual(["Jane Doe", "Raj Patel"]);
    });

    it("shows availability from the given date on", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");
      await testDb.db.insert(doctorAvailability).values([
        { doctorId: doctor.id, date: "2024-01-09", timeSlot: "08:00-12:00", isAvailable: true },
        { doctorId: doctor.id, date: "2024-01-10", timeSlot: "16:00-21:00", isAvailable: false },
        { doctorId: doctor.id, date: "2024-01-10", timeSlot: "08:00-12:00", isAvailable: true },
      ]);

      const profile = await getDoctorProfile(ctx, doctor.id, "2024-01-10");

      expect(profile.doctor.departmentName).toBe("Cardiology");
      expect(profile.availability).toEqual([
        { date: "2024-01-10", timeSlot: "08:00-12:00", isAvailable: true },
        { date: "2024-01-10", timeSlot: "16:00-21:00", isAvailable: false },
      ]);
    });

    it("fails for unknown departments", async () => {
      await expect(getDepartmentWithDoctors(ctx, 7)).rejects.toThrow("Department 7 not found.");
    });
  });

  describe("updatePatientProfile", () => {
    it("updates the signed-in patient only", async () => {
      const alice = await addPatient(ctx, "alice", "Alice");

      const updated = await updatePatientProfile(as(ctx, alice), { fullName: " Alice Smith ", contact: "" });

      expect(updated).toMatchObject({ id: alice.id, fullName: "Alice Smith", contact: null });
    });

    it("is closed to doctors", async () => {
      const doctor = await addDoctor(ctx, "Jane Doe");
      await expect(updatePatientProfile(as(ctx, doctor), { fullName: "x", contact: "" })).rejects.toThrow(
        "Access denied.",
      );
    });
  });
});
