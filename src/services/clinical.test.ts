import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { eq } from "drizzle-orm";

import { treatments } from "../db/schema/emr.ts";
import { AuthorizationError, ConflictError, InvalidInputError, NotFoundError } from "../errors.ts";
import { addDoctor, addPatient } from "../test-utils/fixtures.ts";
import { as, createTestDb, serviceContext, type TestDatabase } from "../test-utils/test-db.ts";
import { bookAppointment, cancelAppointment } from "./booking.ts";
import {
  applyDoctorAction,
  doctorDashboard,
  getTreatmentForm,
  parseDoctorAction,
  patientHistory,
  recordTreatment,
} from "./clinical.ts";
import type { RequestContext, ServiceContext } from "./context.ts";

const SLOT = "08:00-12:00";

describe("parseDoctorAction", () => {
  it("accepts complete and cancel only", () => {
    expect(parseDoctorAction("complete")).toBe("complete");
    expect(parseDoctorAction("cancel")).toBe("cancel");
    expect(() => parseDoctorAction("reopen")).toThrow(InvalidInputError);
  });
});

describe("clinical workflow", () => {
  let testDb: TestDatabase;
  let ctx: ServiceContext;
  let jane: RequestContext;
  let raj: RequestContext;
  let alice: RequestContext;

  beforeEach(async () => {
    testDb = await createTestDb();
    ctx = serviceContext(testDb.db);
    jane = as(ctx, await addDoctor(ctx, "Jane Doe"));
    raj = as(ctx, await addDoctor(ctx, "Raj Patel", "Neurology"));
    alice = as(ctx, await addPatient(ctx, "alice", "Alice Smith"));
  });

  afterEach(async () => {
    await testDb.close();
  });

  const book = (patient: RequestContext, doctor: RequestContext, date: string, timeSlot = SLOT) =>
    bookAppointment(patient, { doctorId: doctor.principal.id, date, timeSlot });

  describe("applyDoctorAction", () => {
    it("completes a booked appointment once", async () => {
      const appointment = await book(alice, jane, "2024-01-10");

      await expect(applyDoctorAction(jane, appointment.id, "complete")).resolves.toMatchObject({ status: "Completed" });
      await expect(applyDoctorAction(jane, appointment.id, "cancel")).rejects.toThrow(
        new ConflictError("Appointment is already Completed."),
      );
    });

    it("does not touch a patient-cancelled appointment", async () => {
      const appointment = await book(alice, jane, "2024-01-10");
      await cancelAppointment(alice, appointment.id);

      await expect(applyDoctorAction(jane, appointment.id, "complete")).rejects.toThrow(
        new ConflictError("Appointment is already Cancelled."),
      );
    });

    it("is limited to the appointment's own doctor", async () => {
      const appointment = await book(alice, jane, "2024-01-10");

      await expect(applyDoctorAction(raj, appointment.id, "cancel")).rejects.toThrow(
        new AuthorizationError("This appointment belongs to another doctor."),
      );
      await expect(applyDoctorAction(alice, appointment.id, "cancel")).rejects.toBeInstanceOf(AuthorizationError);
      await expect(applyDoctorAction(jane, 999, "cancel")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("recordTreatment", () => {
    it("keeps one record per appointment and completes it", async () => {
      const appointment = await book(alice, jane, "2024-01-10");

      await recordTreatment(jane, appointment.id, { diagnosis: "Flu", prescription: "Rest", medicines: "" });
      const second = await recordTreatment(jane, appointment.id, {
        diagnosis: "Influenza A",
        prescription: "Rest, fluids",
        medicines: "Oseltamivir",
      });

      const rows = await testDb.db.select().from(treatments).where(eq(treatments.appointmentId, appointment.id));
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        id: second.id,
        diagnosis: "Influenza A",
        prescription: "Rest, fluids",
        medicines: "Oseltamivir",
      });

      const form = await getTreatmentForm(jane, appointment.id);
      expect(form.appointment.status).toBe("Completed");
      expect(form.patient?.username).toBe("alice");
      expect(form.treatment?.diagnosis).toBe("Influenza A");
    });

    it("may amend a completed appointment", async () => {
      const appointment = await book(alice, jane, "2024-01-10");
      await applyDoctorAction(jane, appointment.id, "complete");

      await expect(
        recordTreatment(jane, appointment.id, { diagnosis: "Sprain", prescription: "", medicines: "" }),
      ).resolves.toMatchObject({ appointmentId: appointment.id, diagnosis: "Sprain" });
    });

    it("refuses a cancelled appointment", async () => {
      const appointment = await book(alice, jane, "2024-01-10");
      await applyDoctorAction(jane, appointment.id, "cancel");

      await expect(
        recordTreatment(jane, appointment.id, { diagnosis: "Flu", prescription: "", medicines: "" }),
      ).rejects.toThrow(new ConflictError("Cannot record treatment for a cancelled appointment."));
      await expect(testDb.db.select().from(treatments)).resolves.toEqual([]);
    });

    it("refuses another doctor", async () => {
      const appointment = await book(alice, jane, "2024-01-10");

      await expect(
        recordTreatment(raj, appointment.id, { diagnosis: "Flu", prescription: "", medicines: "" }),
      ).rejects.toBeInstanceOf(AuthorizationError);
      await expect(getTreatmentForm(raj, appointment.id)).rejects.toBeInstanceOf(AuthorizationError);
    });
  });

  describe("getTreatmentForm", () => {
    it("starts without a treatment", async () => {
      const appointment = await book(alice, jane, "2024-01-10");
      const form = await getTreatmentForm(jane, appointment.id);

      expect(form.treatment).toBeNull();
      expect(form.appointment.status).toBe("Booked");
    });
  });

  describe("patientHistory", () => {
    it("lists treatments oldest appointment first, across doctors", async () => {
      const later = await book(alice, jane, "2024-01-12");
      const earlier = await book(alice, raj, "2024-01-10", "16:00-21:00");
      await book(alice, jane, "2024-01-11");
      await recordTreatment(jane, later.id, { diagnosis: "Follow-up", prescription: "", medicines: "" });
      await recordTreatment(raj, earlier.id, { diagnosis: "Migraine", prescription: "Dark room", medicines: "" });

      const history = await patientHistory(ctx, alice.principal.id);

      expect(history.patient.username).toBe("alice");
      expect(history.treatments.map((t) => [t.appointmentDate, t.diagnosis, t.doctorName, t.departmentName])).toEqual([
        ["2024-01-10", "Migraine", "Raj Patel", "Neurology"],
        ["2024-01-12", "Follow-up", "Jane Doe", "Cardiology"],
      ]);
    });

    it("fails for an unknown patient", async () => {
      await expect(patientHistory(ctx, 404)).rejects.toThrow(new NotFoundError("Patient", 404));
    });
  });

  describe("doctorDashboard", () => {
    it("shows own appointments and each patient once", async () => {
      const bob = as(ctx, await addPatient(ctx, "bob"));
      const first = await book(alice, jane, "2024-01-10");
      await book(alice, jane, "2024-01-11");
      await book(bob, jane, "2024-01-10", "16:00-21:00");
      await book(bob, raj, "2024-01-10");
      await recordTreatment(jane, first.id, { diagnosis: "Flu", prescription: "", medicines: "" });

      const dashboard = await doctorDashboard(jane);

      expect(dashboard.appointments.map((a) => [a.appointmentDate, a.patientName, a.status, a.hasTreatment])).toEqual([
        ["2024-01-10", "Alice Smith", "Completed", true],
        ["2024-01-10", "bob", "Booked", false],
        ["2024-01-11", "Alice Smith", "Booked", false],
      ]);
      expect(dashboard.assignedPatients.map((p) => p.username)).toEqual(["alice", "bob"]);
    });
  });
});
