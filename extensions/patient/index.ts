/**
 * CareDesk - Patient Extension Plugin
 *
 * Provides:
 *   - Dashboard: departments and own appointments
 *   - Booking and cancelling appointments
 *   - Own treatment history
 *   - Department and doctor profile pages
 *   - Profile editing
 */

import { Type } from "@sinclair/typebox";

import type { CaredeskPluginApi } from "../../src/http/plugin-api.ts";
import type { RequestContext } from "../../src/services/context.ts";
import { formAction } from "../../src/http/boundary.ts";
import { OptionalText, parseForm, parseRouteId } from "../../src/http/forms.ts";
import { renderView } from "../../src/http/views.ts";
import { InvalidInputError } from "../../src/errors.ts";
import { bookAppointment, cancelAppointment, listPatientAppointments } from "../../src/services/booking.ts";
import { patientHistory } from "../../src/services/clinical.ts";
import { todayIn, toIsoDate } from "../../src/services/calendar.ts";
import {
  getDepartmentWithDoctors,
  getDoctorProfile,
  getPatient,
  listDepartments,
  updatePatientProfile,
} from "../../src/services/directory.ts";

const PATIENT = ["patient"] as const;

const BookingForm = Type.Object({
  date: Type.String({ minLength: 1, maxLength: 10 }),
  time_slot: Type.String({ minLength: 1, maxLength: 30 }),
});

const ProfileForm = Type.Object({
  full_name: OptionalText(120),
  contact: OptionalText(20),
});

const patientPlugin = {
  id: "caredesk-patient",
  name: "Patient Portal",
  description: "Appointment booking, history and profile for patients",
  version: "1.0.0",

  register(api: CaredeskPluginApi) {
    // ── GET /patient/dashboard ───────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/patient/dashboard",
      roles: PATIENT,
      handler: async (req, res, ctx) => {
        renderView(req, res, "patient_dashboard", {
          user: await getPatient(ctx, ctx.principal.id),
          departments: await listDepartments(ctx),
          appointments: await listPatientAppointments(ctx),
        });
      },
    });

    // ── /patient/book_appointment/:doctorId ──────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/patient/book_appointment/:doctorId",
      roles: PATIENT,
      handler: async (req, res, ctx) => {
        const today = toIsoDate(todayIn(ctx.config.hospital.timezone));
        const profile = await getDoctorProfile(ctx, parseRouteId(req.params.doctorId, "Doctor"), today);
        renderView(req, res, "patient_book_appointment", {
          ...profile,
          timeSlots: ctx.config.scheduling.timeSlots,
        });
      },
    });

    api.registerRoleRoute({
      method: "POST",
      path: "/patient/book_appointment/:doctorId",
      roles: PATIENT,
      handler: formAction<RequestContext>(
        api.logger,
        (req) => `/patient/book_appointment/${req.params.doctorId ?? ""}`,
        async (req, _res, ctx) => {
          const doctorId = parseRouteId(req.params.doctorId, "Doctor");
          const form = parseForm(BookingForm, req.body);
          const appointment = await bookAppointment(ctx, { doctorId, date: form.date, timeSlot: form.time_slot });
          api.logger.info(
            `Appointment ${appointment.id} booked: patient ${ctx.principal.id}, doctor ${doctorId}, ` +
              `${appointment.appointmentDate} ${appointment.timeSlot}`,
          );
          return { redirect: "/patient/dashboard", flash: { category: "success", message: "Booked successfully!" } };
        },
      ),
    });

    // ── POST /patient/appointment_action/:id/:action ─────────
    api.registerRoleRoute({
      method: "POST",
      path: "/patient/appointment_action/:id/:action",
      roles: PATIENT,
      handler: formAction<RequestContext>(api.logger, () => "/patient/dashboard", async (req, _res, ctx) => {
        const appointmentId = parseRouteId(req.params.id, "Appointment");
        if (req.params.action !== "cancel") {
          throw new InvalidInputError(`Unknown appointment action "${req.params.action ?? ""}".`);
        }

        const outcome = await cancelAppointment(ctx, appointmentId);
        if (!outcome.cancelled) {
          if (outcome.reason === "not_owner") {
            api.logger.warn(`Patient ${ctx.principal.id} tried to cancel appointment ${appointmentId} they do not own`);
          }
          return { redirect: "/patient/dashboard", flash: { category: "danger", message: "Cannot cancel." } };
        }
        return { redirect: "/patient/dashboard", flash: { category: "warning", message: "Appointment cancelled." } };
      }),
    });

    // ── GET /patient/history ─────────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/patient/history",
      roles: PATIENT,
      handler: async (req, res, ctx) => {
        renderView(req, res, "patient_history", { ...(await patientHistory(ctx, ctx.principal.id)) });
      },
    });

    // ── GET /patient/department/:deptId ──────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/patient/department/:deptId",
      roles: PATIENT,
      handler: async (req, res, ctx) => {
        const view = await getDepartmentWithDoctors(ctx, parseRouteId(req.params.deptId, "Department"));
        renderView(req, res, "patient_department", { ...view });
      },
    });

    // ── GET /patient/doctor_profile/:doctorId ────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/patient/doctor_profile/:doctorId",
      roles: PATIENT,
      handler: async (req, res, ctx) => {
        const today = toIsoDate(todayIn(ctx.config.hospital.timezone));
        const profile = await getDoctorProfile(ctx, parseRouteId(req.params.doctorId, "Doctor"), today);
        renderView(req, res, "patient_doctor_profile", { ...profile });
      },
    });

    // ── /patient/edit_profile ────────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/patient/edit_profile",
      roles: PATIENT,
      handler: async (req, res, ctx) => {
        renderView(req, res, "patient_edit_profile", { user: await getPatient(ctx, ctx.principal.id) });
      },
    });

    api.registerRoleRoute({
      method: "POST",
      path: "/patient/edit_profile",
      roles: PATIENT,
      handler: formAction<RequestContext>(api.logger, () => "/patient/edit_profile", async (req, _res, ctx) => {
        const form = parseForm(ProfileForm, req.body);
        await updatePatientProfile(ctx, { fullName: form.full_name ?? "", contact: form.contact ?? "" });
        return { redirect: "/patient/dashboard", flash: { category: "success", message: "Profile updated!" } };
      }),
    });

    api.logger.info(
      "Patient Portal plugin registered (routes: /patient/dashboard, /patient/book_appointment/:doctorId, " +
        "/patient/appointment_action/:id/:action, /patient/history, /patient/department/:deptId, " +
        "/patient/doctor_profile/:doctorId, /patient/edit_profile)",
    );
  },
};

export default patientPlugin;
