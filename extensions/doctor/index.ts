/**
 * CareDesk - Doctor Extension Plugin
 *
 * Provides:
 *   - Dashboard: own appointments and assigned patients
 *   - Complete / cancel own appointments
 *   - Treatment record per appointment
 *   - Patient history
 *   - Availability for the coming days
 */

import { Type } from "@sinclair/typebox";

import type { CaredeskPluginApi } from "../../src/http/plugin-api.ts";
import type { RequestContext } from "../../src/services/context.ts";
import { formAction } from "../../src/http/boundary.ts";
import { OptionalText, formList, parseForm, parseRouteId } from "../../src/http/forms.ts";
import { renderView } from "../../src/http/views.ts";
import {
  applyDoctorAction,
  doctorDashboard,
  getTreatmentForm,
  parseDoctorAction,
  patientHistory,
  recordTreatment,
} from "../../src/services/clinical.ts";
import { availabilityGrid, listOwnAvailability, setAvailability } from "../../src/services/availability.ts";
import { todayIn } from "../../src/services/calendar.ts";

const DOCTOR = ["doctor"] as const;

const TreatmentForm = Type.Object({
  diagnosis: OptionalText(5000),
  prescription: OptionalText(5000),
  medicines: OptionalText(5000),
});

/** Checked boxes post "<date>|<slot>"; unchecked boxes post nothing. */
const AvailabilityForm = Type.Object({
  available: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
});

const doctorPlugin = {
  id: "caredesk-doctor",
  name: "Doctor Workspace",
  description: "Appointment handling, treatment records and availability for doctors",
  version: "1.0.0",

  register(api: CaredeskPluginApi) {
    // ── GET /doctor/dashboard ────────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/doctor/dashboard",
      roles: DOCTOR,
      handler: async (req, res, ctx) => {
        renderView(req, res, "doctor_dashboard", { ...(await doctorDashboard(ctx)) });
      },
    });

    // ── POST /doctor/appointment_action/:id/:action ──────────
    api.registerRoleRoute({
      method: "POST",
      path: "/doctor/appointment_action/:id/:action",
      roles: DOCTOR,
      handler: formAction<RequestContext>(api.logger, () => "/doctor/dashboard", async (req, _res, ctx) => {
        const appointmentId = parseRouteId(req.params.id, "Appointment");
        const action = parseDoctorAction(req.params.action ?? "");
        const appointment = await applyDoctorAction(ctx, appointmentId, action);
        return {
          redirect: "/doctor/dashboard",
          flash: { category: "success", message: `Appointment ${appointment.status.toLowerCase()}.` },
        };
      }),
    });

    // ── /doctor/update_history/:appointmentId ────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/doctor/update_history/:appointmentId",
      roles: DOCTOR,
      handler: async (req, res, ctx) => {
        const form = await getTreatmentForm(ctx, parseRouteId(req.params.appointmentId, "Appointment"));
        renderView(req, res, "doctor_update_history", { ...form });
      },
    });

    api.registerRoleRoute({
      method: "POST",
      path: "/doctor/update_history/:appointmentId",
      roles: DOCTOR,
      handler: formAction<RequestContext>(
        api.logger,
        (req) => `/doctor/update_history/${req.params.appointmentId ?? ""}`,
        async (req, _res, ctx) => {
          const appointmentId = parseRouteId(req.params.appointmentId, "Appointment");
          const form = parseForm(TreatmentForm, req.body);
          await recordTreatment(ctx, appointmentId, {
            diagnosis: form.diagnosis ?? "",
            prescription: form.prescription ?? "",
            medicines: form.medicines ?? "",
          });
          return { redirect: "/doctor/dashboard", flash: { category: "success", message: "Patient history updated!" } };
        },
      ),
    });

    // ── GET /doctor/view_patient_history/:patientId ──────────
    api.registerRoleRoute({
      method: "GET",
      path: "/doctor/view_patient_history/:patientId",
      roles: DOCTOR,
      handler: async (req, res, ctx) => {
        const history = await patientHistory(ctx, parseRouteId(req.params.patientId, "Patient"));
        renderView(req, res, "doctor_patient_history", { ...history });
      },
    });

    // ── /doctor/availability ─────────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/doctor/availability",
      roles: DOCTOR,
      handler: async (req, res, ctx) => {
        const today = todayIn(ctx.config.hospital.timezone);
        renderView(req, res, "doctor_availability", {
          grid: availabilityGrid(ctx, today),
          declared: await listOwnAvailability(ctx, today),
        });
      },
    });

    api.registerRoleRoute({
      method: "POST",
      path: "/doctor/availability",
      roles: DOCTOR,
      handler: formAction<RequestContext>(api.logger, () => "/doctor/availability", async (req, _res, ctx) => {
        const form = parseForm(AvailabilityForm, req.body);
        const checked = new Set(formList(form.available));
        const today = todayIn(ctx.config.hospital.timezone);
        const entries = availabilityGrid(ctx, today).map(({ date, timeSlot }) => ({
          date,
          timeSlot,
          isAvailable: checked.has(`${date}|${timeSlot}`),
        }));
        const saved = await setAvailability(ctx, entries, today);
        return {
          redirect: "/doctor/dashboard",
          flash: { category: "success", message: `Availability saved (${saved} slots).` },
        };
      }),
    });

    api.logger.info(
      "Doctor Workspace plugin registered (routes: /doctor/dashboard, /doctor/appointment_action/:id/:action, " +
        "/doctor/update_history/:appointmentId, /doctor/view_patient_history/:patientId, /doctor/availability)",
    );
  },
};

export default doctorPlugin;
