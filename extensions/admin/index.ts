/**
 * CareDesk - Admin Extension Plugin
 *
 * Provides:
 *   - Dashboard with doctor/patient search and all appointments
 *   - Doctor create / edit / delete
 *   - Patient delete
 *   - Patient treatment history
 */

import { Type } from "@sinclair/typebox";

import type { CaredeskPluginApi } from "../../src/http/plugin-api.ts";
import type { RequestContext } from "../../src/services/context.ts";
import { formAction } from "../../src/http/boundary.ts";
import { OptionalText, WholeNumberField, parseForm, parseRouteId } from "../../src/http/forms.ts";
import { renderView } from "../../src/http/views.ts";
import { adminDashboard } from "../../src/services/dashboard.ts";
import { createDoctor, deleteDoctor, deletePatient, editDoctor, getDoctor, listDepartments } from "../../src/services/directory.ts";
import { patientHistory } from "../../src/services/clinical.ts";

const ADMIN = ["admin"] as const;

const DoctorForm = Type.Object({
  fullname: Type.String({ minLength: 1, maxLength: 120 }),
  specialization: Type.String({ minLength: 1, maxLength: 100 }),
  experience: WholeNumberField,
  email: OptionalText(120),
});

const adminPlugin = {
  id: "caredesk-admin",
  name: "Administration",
  description: "Doctor and patient directory management for administrators",
  version: "1.0.0",

  register(api: CaredeskPluginApi) {
    // ── GET /admin/dashboard ─────────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/admin/dashboard",
      roles: ADMIN,
      handler: async (req, res, ctx) => {
        const searchQuery = typeof req.query.search_query === "string" ? req.query.search_query : undefined;
        renderView(req, res, "admin_dashboard", { ...(await adminDashboard(ctx, searchQuery)) });
      },
    });

    // ── /admin/create_doctor ─────────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/admin/create_doctor",
      roles: ADMIN,
      handler: async (req, res, ctx) => {
        renderView(req, res, "admin_create_doctor", { departments: await listDepartments(ctx) });
      },
    });

    api.registerRoleRoute({
      method: "POST",
      path: "/admin/create_doctor",
      roles: ADMIN,
      handler: formAction<RequestContext>(api.logger, () => "/admin/create_doctor", async (req, _res, ctx) => {
        const form = parseForm(DoctorForm, req.body);
        const created = await createDoctor(ctx, {
          fullName: form.fullname,
          specialization: form.specialization,
          experienceYears: Number(form.experience),
          email: form.email,
        });
        api.logger.info(`Doctor created: ${created.username} (${created.department.name})`);
        return {
          redirect: "/admin/dashboard",
          flash: {
            category: "success",
            message: `Doctor ${created.doctor.fullName} added! (Login: ${created.username} / ${created.initialPassword})`,
          },
        };
      }),
    });

    // ── /admin/edit_doctor/:id ───────────────────────────────
    api.registerRoleRoute({
      method: "GET",
      path: "/admin/edit_doctor/:id",
      roles: ADMIN,
      handler: async (req, res, ctx) => {
        const doctor = await getDoctor(ctx, parseRouteId(req.params.id, "Doctor"));
        renderView(req, res, "admin_edit_doctor", { doctor, departments: await listDepartments(ctx) });
      },
    });

    api.registerRoleRoute({
      method: "POST",
      path: "/admin/edit_doctor/:id",
      roles: ADMIN,
      handler: formAction<RequestContext>(
        api.logger,
        (req) => `/admin/edit_doctor/${req.params.id ?? ""}`,
        async (req, _res, ctx) => {
          const doctorId = parseRouteId(req.params.id, "Doctor");
          const form = parseForm(DoctorForm, req.body);
          await editDoctor(ctx, doctorId, {
            fullName: form.fullname,
            specialization: form.specialization,
            experienceYears: Number(form.experience),
            email: form.email,
          });
          return { redirect: "/admin/dashboard", flash: { category: "success", message: "Doctor details updated!" } };
        },
      ),
    });

    // ── POST /admin/delete_doctor/:id ────────────────────────
    api.registerRoleRoute({
      method: "POST",
      path: "/admin/delete_doctor/:id",
      roles: ADMIN,
      handler: formAction<RequestContext>(api.logger, () => "/admin/dashboard", async (req, _res, ctx) => {
        const doctorId = parseRouteId(req.params.id, "Doctor");
        const { cancelledAppointments } = await deleteDoctor(ctx, doctorId);
        api.logger.info(`Doctor ${doctorId} deleted (${cancelledAppointments} booked appointment(s) cancelled)`);
        return { redirect: "/admin/dashboard", flash: { category: "success", message: "Doctor deleted successfully." } };
      }),
    });

    // ── POST /admin/delete_patient/:id ───────────────────────
    api.registerRoleRoute({
      method: "POST",
      path: "/admin/delete_patient/:id",
      roles: ADMIN,
      handler: formAction<RequestContext>(api.logger, () => "/admin/dashboard", async (req, _res, ctx) => {
        const patientId = parseRouteId(req.params.id, "Patient");
        const { cancelledAppointments } = await deletePatient(ctx, patientId);
        api.logger.info(`Patient ${patientId} deleted (${cancelledAppointments} booked appointment(s) cancelled)`);
        return { redirect: "/admin/dashboard", flash: { category: "success", message: "Patient deleted successfully." } };
      }),
    });

    // ── GET /admin/view_patient_history/:patientId ───────────
    api.registerRoleRoute({
      method: "GET",
      path: "/admin/view_patient_history/:patientId",
      roles: ADMIN,
      handler: async (req, res, ctx) => {
        const history = await patientHistory(ctx, parseRouteId(req.params.patientId, "Patient"));
        renderView(req, res, "admin_patient_history", { ...history });
      },
    });

    api.logger.info(
      "Administration plugin registered (routes: /admin/dashboard, /admin/create_doctor, /admin/edit_doctor/:id, " +
        "/admin/delete_doctor/:id, /admin/delete_patient/:id, /admin/view_patient_history/:patientId)",
    );
  },
};

export default adminPlugin;
