/**
 * CareDesk - Auth Extension Plugin
 *
 * Provides HTTP routes for:
 *   GET  /, /login    login page
 *   POST /login       authenticate and start a session
 *   GET  /register    registration page
 *   POST /register    patient self-registration
 *   GET  /logout      end the session
 *   POST /password    change own password (any signed-in role)
 */

import type { Request, Response } from "express";
import { Type } from "@sinclair/typebox";

import type { CaredeskPluginApi } from "../../src/http/plugin-api.ts";
import type { RequestContext, ServiceContext } from "../../src/services/context.ts";
import { formAction } from "../../src/http/boundary.ts";
import { OptionalText, parseForm } from "../../src/http/forms.ts";
import { flash } from "../../src/http/flash.ts";
import { renderView } from "../../src/http/views.ts";
import { ROLES } from "../../src/db/schema/auth.ts";
import { AuthenticationError } from "../../src/errors.ts";
import { authenticate, changePassword, registerPatient } from "../../src/services/identity.ts";

const LoginForm = Type.Object({
  username: Type.String({ minLength: 1, maxLength: 80 }),
  password: Type.String({ minLength: 1 }),
});

const RegisterForm = Type.Object({
  username: Type.String({ minLength: 1, maxLength: 80 }),
  password: Type.String({ minLength: 1 }),
  full_name: OptionalText(120),
  contact: OptionalText(20),
});

const PasswordForm = Type.Object({
  current_password: Type.String({ minLength: 1 }),
  new_password: Type.String({ minLength: 1 }),
});

const authPlugin = {
  id: "caredesk-auth",
  name: "CareDesk Auth",
  description: "Login, logout, patient registration and password changes",
  version: "1.0.0",

  register(api: CaredeskPluginApi) {
    const loginPage = async (req: Request, res: Response) => {
      renderView(req, res, "login");
    };
    api.registerHttpRoute({ method: "GET", path: "/", handler: loginPage });
    api.registerHttpRoute({ method: "GET", path: "/login", handler: loginPage });

    // ── POST /login ──────────────────────────────────────────
    api.registerHttpRoute({
      method: "POST",
      path: "/login",
      handler: formAction<ServiceContext>(api.logger, () => "/login", async (req, res, ctx) => {
        const { username, password } = parseForm(LoginForm, req.body);
        const principal = await authenticate(ctx, username, password);
        if (!principal) throw new AuthenticationError("Invalid credentials.");

        api.sessions.start(res, principal);
        api.logger.info(`Login: ${principal.username} (${principal.role})`);
        return { redirect: `/${principal.role}/dashboard` };
      }),
    });

    // ── /register ────────────────────────────────────────────
    api.registerHttpRoute({
      method: "GET",
      path: "/register",
      handler: async (req, res) => {
        renderView(req, res, "register", { minPasswordLength: api.config.security.minPasswordLength });
      },
    });

    api.registerHttpRoute({
      method: "POST",
      path: "/register",
      handler: formAction<ServiceContext>(api.logger, () => "/register", async (req, _res, ctx) => {
        const form = parseForm(RegisterForm, req.body);
        const patient = await registerPatient(ctx, {
          username: form.username,
          password: form.password,
          fullName: form.full_name,
          contact: form.contact,
        });
        api.logger.info(`Patient registered: ${patient.username}`);
        return {
          redirect: "/login",
          flash: { category: "success", message: "Registration successful! Please log in." },
        };
      }),
    });

    // ── GET /logout ──────────────────────────────────────────
    api.registerHttpRoute({
      method: "GET",
      path: "/logout",
      handler: async (_req, res) => {
        api.sessions.end(res);
        flash(res, "info", "You have been logged out.");
        res.redirect("/login");
      },
    });

    // ── POST /password ───────────────────────────────────────
    api.registerRoleRoute({
      method: "POST",
      path: "/password",
      roles: ROLES,
      handler: formAction<RequestContext>(
        api.logger,
        (req) => `/${req.principal?.role ?? "login"}/dashboard`,
        async (req, _res, ctx) => {
          const form = parseForm(PasswordForm, req.body);
          await changePassword(ctx, form.current_password, form.new_password);
          return {
            redirect: `/${ctx.principal.role}/dashboard`,
            flash: { category: "success", message: "Password updated." },
          };
        },
      ),
    });

    api.logger.info(
      "CareDesk Auth plugin registered (routes: /login, /register, /logout, /password)",
    );
  },
};

export default authPlugin;
