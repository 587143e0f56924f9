/**
 * CareDesk - Session Middleware
 *
 * Express middleware that reads the signed session cookie and gates routes
 * by role. The resolved principal rides on `req.principal` and is handed to
 * services explicitly as part of a RequestContext.
 */

import type { Request, Response, NextFunction, CookieOptions } from "express";

import type { Role } from "../db/schema/auth.ts";
import type { Principal } from "../services/context.ts";
import type { CaredeskDb } from "../db/connection.ts";
import { flash } from "../http/flash.ts";
import { principalExists } from "../services/identity.ts";
import { issueSessionToken, verifySessionToken } from "./session.ts";

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}

export type SessionOptions = {
  secret: string;
  cookieName: string;
  ttlSeconds: number;
  secureCookies: boolean;
};

function cookieOptions(options: SessionOptions): CookieOptions {
  return {
    httpOnly: true,
    sameSite: "lax",
    secure: options.secureCookies,
    path: "/",
  };
}

/**
 * Populate req.principal from the session cookie. A missing, forged or
 * expired cookie leaves the request anonymous, and so does a valid cookie
 * whose account no longer exists; that cookie is also cleared.
 */
export function loadSession(options: SessionOptions, db: CaredeskDb) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token: unknown = req.cookies?.[options.cookieName];
    if (typeof token !== "string") {
      next();
      return;
    }

    const payload = verifySessionToken(token, options.secret);
    if (!payload) {
      next();
      return;
    }

    const principal: Principal = { id: payload.sub, role: payload.role, username: payload.username };
    principalExists(db, principal)
      .then((exists) => {
        if (exists) req.principal = principal;
        else endSession(res, options);
        next();
      })
      .catch(next);
  };
}

export function startSession(res: Response, principal: Principal, options: SessionOptions): void {
  const token = issueSessionToken(principal, options.secret, options.ttlSeconds);
  res.cookie(options.cookieName, token, { ...cookieOptions(options), maxAge: options.ttlSeconds * 1000 });
}

export function endSession(res: Response, options: SessionOptions): void {
  res.clearCookie(options.cookieName, cookieOptions(options));
}

/**
 * Allow only the listed roles. Anonymous and wrong-role requests are both
 * sent back to the login page.
 *
 * @example
 * router.get("/admin/dashboard", requireRole("admin"), handler);
 */
export function requireRole(...roles: Role[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.principal) {
      flash(res, "danger", "Please log in.");
      res.redirect("/login");
      return;
    }

    if (!roles.includes(req.principal.role)) {
      flash(res, "danger", "Access denied.");
      res.redirect("/login");
      return;
    }

    next();
  };
}
