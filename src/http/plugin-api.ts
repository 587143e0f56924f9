/**
 * CareDesk - Plugin Host API
 *
 * Each user area (auth, admin, doctor, patient) is a plugin that registers
 * its HTTP routes through this API, the same shape for every extension.
 */

import type { NextFunction, Request, Response, Router } from "express";

import type { CaredeskConfig } from "../config/caredesk-config.ts";
import type { CaredeskDb } from "../db/connection.ts";
import type { Role } from "../db/schema/auth.ts";
import type { SubsystemLogger } from "../logging/subsystem.ts";
import type { Principal, RequestContext, ServiceContext } from "../services/context.ts";
import { AuthorizationError } from "../errors.ts";
import { endSession, requireRole, startSession, type SessionOptions } from "../auth/middleware.ts";

export type RouteMethod = "GET" | "POST";

export type PublicRoute = {
  method: RouteMethod;
  path: string;
  handler: (req: Request, res: Response, ctx: ServiceContext) => Promise<void>;
};

export type RoleRoute = {
  method: RouteMethod;
  path: string;
  roles: readonly Role[];
  handler: (req: Request, res: Response, ctx: RequestContext) => Promise<void>;
};

export type SessionControl = {
  start(res: Response, principal: Principal): void;
  end(res: Response): void;
};

export type CaredeskPluginApi = {
  config: CaredeskConfig;
  logger: SubsystemLogger;
  sessions: SessionControl;
  registerHttpRoute(route: PublicRoute): void;
  registerRoleRoute(route: RoleRoute): void;
};

export type CaredeskPlugin = {
  id: string;
  name: string;
  description: string;
  version: string;
  register(api: CaredeskPluginApi): void;
};

export type PluginHostDeps = {
  router: Router;
  db: CaredeskDb;
  config: CaredeskConfig;
  session: SessionOptions;
  logger: SubsystemLogger;
};

type Middleware = (req: Request, res: Response, next: NextFunction) => void;

function mount(router: Router, method: RouteMethod, path: string, handlers: Middleware[]): void {
  if (method === "GET") router.get(path, ...handlers);
  else router.post(path, ...handlers);
}

export function createPluginApi(deps: PluginHostDeps): CaredeskPluginApi {
  const { router, db, config, session, logger } = deps;
  const services: ServiceContext = { db, config };

  return {
    config,
    logger,
    sessions: {
      start: (res, principal) => startSession(res, principal, session),
      end: (res) => endSession(res, session),
    },

    registerHttpRoute(route) {
      mount(router, route.method, route.path, [
        (req, res, next) => {
          route.handler(req, res, services).catch(next);
        },
      ]);
      logger.debug(`route ${route.method} ${route.path}`);
    },

    registerRoleRoute(route) {
      mount(router, route.method, route.path, [
        requireRole(...route.roles),
        (req, res, next) => {
          const principal = req.principal;
          if (!principal) {
            next(new AuthorizationError());
            return;
          }
          route.handler(req, res, { ...services, principal }).catch(next);
        },
      ]);
      logger.debug(`route ${route.method} ${route.path} [${route.roles.join(",")}]`);
    },
  };
}
