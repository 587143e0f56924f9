/**
 * CareDesk - HTTP Server
 *
 * Builds the express app: body and cookie parsing, session loading, the four
 * area plugins, and a final error handler for page (non-form) routes.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import cookieParser from "cookie-parser";
import type { Server } from "node:http";

import { configFromEnv, getSessionSecret, type CaredeskConfig } from "./config/caredesk-config.ts";
import { closeDb, getDb, type CaredeskDb } from "./db/connection.ts";
import { applySchema } from "./db/migrate.ts";
import { isCaredeskError } from "./errors.ts";
import { loadSession, type SessionOptions } from "./auth/middleware.ts";
import { createPluginApi, type CaredeskPlugin } from "./http/plugin-api.ts";
import { createSubsystemLogger } from "./logging/subsystem.ts";
import { ensureDefaultAdmin } from "./services/identity.ts";
import authPlugin from "../extensions/auth/index.ts";
import adminPlugin from "../extensions/admin/index.ts";
import doctorPlugin from "../extensions/doctor/index.ts";
import patientPlugin from "../extensions/patient/index.ts";

export const DEFAULT_PLUGINS: CaredeskPlugin[] = [authPlugin, adminPlugin, doctorPlugin, patientPlugin];

export type CreateAppOptions = {
  db: CaredeskDb;
  config: CaredeskConfig;
  sessionSecret: string;
  plugins?: CaredeskPlugin[];
};

const log = createSubsystemLogger("server");

export function createApp(options: CreateAppOptions): express.Express {
  const { db, config } = options;
  const session: SessionOptions = {
    secret: options.sessionSecret,
    cookieName: config.security.sessionCookieName,
    ttlSeconds: Math.round(config.security.sessionTimeoutMinutes * 60),
    secureCookies: config.security.secureCookies,
  };

  const app = express();
  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  app.use(loadSession(session, db));

  const router = express.Router();
  for (const plugin of options.plugins ?? DEFAULT_PLUGINS) {
    const logger = createSubsystemLogger(plugin.id);
    logger.info(`${plugin.name} plugin registering...`);
    plugin.register(createPluginApi({ router, db, config, session, logger }));
  }
  app.use(router);

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: "NotFound", message: `No route for ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isCaredeskError(err)) {
      if (err.kind === "StorageFailure") log.error(`${req.method} ${req.path} failed`, err.cause);
      res.status(err.status).json({ error: err.kind, message: err.message });
      return;
    }
    log.error(`${req.method} ${req.path} failed`, err);
    res.status(500).json({ error: "StorageFailure", message: "Internal server error" });
  });

  return app;
}

/** Bootstrap schema and admin account, then listen. */
export async function startServer(env: NodeJS.ProcessEnv = process.env): Promise<Server> {
  const config = configFromEnv(env);
  const sessionSecret = getSessionSecret(env);
  const db = getDb(config.database);

  const statements = await applySchema(db);
  log.info(`Schema ready (${statements} statements applied)`);
  if (await ensureDefaultAdmin({ db, config })) {
    log.info(`Admin account "${config.security.defaultAdminUsername}" created`);
  }

  const app = createApp({ db, config, sessionSecret });
  const server = app.listen(config.server.port, config.server.host, () => {
    log.info(`${config.hospital.name} listening on http://${config.server.host}:${config.server.port}`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close(() => {
      closeDb().catch((err) => log.error("Failed to close database pool", err));
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return server;
}
