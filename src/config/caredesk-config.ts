/**
 * CareDesk - Application Configuration Schema
 *
 * Validated with Zod. Values come from an optional JSON config file
 * (CAREDESK_CONFIG) with CAREDESK_* environment variables layered on top.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

/** Whether `Intl` knows the IANA zone name. */
function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export const caredeskConfigSchema = z
  .object({
    /** Hospital identity */
    hospital: z
      .object({
        name: z.string().default("CareDesk"),
        /** IANA zone that decides which calendar day is "today" */
        timezone: z.string().refine(isKnownTimeZone, "Unknown time zone").default("UTC"),
      })
      .default({}),

    /** HTTP listener */
    server: z
      .object({
        host: z.string().default("0.0.0.0"),
        port: z.number().int().positive().default(3000),
      })
      .default({}),

    /** Database connection (password only via CAREDESK_DB_PASSWORD) */
    database: z
      .object({
        host: z.string().default("localhost"),
        port: z.number().default(5432),
        name: z.string().default("caredesk"),
        user: z.string().default("caredesk"),
        poolMax: z.number().default(20),
      })
      .default({}),

    security: z
      .object({
        /** Session lifetime in minutes */
        sessionTimeoutMinutes: z.number().positive().default(60),
        sessionCookieName: z.string().min(1).default("caredesk_session"),
        /** Mark cookies Secure; enable behind HTTPS */
        secureCookies: z.boolean().default(false),
        minPasswordLength: z.number().int().min(1).default(8),
        /** Assigned to every doctor the admin creates; changed via /password */
        defaultDoctorPassword: z.string().min(1).default("doctor123"),
        defaultAdminUsername: z.string().min(1).default("admin"),
        defaultAdminPassword: z.string().min(1).default("admin"),
      })
      .default({}),

    scheduling: z
      .object({
        /** Bookable slot labels, shared by bookings and availability */
        timeSlots: z.array(z.string().min(1).max(30)).min(1).default(["08:00-12:00", "16:00-21:00"]),
        /** How many days ahead a doctor declares availability for */
        availabilityWindowDays: z.number().int().min(1).max(60).default(7),
      })
      .default({}),
  })
  .default({});

export type CaredeskConfig = z.infer<typeof caredeskConfigSchema>;

/**
 * Parse a raw config object. Falls back to defaults when it does not validate.
 */
export function loadCaredeskConfig(rawConfig?: unknown): CaredeskConfig {
  const parsed = caredeskConfigSchema.safeParse(rawConfig ?? {});
  if (!parsed.success) {
    console.warn(
      "[caredesk:config] Invalid config, using defaults:",
      parsed.error.issues,
    );
    return caredeskConfigSchema.parse({});
  }
  return parsed.data;
}

function readConfigFile(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf8"));
}

function numberFromEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Build the config from the process environment.
 * CAREDESK_CONFIG names a JSON file; individual variables override it.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): CaredeskConfig {
  const base = loadCaredeskConfig(env.CAREDESK_CONFIG ? readConfigFile(env.CAREDESK_CONFIG) : undefined);

  return {
    ...base,
    server: {
      ...base.server,
      host: env.CAREDESK_HOST ?? base.server.host,
      port: numberFromEnv(env.CAREDESK_PORT) ?? base.server.port,
    },
    database: {
      host: env.CAREDESK_DB_HOST ?? base.database.host,
      port: numberFromEnv(env.CAREDESK_DB_PORT) ?? base.database.port,
      name: env.CAREDESK_DB_NAME ?? base.database.name,
      user: env.CAREDESK_DB_USER ?? base.database.user,
      poolMax: numberFromEnv(env.CAREDESK_DB_POOL_MAX) ?? base.database.poolMax,
    },
  };
}

/** Signing secret for session cookies. Required to start the server. */
export function getSessionSecret(env: NodeJS.ProcessEnv = process.env): string {
  const secret = env.CAREDESK_SESSION_SECRET;
  if (!secret) {
    throw new Error(
      "[caredesk:auth] CAREDESK_SESSION_SECRET environment variable is required",
    );
  }
  return secret;
}
