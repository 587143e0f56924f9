/**
 * CareDesk - Service Context
 *
 * Services never read ambient state: the database handle, the config and
 * (for principal-scoped operations) the signed-in principal are passed in.
 */

import type { CaredeskConfig } from "../config/caredesk-config.ts";
import type { CaredeskDb } from "../db/connection.ts";
import type { Role } from "../db/schema/auth.ts";
import { AuthorizationError } from "../errors.ts";

export type Principal = {
  id: number;
  role: Role;
  username: string;
};

export type ServiceContext = {
  db: CaredeskDb;
  config: CaredeskConfig;
};

export type RequestContext = ServiceContext & {
  principal: Principal;
};

export function assertRole(ctx: RequestContext, role: Role): void {
  if (ctx.principal.role !== role) {
    throw new AuthorizationError();
  }
}
