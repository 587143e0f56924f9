/**
 * CareDesk - Workflow Boundary
 *
 * Form posts end in a redirect. Failures become a flash message and a
 * redirect to the page the form came from; nothing is retried.
 */

import type { Request, Response } from "express";

import { isCaredeskError } from "../errors.ts";
import type { SubsystemLogger } from "../logging/subsystem.ts";
import { flash, type FlashCategory } from "./flash.ts";

export type FormOutcome = {
  redirect: string;
  flash?: { category: FlashCategory; message: string };
};

export type FormHandler<C> = (req: Request, res: Response, ctx: C) => Promise<FormOutcome>;

export function formAction<C>(
  logger: SubsystemLogger,
  failureRedirect: (req: Request) => string,
  work: FormHandler<C>,
): (req: Request, res: Response, ctx: C) => Promise<void> {
  return async (req, res, ctx) => {
    try {
      const outcome = await work(req, res, ctx);
      if (outcome.flash) flash(res, outcome.flash.category, outcome.flash.message);
      res.redirect(outcome.redirect);
    } catch (err) {
      if (isCaredeskError(err)) {
        if (err.kind === "StorageFailure") {
          logger.error(`${req.method} ${req.path} failed`, err.cause);
        } else if (err.kind === "AuthorizationFailure") {
          logger.warn(`${req.method} ${req.path} denied for ${req.principal?.username ?? "anonymous"}`);
        } else {
          logger.debug(`${req.method} ${req.path} rejected: ${err.kind}`);
        }
        flash(res, "danger", err.message);
      } else {
        logger.error(`${req.method} ${req.path} failed`, err);
        flash(res, "danger", "Something went wrong.");
      }
      res.redirect(failureRedirect(req));
    }
  };
}
