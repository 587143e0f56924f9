/**
 * CareDesk - Flash Messages
 *
 * One-shot messages that survive a redirect, carried in a short-lived cookie
 * and cleared by the next page that reads them.
 */

import type { Request, Response } from "express";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export const FLASH_COOKIE = "caredesk_flash";

const FlashListSchema = Type.Array(
  Type.Object({
    category: Type.Union([
      Type.Literal("success"),
      Type.Literal("info"),
      Type.Literal("warning"),
      Type.Literal("danger"),
    ]),
    message: Type.String(),
  }),
);

export type Flash = Static<typeof FlashListSchema>[number];
export type FlashCategory = Flash["category"];

const queued = new WeakMap<Response, Flash[]>();

function parseFlashCookie(raw: unknown): Flash[] {
  if (typeof raw !== "string") return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return []; // tampered or truncated cookie
  }
  return Value.Check(FlashListSchema, parsed) ? parsed : [];
}

/** Queue a message behind any still unread from earlier redirects. */
export function flash(res: Response, category: FlashCategory, message: string): void {
  const pending = queued.get(res) ?? parseFlashCookie(res.req.cookies?.[FLASH_COOKIE]);
  const queue = [...pending, { category, message }];
  queued.set(res, queue);
  res.cookie(FLASH_COOKIE, JSON.stringify(queue), { httpOnly: true, sameSite: "lax", path: "/" });
}

/** Read and clear pending messages. */
export function takeFlashes(req: Request, res: Response): Flash[] {
  const raw: unknown = req.cookies?.[FLASH_COOKIE];
  queued.set(res, []);
  if (typeof raw !== "string") return [];
  res.clearCookie(FLASH_COOKIE, { path: "/" });
  return parseFlashCookie(raw);
}
