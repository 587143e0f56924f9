/**
 * CareDesk - View Models
 *
 * Pages answer the JSON a template would render, plus pending flashes.
 */

import type { Request, Response } from "express";

import { takeFlashes } from "./flash.ts";

export function renderView(req: Request, res: Response, view: string, model: Record<string, unknown> = {}): void {
  res.json({
    view,
    principal: req.principal ?? null,
    flashes: takeFlashes(req, res),
    ...model,
  });
}
