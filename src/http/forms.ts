/**
 * CareDesk - Form Input
 *
 * Form bodies (urlencoded) and route params are validated with TypeBox
 * before they reach a service.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { InvalidInputError, NotFoundError } from "../errors.ts";

export function parseForm<T extends TSchema>(schema: T, body: unknown): Static<T> {
  if (Value.Check(schema, body)) return body;

  const first = Value.Errors(schema, body).First();
  const field = first?.path.replace(/^\//, "") || "form";
  throw new InvalidInputError(`Invalid ${field}: ${first?.message ?? "unexpected input"}.`);
}

/** Non-negative whole number, as typed into a form field. */
export const WholeNumberField = Type.String({ pattern: "^\\s*\\d{1,3}\\s*$" });

/** Optional free-text field: absent and empty both mean "". */
export const OptionalText = (maxLength: number) => Type.Optional(Type.String({ maxLength }));

/** Route ids that are not positive integers cannot name any row. */
export function parseRouteId(value: string | undefined, resource: string): number {
  if (value === undefined || !/^\d{1,9}$/.test(value)) {
    throw new NotFoundError(resource, value ?? "");
  }
  return Number(value);
}

/** Checkbox groups post one value, several values, or nothing. */
export function formList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}
