import { describe, expect, it } from "vitest";
import { Type } from "@sinclair/typebox";

import { InvalidInputError, NotFoundError } from "../errors.ts";
import { formList, OptionalText, parseForm, parseRouteId, WholeNumberField } from "./forms.ts";

const DoctorForm = Type.Object({
  fullname: Type.String({ minLength: 1 }),
  experience: WholeNumberField,
  email: OptionalText(10),
});

describe("parseForm", () => {
  it("passes a valid body through", () => {
    expect(parseForm(DoctorForm, { fullname: "Jane Doe", experience: " 12 " })).toEqual({
      fullname: "Jane Doe",
      experience: " 12 ",
    });
  });

  it("names the first offending field", () => {
    expect(() => parseForm(DoctorForm, { fullname: "Jane Doe", experience: "ten" })).toThrow(/^Invalid experience: /);
    expect(() => parseForm(DoctorForm, { fullname: "Jane Doe", experience: "1", email: "a".repeat(11) })).toThrow(
      InvalidInputError,
    );
  });
});

describe("parseRouteId", () => {
  it("accepts positive integer strings", () => {
    expect(parseRouteId("42", "Doctor")).toBe(42);
  });

  it("treats anything else as a missing record", () => {
    expect(() => parseRouteId("4x", "Doctor")).toThrow(new NotFoundError("Doctor", "4x"));
    expect(() => parseRouteId(undefined, "Doctor")).toThrow(NotFoundError);
    expect(() => parseRouteId("-1", "Doctor")).toThrow(NotFoundError);
  });
});

describe("formList", () => {
  it("normalizes checkbox values", () => {
    expect(formList(undefined)).toEqual([]);
    expect(formList("2024-01-10|08:00-12:00")).toEqual(["2024-01-10|08:00-12:00"]);
    expect(formList(["a", "b"])).toEqual(["a", "b"]);
  });
});
