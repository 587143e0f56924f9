import { describe, expect, it } from "vitest";

import { InvalidInputError } from "../errors.ts";
import { testConfig } from "../test-utils/test-db.ts";
import { assertKnownSlot, parseCalendarDate, todayIn, toIsoDate, upcomingDates } from "./calendar.ts";

describe("parseCalendarDate", () => {
  it("accepts real calendar dates", () => {
    expect(parseCalendarDate("2024-01-10")).toBe("2024-01-10");
    expect(parseCalendarDate(" 2024-02-29 ")).toBe("2024-02-29");
  });

  it("rejects impossible or badly formatted dates", () => {
    for (const input of ["2024-02-30", "2023-02-29", "2024-13-01", "10/01/2024", "2024-1-10", ""]) {
      expect(() => parseCalendarDate(input)).toThrow(InvalidInputError);
    }
  });
});

describe("upcomingDates", () => {
  it("counts consecutive UTC days across a year boundary", () => {
    expect(upcomingDates(new Date("2024-12-30T15:00:00Z"), 3)).toEqual(["2024-12-30", "2024-12-31", "2025-01-01"]);
  });

  it("formats the UTC date", () => {
    expect(toIsoDate(new Date("2024-03-05T23:59:59Z"))).toBe("2024-03-05");
  });
});

describe("todayIn", () => {
  const now = new Date("2024-01-09T15:30:00Z");

  it("takes the calendar day of the hospital's zone", () => {
    expect(toIsoDate(todayIn("UTC", now))).toBe("2024-01-09");
    expect(toIsoDate(todayIn("America/New_York", now))).toBe("2024-01-09");
    expect(toIsoDate(todayIn("Australia/Sydney", now))).toBe("2024-01-10");
  });

  it("starts the window on the zone's day", () => {
    expect(upcomingDates(todayIn("Australia/Sydney", now), 2)).toEqual(["2024-01-10", "2024-01-11"]);
    expect(upcomingDates(todayIn("Pacific/Honolulu", new Date("2024-01-01T05:00:00Z")), 1)).toEqual(["2023-12-31"]);
  });
});

describe("assertKnownSlot", () => {
  const config = testConfig();

  it("returns configured slots", () => {
    expect(assertKnownSlot(config, "16:00-21:00")).toBe("16:00-21:00");
  });

  it("rejects anything else", () => {
    expect(() => assertKnownSlot(config, "12:00-13:00")).toThrow('Unknown time slot "12:00-13:00".');
  });
});
