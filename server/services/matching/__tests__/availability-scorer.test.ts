import { describe, it, expect } from "vitest";
import type { DayOfWeek } from "@shared/schema";
import { qualifyingDays, scoreAvailability } from "../availability-scorer";

// 2026-03-04 is a Wednesday
const wednesdayMorning = new Date("2026-03-04T09:00:00Z");

function week(...days: DayOfWeek[]): Record<DayOfWeek, boolean> {
  return {
    sun: days.includes("sun"),
    mon: days.includes("mon"),
    tue: days.includes("tue"),
    wed: days.includes("wed"),
    thu: days.includes("thu"),
    fri: days.includes("fri"),
    sat: days.includes("sat"),
  };
}

describe("qualifyingDays", () => {
  it("limits urgent work to the posting day", () => {
    expect(qualifyingDays("urgent", wednesdayMorning)).toEqual(["wed"]);
  });

  it("uses the UTC calendar day", () => {
    // 23:30 in New York is already Thursday in UTC
    expect(qualifyingDays("urgent", new Date("2026-03-04T23:30:00-05:00"))).toEqual(["thu"]);
  });

  it("accepts any day for non-urgent work", () => {
    expect(qualifyingDays("high", wednesdayMorning)).toHaveLength(7);
    expect(qualifyingDays("low", wednesdayMorning)).toHaveLength(7);
  });
});

describe("scoreAvailability", () => {
  it("is 1 for urgent work when the provider works that day", () => {
    expect(scoreAvailability(week("wed"), "urgent", wednesdayMorning)).toBe(1);
  });

  it("is 0 for urgent work on a day off", () => {
    expect(scoreAvailability(week("mon", "tue"), "urgent", wednesdayMorning)).toBe(0);
  });

  it("is 1 for relaxed urgency with any working day", () => {
    expect(scoreAvailability(week("sun"), "medium", wednesdayMorning)).toBe(1);
  });

  it("is 0 for a provider who never works", () => {
    expect(scoreAvailability(week(), "low", wednesdayMorning)).toBe(0);
  });
});
