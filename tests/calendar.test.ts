import { describe, expect, it } from "vitest";

import {
  addDays,
  daysInMonth,
  eachDateOfYear,
  isIsoDate,
  isoWeek,
  isoWeekday,
  isoWeeksInYear,
  todayIsoDate,
  weekdayName
} from "@/lib/utils/calendar";

describe("calendar utils", () => {
  it("accepts only real YYYY-MM-DD dates", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-2-1")).toBe(false);
    expect(isIsoDate("not a date")).toBe(false);
  });

  it("adds days across month and year boundaries", () => {
    expect(addDays("2024-12-31", 1)).toBe("2025-01-01");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(addDays("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("formats the UTC day of a timestamp", () => {
    expect(todayIsoDate(new Date(Date.UTC(2024, 4, 9, 23, 30)))).toBe("2024-05-09");
  });

  it("counts days per month including leap years", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 12)).toBe(31);
  });

  it("numbers weekdays from Monday", () => {
    expect(isoWeekday("2024-01-01")).toBe(1);
    expect(isoWeekday("2024-01-07")).toBe(7);
    expect(weekdayName("2024-01-03")).toBe("Wednesday");
  });

  it("resolves ISO weeks that belong to a neighbouring year", () => {
    expect(isoWeek("2021-01-01")).toEqual({ isoYear: 2020, week: 53 });
    expect(isoWeek("2024-12-30")).toEqual({ isoYear: 2025, week: 1 });
    expect(isoWeek("2024-06-15")).toEqual({ isoYear: 2024, week: 24 });
    expect(isoWeeksInYear(2020)).toBe(53);
    expect(isoWeeksInYear(2021)).toBe(52);
  });

  it("lists every date of a year", () => {
    const dates = eachDateOfYear(2024);
    expect(dates).toHaveLength(366);
    expect(dates[0]).toBe("2024-01-01");
    expect(dates.at(-1)).toBe("2024-12-31");
    expect(eachDateOfYear(2023)).toHaveLength(365);
  });
});
