import { describe, it, expect } from "vitest";
import {
  addDays,
  daysBetween,
  eachDay,
  fixedClock,
  formatLocalDate,
  isValidDate,
  monthBounds,
  toCalendarDate,
  yearBounds,
} from "../dates";

describe("isValidDate", () => {
  it("accepts real calendar dates", () => {
    expect(isValidDate("2026-01-10")).toBe(true);
    expect(isValidDate("2024-02-29")).toBe(true);
  });

  it("rejects impossible or malformed dates", () => {
    expect(isValidDate("2026-02-29")).toBe(false);
    expect(isValidDate("2026-13-01")).toBe(false);
    expect(isValidDate("2026-1-10")).toBe(false);
    expect(isValidDate("not-a-date")).toBe(false);
  });
});

describe("addDays / daysBetween", () => {
  it("crosses month and year boundaries", () => {
    expect(addDays("2026-01-31", 1)).toBe("2026-02-01");
    expect(addDays("2026-01-01", -1)).toBe("2025-12-31");
    expect(addDays("2024-02-28", 1)).toBe("2024-02-29");
  });

  it("counts whole days, negative when reversed", () => {
    expect(daysBetween("2026-01-01", "2026-01-10")).toBe(9);
    expect(daysBetween("2026-01-10", "2026-01-01")).toBe(-9);
    expect(daysBetween("2026-03-01", "2026-03-01")).toBe(0);
  });
});

describe("eachDay", () => {
  it("lists every date inclusive", () => {
    expect(eachDay("2026-02-27", "2026-03-02")).toEqual([
      "2026-02-27",
      "2026-02-28",
      "2026-03-01",
      "2026-03-02",
    ]);
  });

  it("is empty when start is after end", () => {
    expect(eachDay("2026-01-02", "2026-01-01")).toEqual([]);
  });
});

describe("monthBounds / yearBounds", () => {
  it("resolves month length including leap February", () => {
    expect(monthBounds("2024-02")).toEqual({ start: "2024-02-01", end: "2024-02-29" });
    expect(monthBounds("2026-04")).toEqual({ start: "2026-04-01", end: "2026-04-30" });
  });

  it("returns null for malformed months", () => {
    expect(monthBounds("2026-13")).toBeNull();
    expect(monthBounds("2026-00")).toBeNull();
    expect(monthBounds("2026/02")).toBeNull();
  });

  it("covers a whole year", () => {
    expect(yearBounds(2026)).toEqual({ start: "2026-01-01", end: "2026-12-31" });
  });
});

describe("toCalendarDate", () => {
  it("passes plain dates through", () => {
    expect(toCalendarDate("2026-01-01")).toBe("2026-01-01");
  });

  it("uses the local date of a timestamp", () => {
    const instant = new Date(2026, 0, 5, 9, 30);
    expect(toCalendarDate(instant.toISOString())).toBe("2026-01-05");
  });
});

describe("fixedClock", () => {
  it("reports the pinned date", () => {
    const clock = fixedClock("2026-01-10");
    expect(clock.today()).toBe("2026-01-10");
    expect(formatLocalDate(clock.now())).toBe("2026-01-10");
  });
});
