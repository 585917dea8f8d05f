import { describe, it, expect } from "vitest";
import {
  completionPercentage,
  computeStats,
  currentStreak,
  longestStreak,
  percentage,
  type StatsLog,
} from "../stats";

// ─── Test Helpers ─────────────────────────────────────────

function done(...dates: string[]): StatsLog[] {
  return dates.map((log_date) => ({ log_date, completed: true }));
}

function missed(...dates: string[]): StatsLog[] {
  return dates.map((log_date) => ({ log_date, completed: false }));
}

const TODAY = "2026-01-10";

// ─── computeStats ─────────────────────────────────────────

describe("computeStats", () => {
  it("reports 70% for seven completions over ten days", () => {
    const logs = done(
      "2026-01-01",
      "2026-01-02",
      "2026-01-03",
      "2026-01-04",
      "2026-01-05",
      "2026-01-06",
      "2026-01-07"
    );
    const stats = computeStats(logs, "2026-01-01", TODAY);
    expect(stats.totalCompleted).toBe(7);
    expect(stats.completionPercentage).toBe(70);
    expect(stats.longestStreak).toBe(7);
    expect(stats.currentStreak).toBe(0);
  });

  it("returns zeros for a habit with no logs", () => {
    expect(computeStats([], "2026-01-01", TODAY)).toEqual({
      currentStreak: 0,
      longestStreak: 0,
      totalCompleted: 0,
      completionPercentage: 0,
    });
  });

  it("does not depend on log order", () => {
    const logs = [...done("2026-01-09", "2026-01-10"), ...done("2026-01-08")].reverse();
    const stats = computeStats(logs, "2026-01-01", TODAY);
    expect(stats.currentStreak).toBe(3);
    expect(stats.longestStreak).toBe(3);
  });
});

// ─── currentStreak ────────────────────────────────────────

describe("currentStreak", () => {
  it("is zero after a gap even when an older run exists", () => {
    const logs = done("2026-01-01", "2026-01-02", "2026-01-03");
    expect(currentStreak(logs, TODAY)).toBe(0);
    expect(longestStreak(logs)).toBe(3);
  });

  it("counts yesterday and today", () => {
    expect(currentStreak(done("2026-01-09", "2026-01-10"), TODAY)).toBe(2);
  });

  it("anchors at yesterday when today is not logged yet", () => {
    expect(currentStreak(done("2026-01-07", "2026-01-08", "2026-01-09"), TODAY)).toBe(3);
  });

  it("anchors at yesterday when today is logged as not completed", () => {
    const logs = [...done("2026-01-08", "2026-01-09"), ...missed("2026-01-10")];
    expect(currentStreak(logs, TODAY)).toBe(2);
  });

  it("is zero when yesterday was missed and today is not done", () => {
    const logs = [...done("2026-01-01", "2026-01-08"), ...missed("2026-01-09")];
    expect(currentStreak(logs, TODAY)).toBe(0);
  });

  it("is one when today is done but yesterday was missed", () => {
    const logs = [...done("2026-01-08", "2026-01-10"), ...missed("2026-01-09")];
    expect(currentStreak(logs, TODAY)).toBe(1);
  });

  it("walks back across a month boundary", () => {
    expect(currentStreak(done("2025-12-31", "2026-01-01"), "2026-01-01")).toBe(2);
  });
});

// ─── longestStreak ────────────────────────────────────────

describe("longestStreak", () => {
  it("restarts on a gap between completed days", () => {
    const logs = done("2026-01-01", "2026-01-02", "2026-01-04", "2026-01-05", "2026-01-06");
    expect(longestStreak(logs)).toBe(3);
  });

  it("resets on an incomplete log", () => {
    const logs = [
      ...done("2026-01-01", "2026-01-02"),
      ...missed("2026-01-03"),
      ...done("2026-01-04"),
    ];
    expect(longestStreak(logs)).toBe(2);
  });

  it("is never shorter than the current streak", () => {
    const logs = [...done("2026-01-01"), ...missed("2026-01-02"), ...done("2026-01-08", "2026-01-09", "2026-01-10")];
    const current = currentStreak(logs, TODAY);
    expect(current).toBe(3);
    expect(longestStreak(logs)).toBeGreaterThanOrEqual(current);
  });
});

// ─── completionPercentage ─────────────────────────────────

describe("completionPercentage", () => {
  it("counts both the creation day and today", () => {
    expect(completionPercentage(1, TODAY, TODAY)).toBe(100);
    expect(completionPercentage(1, "2026-01-09", TODAY)).toBe(50);
  });

  it("rounds to two decimals", () => {
    expect(completionPercentage(1, "2026-01-08", TODAY)).toBe(33.33);
    expect(completionPercentage(2, "2026-01-08", TODAY)).toBe(66.67);
  });

  it("rounds a half-way result up", () => {
    // 160 days from 2026-01-01 through 2026-06-09
    expect(completionPercentage(23, "2026-01-01", "2026-06-09")).toBe(14.38);
    expect(completionPercentage(41, "2026-01-01", "2026-06-09")).toBe(25.63);
  });

  it("clamps at 100", () => {
    expect(completionPercentage(5, "2026-01-09", TODAY)).toBe(100);
  });

  it("is zero when creation is in the future", () => {
    expect(completionPercentage(3, "2026-01-12", TODAY)).toBe(0);
  });

  it("accepts a creation timestamp", () => {
    const created = new Date(2026, 0, 1, 18, 45).toISOString();
    expect(completionPercentage(5, created, TODAY)).toBe(50);
  });
});

describe("percentage", () => {
  it("rounds to two decimal places", () => {
    expect(percentage(1, 3)).toBe(33.33);
    expect(percentage(7, 10)).toBe(70);
  });

  it("rounds exact halves up", () => {
    expect(percentage(23, 160)).toBe(14.38);
    expect(percentage(41, 160)).toBe(25.63);
    expect(percentage(1, 8)).toBe(12.5);
  });
});
