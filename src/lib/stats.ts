// Habit statistics — streaks and completion percentage from a habit's logs.
// Pure: no storage, no clock. Callers pass "today" explicitly.

import type { DailyLog } from "@/types/database";
import { addDays, daysBetween, toCalendarDate } from "./dates";

export type StatsLog = Pick<DailyLog, "log_date" | "completed">;

export interface StreakStats {
  currentStreak: number;
  longestStreak: number;
  totalCompleted: number;
  completionPercentage: number;
}

// ─── Streaks ────────────────────────────────────────────

/**
 * Consecutive completed days ending at the anchor day. The anchor is today
 * when today is completed, otherwise yesterday. A missing or incomplete
 * anchor means no current streak, even if an older run exists.
 */
export function currentStreak(logs: StatsLog[], today: string): number {
  const completedDates = new Set<string>();
  for (const log of logs) {
    if (log.completed) completedDates.add(log.log_date);
  }

  const anchor = completedDates.has(today) ? today : addDays(today, -1);
  let streak = 0;
  let expected = anchor;
  while (completedDates.has(expected)) {
    streak++;
    expected = addDays(expected, -1);
  }
  return streak;
}

/** Longest run of consecutive completed days anywhere in the history */
export function longestStreak(logs: StatsLog[]): number {
  const ascending = [...logs].sort((a, b) => a.log_date.localeCompare(b.log_date));

  let max = 0;
  let running = 0;
  let expected: string | null = null;

  for (const log of ascending) {
    if (!log.completed) {
      running = 0;
      expected = null;
      continue;
    }
    // A completed day that doesn't follow the tracked one starts a new run of 1
    running = expected === null || log.log_date === expected ? running + 1 : 1;
    expected = addDays(log.log_date, 1);
    max = Math.max(max, running);
  }

  return max;
}

// ─── Completion ─────────────────────────────────────────

/**
 * numerator / denominator as a percentage with two decimals, halves up.
 * Scaled in one step so exact halves (23/160 = 14.375%) aren't lost to a
 * second floating-point multiply.
 */
export function percentage(numerator: number, denominator: number): number {
  return Math.round((numerator * 10_000) / denominator) / 100;
}

/**
 * Completed days as a percentage of days since creation, counting both the
 * creation day and today. Zero when creation is in the future.
 */
export function completionPercentage(
  totalCompleted: number,
  habitCreatedAt: string,
  today: string
): number {
  const daysSinceCreation = daysBetween(toCalendarDate(habitCreatedAt), today) + 1;
  if (daysSinceCreation <= 0) return 0;
  return Math.min(100, percentage(totalCompleted, daysSinceCreation));
}

// ─── Combined ───────────────────────────────────────────

/** All stats for one habit. Logs may arrive in any order; empty input yields zeros. */
export function computeStats(
  logs: StatsLog[],
  habitCreatedAt: string,
  today: string
): StreakStats {
  const totalCompleted = logs.filter((l) => l.completed).length;
  return {
    currentStreak: currentStreak(logs, today),
    longestStreak: longestStreak(logs),
    totalCompleted,
    completionPercentage: completionPercentage(totalCompleted, habitCreatedAt, today),
  };
}
