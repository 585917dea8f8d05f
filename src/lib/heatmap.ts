// Heatmap builder — turns a sparse set of logs into one entry per calendar day.
// Missing days are explicit (completed: false, notes: null), never omitted.

import type { DailyLog, Heatmap, HeatmapDay } from "@/types/database";
import { daysBetween, eachDay, isValidDate, monthBounds, yearBounds } from "./dates";
import { InvalidDateRangeError } from "./errors";

/** Longest range a single heatmap or log query may cover, inclusive */
export const MAX_RANGE_DAYS = 366;

export type HeatmapLog = Pick<DailyLog, "log_date" | "completed" | "notes">;

/** Reject reversed or oversized ranges */
export function assertDateRange(startDate: string, endDate: string): void {
  if (!isValidDate(startDate) || !isValidDate(endDate)) {
    throw new InvalidDateRangeError("Dates must be valid calendar dates (YYYY-MM-DD)");
  }
  if (startDate > endDate) {
    throw new InvalidDateRangeError("Start date must be before or equal to end date");
  }
  if (daysBetween(startDate, endDate) + 1 > MAX_RANGE_DAYS) {
    throw new InvalidDateRangeError(`Date range cannot exceed ${MAX_RANGE_DAYS} days`);
  }
}

export function buildHeatmap(
  habitId: string,
  startDate: string,
  endDate: string,
  logs: HeatmapLog[]
): Heatmap {
  assertDateRange(startDate, endDate);

  const byDate = new Map<string, HeatmapLog>();
  for (const log of logs) {
    byDate.set(log.log_date, log);
  }

  const days: HeatmapDay[] = eachDay(startDate, endDate).map((date) => {
    const log = byDate.get(date);
    return {
      date,
      completed: log?.completed ?? false,
      notes: log?.notes ?? null,
    };
  });

  return { habitId, startDate, endDate, days };
}

// ─── Query Range Resolution ─────────────────────────────

export interface HeatmapRangeQuery {
  year?: number;
  month?: string;        // "YYYY-MM"
  startDate?: string;
  endDate?: string;
}

/**
 * Resolve the heatmap endpoint's query forms, in priority order:
 * explicit start+end, a whole year, a whole month, else the current year.
 */
export function resolveHeatmapRange(
  query: HeatmapRangeQuery,
  today: string
): { start: string; end: string } {
  if (query.startDate !== undefined || query.endDate !== undefined) {
    if (query.startDate === undefined || query.endDate === undefined) {
      throw new InvalidDateRangeError("Both startDate and endDate must be provided together");
    }
    return { start: query.startDate, end: query.endDate };
  }
  if (query.year !== undefined) {
    return yearBounds(query.year);
  }
  if (query.month !== undefined) {
    const bounds = monthBounds(query.month);
    if (!bounds) {
      throw new InvalidDateRangeError("Invalid month format. Expected YYYY-MM (e.g. 2026-02)");
    }
    return bounds;
  }
  return yearBounds(Number(today.slice(0, 4)));
}
