// Daily log reads and deletes. Writes go through reconcile.ts.

import type { DailyLog } from "@/types/database";
import { NotFoundError } from "./errors";
import { assertDateRange } from "./heatmap";
import type { Repositories } from "./repositories";

export async function getLogsInRange(
  repos: Repositories,
  ownerId: string,
  habitId: string,
  startDate: string,
  endDate: string
): Promise<DailyLog[]> {
  const habit = await repos.habits.findByIdAndOwner(habitId, ownerId);
  if (!habit) throw NotFoundError.habit();
  assertDateRange(startDate, endDate);
  return repos.logs.listByHabitInRange(habit.id, startDate, endDate);
}

export async function getLog(repos: Repositories, ownerId: string, logId: string): Promise<DailyLog> {
  const log = await repos.logs.findByIdAndOwner(logId, ownerId);
  if (!log) throw NotFoundError.log();
  return log;
}

export async function deleteLog(repos: Repositories, ownerId: string, logId: string): Promise<void> {
  const log = await getLog(repos, ownerId, logId);
  await repos.logs.delete(log.id);
}
