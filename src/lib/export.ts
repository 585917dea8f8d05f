// Data export — every habit with its full log history, as CSV or JSON.

import type { DailyLog, Habit } from "@/types/database";
import type { Repositories } from "./repositories";

export interface HabitWithLogs {
  habit: Habit;
  logs: DailyLog[];
}

export interface JsonExport {
  exportDate: string;
  habits: {
    id: string;
    name: string;
    description: string | null;
    color: string | null;
    displayOrder: number;
    archived: boolean;
    logs: { date: string; completed: boolean; notes: string | null }[];
  }[];
}

/** Quote a CSV field if it contains a comma, quote or line break */
export function escapeCsv(value: string | null): string {
  if (value === null) return "";
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(data: HabitWithLogs[]): string {
  const lines = ["Habit Name,Date,Completed,Notes"];
  for (const { habit, logs } of data) {
    for (const log of logs) {
      lines.push(
        [escapeCsv(habit.name), log.log_date, String(log.completed), escapeCsv(log.notes)].join(",")
      );
    }
  }
  return lines.join("\n") + "\n";
}

export function toJsonExport(data: HabitWithLogs[], exportDate: string): JsonExport {
  return {
    exportDate,
    habits: data.map(({ habit, logs }) => ({
      id: habit.id,
      name: habit.name,
      description: habit.description,
      color: habit.color,
      displayOrder: habit.display_order,
      archived: habit.archived,
      logs: logs.map((log) => ({
        date: log.log_date,
        completed: log.completed,
        notes: log.notes,
      })),
    })),
  };
}

/** All of an owner's habits (archived included) in display order, logs ascending */
export async function loadExportData(repos: Repositories, ownerId: string): Promise<HabitWithLogs[]> {
  const habits = await repos.habits.listByOwner(ownerId, true);
  return Promise.all(
    habits.map(async (habit) => ({ habit, logs: await repos.logs.listByHabit(habit.id) }))
  );
}
