// Daily log upsert — one record per (habit, date), created or updated in place.
//
// Reads decide create-vs-update; the write itself is a single saveAll call so a
// batch lands all-or-nothing. If a concurrent request inserted the same
// (habit, date) between our read and write, the store's unique constraint
// rejects the write and we plan again against the fresh state.

import type { DailyLog, Habit } from "@/types/database";
import type { Clock } from "./dates";
import { isValidDate } from "./dates";
import { NotFoundError, UniqueViolationError, ValidationError, type FieldIssue } from "./errors";
import { log } from "./log";
import type { Repositories } from "./repositories";

export const MAX_BATCH_SIZE = 100;
const MAX_ATTEMPTS = 2;

export interface LogWrite {
  habitId: string;
  logDate: string;
  completed: boolean;
  notes?: string | null;
}

// ─── Validation ─────────────────────────────────────────

function assertLoggable(entries: LogWrite[], today: string, batch: boolean): void {
  const issues: FieldIssue[] = [];
  entries.forEach((entry, i) => {
    const path = batch ? `logs.${i}.logDate` : "logDate";
    if (!isValidDate(entry.logDate)) {
      issues.push({ path, message: "Log date must be a valid date (YYYY-MM-DD)" });
    } else if (entry.logDate > today) {
      issues.push({ path, message: "Log date cannot be in the future" });
    }
  });
  if (issues.length > 0) {
    throw new ValidationError(issues[0].message, issues);
  }
}

async function resolveHabits(
  repos: Repositories,
  ownerId: string,
  entries: LogWrite[]
): Promise<Map<string, Habit>> {
  const habits = new Map<string, Habit>();
  for (const entry of entries) {
    if (habits.has(entry.habitId)) continue;
    const habit = await repos.habits.findByIdAndOwner(entry.habitId, ownerId);
    if (!habit) throw NotFoundError.habit();
    habits.set(habit.id, habit);
  }
  return habits;
}

// ─── Planning ───────────────────────────────────────────

/**
 * Decide the row each entry produces. Entries hitting the same (habit, date)
 * fold into one row; the later entry wins.
 */
async function planRecords(
  repos: Repositories,
  entries: LogWrite[],
  nowIso: string
): Promise<{ records: DailyLog[]; order: string[] }> {
  const pending = new Map<string, DailyLog>();
  const order: string[] = [];

  for (const entry of entries) {
    const key = `${entry.habitId}:${entry.logDate}`;
    const existing =
      pending.get(key) ?? (await repos.logs.findByHabitAndDate(entry.habitId, entry.logDate));

    const record: DailyLog = existing
      ? {
          ...existing,
          completed: entry.completed,
          notes: entry.notes ?? null,
          updated_at: nowIso,
        }
      : {
          id: crypto.randomUUID(),
          habit_id: entry.habitId,
          log_date: entry.logDate,
          completed: entry.completed,
          notes: entry.notes ?? null,
          created_at: nowIso,
          updated_at: nowIso,
        };

    pending.set(key, record);
    order.push(record.id);
  }

  return { records: [...pending.values()], order };
}

async function applyWrites(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  entries: LogWrite[],
  batch: boolean
): Promise<DailyLog[]> {
  assertLoggable(entries, clock.today(), batch);
  await resolveHabits(repos, ownerId, entries);

  for (let attempt = 1; ; attempt++) {
    const { records, order } = await planRecords(repos, entries, clock.now().toISOString());
    try {
      const saved = await repos.logs.saveAll(records);
      const byId = new Map(saved.map((row) => [row.id, row]));
      return order.map((id) => {
        const row = byId.get(id);
        if (!row) throw new Error(`daily log ${id} missing from save result`);
        return row;
      });
    } catch (error) {
      if (!(error instanceof UniqueViolationError) || attempt >= MAX_ATTEMPTS) throw error;
      log("warn", "daily_log_upsert_conflict", { attempt, entries: entries.length });
    }
  }
}

// ─── Public API ─────────────────────────────────────────

/** Create or update the log for (habitId, logDate) owned by ownerId */
export async function reconcileLog(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  entry: LogWrite
): Promise<DailyLog> {
  const [saved] = await applyWrites(repos, clock, ownerId, [entry], false);
  return saved;
}

/**
 * Apply up to MAX_BATCH_SIZE upserts atomically. Results follow request order;
 * any invalid entry rejects the whole batch before anything is written.
 */
export async function reconcileLogs(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  entries: LogWrite[]
): Promise<DailyLog[]> {
  if (entries.length === 0) {
    throw new ValidationError("Logs list cannot be empty", [
      { path: "logs", message: "Logs list cannot be empty" },
    ]);
  }
  if (entries.length > MAX_BATCH_SIZE) {
    throw new ValidationError(`Cannot process more than ${MAX_BATCH_SIZE} logs at once`, [
      { path: "logs", message: `Cannot process more than ${MAX_BATCH_SIZE} logs at once` },
    ]);
  }
  return applyWrites(repos, clock, ownerId, entries, true);
}
