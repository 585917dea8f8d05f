// Shared test data for the store-backed suites.

import type { DailyLog, Habit, UserRow } from "@/types/database";
import { MemoryDatabase, createMemoryRepositories } from "../repositories/memory";
import type { Repositories } from "../repositories";

export const OWNER = "00000000-0000-4000-8000-000000000001";
export const STRANGER = "00000000-0000-4000-8000-000000000002";
export const HABIT = "00000000-0000-4000-8000-0000000000a1";
export const OTHER_HABIT = "00000000-0000-4000-8000-0000000000a2";

export function makeUser(overrides: Partial<UserRow> = {}): UserRow {
  return {
    id: OWNER,
    username: "sam",
    email: "sam@example.com",
    password_hash: "not-a-real-hash",
    created_at: "2026-01-01T08:00:00.000Z",
    updated_at: "2026-01-01T08:00:00.000Z",
    ...overrides,
  };
}

export function makeHabit(overrides: Partial<Habit> = {}): Habit {
  return {
    id: HABIT,
    user_id: OWNER,
    name: "Read",
    description: null,
    color: "#10b981",
    display_order: 0,
    archived: false,
    archived_at: null,
    created_at: "2026-01-01",
    ...overrides,
  };
}

export function makeLog(overrides: Partial<DailyLog> = {}): DailyLog {
  return {
    id: crypto.randomUUID(),
    habit_id: HABIT,
    log_date: "2026-01-01",
    completed: true,
    notes: null,
    created_at: "2026-01-01T20:00:00.000Z",
    updated_at: "2026-01-01T20:00:00.000Z",
    ...overrides,
  };
}

/** A memory store holding one user who owns HABIT, plus a second user */
export function seededStore(): { db: MemoryDatabase; repos: Repositories } {
  const db = new MemoryDatabase();
  db.users.set(OWNER, makeUser());
  db.users.set(STRANGER, makeUser({ id: STRANGER, username: "alex", email: "alex@example.com" }));
  db.habits.set(HABIT, makeHabit());
  return { db, repos: createMemoryRepositories(db) };
}

export function seedLogs(db: MemoryDatabase, ...logs: DailyLog[]): void {
  for (const log of logs) db.logs.set(log.id, log);
}
