// In-process store with the same contracts as the Postgres one.
// Used when Supabase isn't configured (local dev) and by the test suite.
// Rows are copied on the way in and out so callers can't mutate stored state.

import type { DailyLog, Habit, UserRow } from "@/types/database";
import { UniqueViolationError } from "../errors";
import type { HabitStore, LogStore, Repositories, UserStore } from "./types";

function copy<T extends object>(row: T): T {
  return { ...row };
}

function byDate(a: DailyLog, b: DailyLog): number {
  return a.log_date.localeCompare(b.log_date);
}

export class MemoryDatabase {
  readonly users = new Map<string, UserRow>();
  readonly habits = new Map<string, Habit>();
  readonly logs = new Map<string, DailyLog>();
  /** Number of saveAll calls on the log store that reached the write step */
  logWrites = 0;
}

class MemoryUserStore implements UserStore {
  constructor(private readonly db: MemoryDatabase) {}

  async findById(id: string): Promise<UserRow | null> {
    const user = this.db.users.get(id);
    return user ? copy(user) : null;
  }

  async findByUsername(username: string): Promise<UserRow | null> {
    for (const user of this.db.users.values()) {
      if (user.username === username) return copy(user);
    }
    return null;
  }

  async findByEmail(email: string): Promise<UserRow | null> {
    for (const user of this.db.users.values()) {
      if (user.email === email) return copy(user);
    }
    return null;
  }

  async insert(user: UserRow): Promise<UserRow> {
    for (const existing of this.db.users.values()) {
      if (existing.username === user.username || existing.email === user.email) {
        throw new Error("users_username_key or users_email_key violated");
      }
    }
    this.db.users.set(user.id, copy(user));
    return copy(user);
  }
}

class MemoryHabitStore implements HabitStore {
  constructor(private readonly db: MemoryDatabase) {}

  async listByOwner(ownerId: string, includeArchived: boolean): Promise<Habit[]> {
    return [...this.db.habits.values()]
      .filter((h) => h.user_id === ownerId && (includeArchived || !h.archived))
      .sort(
        (a, b) => a.display_order - b.display_order || a.created_at.localeCompare(b.created_at)
      )
      .map(copy);
  }

  async findByIdAndOwner(id: string, ownerId: string): Promise<Habit | null> {
    const habit = this.db.habits.get(id);
    return habit && habit.user_id === ownerId ? copy(habit) : null;
  }

  async insert(habit: Habit): Promise<Habit> {
    this.db.habits.set(habit.id, copy(habit));
    return copy(habit);
  }

  async saveAll(habits: Habit[]): Promise<Habit[]> {
    for (const habit of habits) {
      this.db.habits.set(habit.id, copy(habit));
    }
    return habits.map(copy);
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    const habit = this.db.habits.get(id);
    if (!habit || habit.user_id !== ownerId) return false;
    this.db.habits.delete(id);
    for (const [logId, log] of this.db.logs) {
      if (log.habit_id === id) this.db.logs.delete(logId);
    }
    return true;
  }
}

class MemoryLogStore implements LogStore {
  constructor(private readonly db: MemoryDatabase) {}

  async listByHabit(habitId: string): Promise<DailyLog[]> {
    return [...this.db.logs.values()].filter((l) => l.habit_id === habitId).sort(byDate).map(copy);
  }

  async listByHabitInRange(habitId: string, startDate: string, endDate: string): Promise<DailyLog[]> {
    return (await this.listByHabit(habitId)).filter(
      (l) => l.log_date >= startDate && l.log_date <= endDate
    );
  }

  async findByHabitAndDate(habitId: string, logDate: string): Promise<DailyLog | null> {
    for (const log of this.db.logs.values()) {
      if (log.habit_id === habitId && log.log_date === logDate) return copy(log);
    }
    return null;
  }

  async findByIdAndOwner(id: string, ownerId: string): Promise<DailyLog | null> {
    const log = this.db.logs.get(id);
    if (!log) return null;
    const habit = this.db.habits.get(log.habit_id);
    return habit && habit.user_id === ownerId ? copy(log) : null;
  }

  async saveAll(logs: DailyLog[]): Promise<DailyLog[]> {
    // Check the unique constraint for the whole batch before touching anything
    const keyOwner = new Map<string, string>();
    for (const existing of this.db.logs.values()) {
      keyOwner.set(`${existing.habit_id}:${existing.log_date}`, existing.id);
    }
    for (const log of logs) {
      const key = `${log.habit_id}:${log.log_date}`;
      const holder = keyOwner.get(key);
      if (holder !== undefined && holder !== log.id) {
        throw new UniqueViolationError();
      }
      keyOwner.set(key, log.id);
    }

    this.db.logWrites++;
    for (const log of logs) {
      this.db.logs.set(log.id, copy(log));
    }
    return logs.map(copy);
  }

  async delete(id: string): Promise<void> {
    this.db.logs.delete(id);
  }
}

export function createMemoryRepositories(db: MemoryDatabase = new MemoryDatabase()): Repositories {
  return {
    users: new MemoryUserStore(db),
    habits: new MemoryHabitStore(db),
    logs: new MemoryLogStore(db),
  };
}
