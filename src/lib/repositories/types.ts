// Storage contracts. Every habit/log lookup that a client can trigger is
// scoped by owner id; a row owned by someone else reads as null.

import type { DailyLog, Habit, UserRow } from "@/types/database";

export interface UserStore {
  findById(id: string): Promise<UserRow | null>;
  findByUsername(username: string): Promise<UserRow | null>;
  findByEmail(email: string): Promise<UserRow | null>;
  insert(user: UserRow): Promise<UserRow>;
}

export interface HabitStore {
  /** Ordered by display_order, then created_at */
  listByOwner(ownerId: string, includeArchived: boolean): Promise<Habit[]>;
  findByIdAndOwner(id: string, ownerId: string): Promise<Habit | null>;
  insert(habit: Habit): Promise<Habit>;
  /** Write every row in one statement; all rows or none */
  saveAll(habits: Habit[]): Promise<Habit[]>;
  /** Deletes the habit and its logs. False if nothing matched. */
  delete(id: string, ownerId: string): Promise<boolean>;
}

export interface LogStore {
  /** All logs of a habit, ascending by date */
  listByHabit(habitId: string): Promise<DailyLog[]>;
  /** Logs of a habit with start <= log_date <= end, ascending */
  listByHabitInRange(habitId: string, startDate: string, endDate: string): Promise<DailyLog[]>;
  findByHabitAndDate(habitId: string, logDate: string): Promise<DailyLog | null>;
  /** A log whose habit belongs to ownerId */
  findByIdAndOwner(id: string, ownerId: string): Promise<DailyLog | null>;
  /**
   * Insert-or-update by id, all rows in one atomic write. Throws
   * UniqueViolationError if a row would duplicate (habit_id, log_date).
   */
  saveAll(logs: DailyLog[]): Promise<DailyLog[]>;
  delete(id: string): Promise<void>;
}

export interface Repositories {
  users: UserStore;
  habits: HabitStore;
  logs: LogStore;
}
