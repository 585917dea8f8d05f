// Postgres-backed stores over the Supabase client (service role, server only).
// Rows are validated on the way out of the database; a schema drift fails loudly
// instead of leaking malformed objects into the stats code.

import type { PostgrestError, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { DailyLog, Habit, UserRow } from "@/types/database";
import { UniqueViolationError } from "../errors";
import type { HabitStore, LogStore, Repositories, UserStore } from "./types";

const UNIQUE_VIOLATION = "23505";

const USER_COLUMNS = "id, username, email, password_hash, created_at, updated_at";
const HABIT_COLUMNS =
  "id, user_id, name, description, color, display_order, archived, archived_at, created_at";
const LOG_COLUMNS = "id, habit_id, log_date, completed, notes, created_at, updated_at";

// ─── Row Schemas ────────────────────────────────────────

const userRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  password_hash: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
}) satisfies z.ZodType<UserRow>;

const habitRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  color: z.string().nullable(),
  display_order: z.number().int(),
  archived: z.boolean(),
  archived_at: z.string().nullable(),
  created_at: z.string(),
}) satisfies z.ZodType<Habit>;

const logRowSchema = z.object({
  id: z.string(),
  habit_id: z.string(),
  log_date: z.string(),
  completed: z.boolean(),
  notes: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
}) satisfies z.ZodType<DailyLog>;

// ─── Helpers ────────────────────────────────────────────

interface QueryResult {
  data: unknown;
  error: PostgrestError | null;
}

function check(table: string, error: PostgrestError | null): void {
  if (!error) return;
  if (error.code === UNIQUE_VIOLATION && table === "daily_logs") {
    throw new UniqueViolationError(error.message);
  }
  throw new Error(`${table}: ${error.message} (${error.code})`);
}

function many<T>(table: string, schema: z.ZodType<T>, result: QueryResult): T[] {
  check(table, result.error);
  return z.array(schema).parse(result.data ?? []);
}

function maybeOne<T>(table: string, schema: z.ZodType<T>, result: QueryResult): T | null {
  check(table, result.error);
  return result.data === null ? null : schema.parse(result.data);
}

function one<T>(table: string, schema: z.ZodType<T>, result: QueryResult): T {
  check(table, result.error);
  return schema.parse(result.data);
}

// ─── Stores ─────────────────────────────────────────────

class SupabaseUserStore implements UserStore {
  constructor(private readonly client: SupabaseClient) {}

  async findById(id: string): Promise<UserRow | null> {
    const result = await this.client.from("users").select(USER_COLUMNS).eq("id", id).maybeSingle();
    return maybeOne("users", userRowSchema, result);
  }

  async findByUsername(username: string): Promise<UserRow | null> {
    const result = await this.client
      .from("users")
      .select(USER_COLUMNS)
      .eq("username", username)
      .maybeSingle();
    return maybeOne("users", userRowSchema, result);
  }

  async findByEmail(email: string): Promise<UserRow | null> {
    const result = await this.client.from("users").select(USER_COLUMNS).eq("email", email).maybeSingle();
    return maybeOne("users", userRowSchema, result);
  }

  async insert(user: UserRow): Promise<UserRow> {
    const result = await this.client.from("users").insert(user).select(USER_COLUMNS).single();
    return one("users", userRowSchema, result);
  }
}

class SupabaseHabitStore implements HabitStore {
  constructor(private readonly client: SupabaseClient) {}

  async listByOwner(ownerId: string, includeArchived: boolean): Promise<Habit[]> {
    let query = this.client.from("habits").select(HABIT_COLUMNS).eq("user_id", ownerId);
    if (!includeArchived) query = query.eq("archived", false);
    const result = await query
      .order("display_order", { ascending: true })
      .order("created_at", { ascending: true });
    return many("habits", habitRowSchema, result);
  }

  async findByIdAndOwner(id: string, ownerId: string): Promise<Habit | null> {
    const result = await this.client
      .from("habits")
      .select(HABIT_COLUMNS)
      .eq("id", id)
      .eq("user_id", ownerId)
      .maybeSingle();
    return maybeOne("habits", habitRowSchema, result);
  }

  async insert(habit: Habit): Promise<Habit> {
    const result = await this.client.from("habits").insert(habit).select(HABIT_COLUMNS).single();
    return one("habits", habitRowSchema, result);
  }

  async saveAll(habits: Habit[]): Promise<Habit[]> {
    if (habits.length === 0) return [];
    const result = await this.client
      .from("habits")
      .upsert(habits, { onConflict: "id" })
      .select(HABIT_COLUMNS);
    return many("habits", habitRowSchema, result);
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    // daily_logs.habit_id is ON DELETE CASCADE
    const { error, count } = await this.client
      .from("habits")
      .delete({ count: "exact" })
      .eq("id", id)
      .eq("user_id", ownerId);
    check("habits", error);
    return (count ?? 0) > 0;
  }
}

class SupabaseLogStore implements LogStore {
  constructor(private readonly client: SupabaseClient) {}

  async listByHabit(habitId: string): Promise<DailyLog[]> {
    const result = await this.client
      .from("daily_logs")
      .select(LOG_COLUMNS)
      .eq("habit_id", habitId)
      .order("log_date", { ascending: true });
    return many("daily_logs", logRowSchema, result);
  }

  async listByHabitInRange(habitId: string, startDate: string, endDate: string): Promise<DailyLog[]> {
    const result = await this.client
      .from("daily_logs")
      .select(LOG_COLUMNS)
      .eq("habit_id", habitId)
      .gte("log_date", startDate)
      .lte("log_date", endDate)
      .order("log_date", { ascending: true });
    return many("daily_logs", logRowSchema, result);
  }

  async findByHabitAndDate(habitId: string, logDate: string): Promise<DailyLog | null> {
    const result = await this.client
      .from("daily_logs")
      .select(LOG_COLUMNS)
      .eq("habit_id", habitId)
      .eq("log_date", logDate)
      .maybeSingle();
    return maybeOne("daily_logs", logRowSchema, result);
  }

  async findByIdAndOwner(id: string, ownerId: string): Promise<DailyLog | null> {
    // Inner join on habits so a log owned through someone else's habit reads as absent
    const result = await this.client
      .from("daily_logs")
      .select(`${LOG_COLUMNS}, habits!inner(user_id)`)
      .eq("id", id)
      .eq("habits.user_id", ownerId)
      .maybeSingle();
    return maybeOne("daily_logs", logRowSchema, result);
  }

  async saveAll(logs: DailyLog[]): Promise<DailyLog[]> {
    if (logs.length === 0) return [];
    // One statement: Postgres applies every row or none
    const result = await this.client
      .from("daily_logs")
      .upsert(logs, { onConflict: "id" })
      .select(LOG_COLUMNS);
    const saved = many("daily_logs", logRowSchema, result);
    const byId = new Map(saved.map((row) => [row.id, row]));
    return logs.map((log) => byId.get(log.id) ?? log);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.client.from("daily_logs").delete().eq("id", id);
    check("daily_logs", error);
  }
}

export function createSupabaseRepositories(client: SupabaseClient): Repositories {
  return {
    users: new SupabaseUserStore(client),
    habits: new SupabaseHabitStore(client),
    logs: new SupabaseLogStore(client),
  };
}
