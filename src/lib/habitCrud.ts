// Habit CRUD — create, update, archive, reorder, delete — plus the read-only
// stats and heatmap views. Every operation takes the owner id first and
// treats "not yours" exactly like "doesn't exist".

import type { Habit, HabitStats, Heatmap } from "@/types/database";
import type { Clock } from "./dates";
import { NotFoundError } from "./errors";
import { assertDateRange, buildHeatmap, resolveHeatmapRange, type HeatmapRangeQuery } from "./heatmap";
import type { Repositories } from "./repositories";
import { computeStats } from "./stats";

// ─── Types ──────────────────────────────────────────────

export interface HabitInput {
  name: string;
  description: string | null;
  color: string | null;
}

export interface HabitOrder {
  habitId: string;
  displayOrder: number;
}

async function requireHabit(repos: Repositories, ownerId: string, habitId: string): Promise<Habit> {
  const habit = await repos.habits.findByIdAndOwner(habitId, ownerId);
  if (!habit) throw NotFoundError.habit();
  return habit;
}

// ─── CRUD Functions ─────────────────────────────────────

export function listHabits(
  repos: Repositories,
  ownerId: string,
  includeArchived = false
): Promise<Habit[]> {
  return repos.habits.listByOwner(ownerId, includeArchived);
}

export function getHabit(repos: Repositories, ownerId: string, habitId: string): Promise<Habit> {
  return requireHabit(repos, ownerId, habitId);
}

export function createHabit(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  input: HabitInput
): Promise<Habit> {
  return repos.habits.insert({
    id: crypto.randomUUID(),
    user_id: ownerId,
    name: input.name.trim(),
    description: input.description,
    color: input.color,
    display_order: 0,
    archived: false,
    archived_at: null,
    created_at: clock.now().toISOString(),
  });
}

/** Replaces name, description and color; id, order and archive state are untouched */
export async function updateHabit(
  repos: Repositories,
  ownerId: string,
  habitId: string,
  input: HabitInput
): Promise<Habit> {
  const habit = await requireHabit(repos, ownerId, habitId);
  const [saved] = await repos.habits.saveAll([
    {
      ...habit,
      name: input.name.trim(),
      description: input.description,
      color: input.color,
    },
  ]);
  return saved;
}

export async function deleteHabit(repos: Repositories, ownerId: string, habitId: string): Promise<void> {
  const deleted = await repos.habits.delete(habitId, ownerId);
  if (!deleted) throw NotFoundError.habit();
}

/** Soft-hide. archived_at records the first archive and is never moved afterwards. */
export async function archiveHabit(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  habitId: string
): Promise<Habit> {
  const habit = await requireHabit(repos, ownerId, habitId);
  if (habit.archived) return habit;

  const [saved] = await repos.habits.saveAll([
    { ...habit, archived: true, archived_at: clock.now().toISOString() },
  ]);
  return saved;
}

/** Every id must belong to the owner before any order is written */
export async function reorderHabits(
  repos: Repositories,
  ownerId: string,
  orders: HabitOrder[]
): Promise<Habit[]> {
  const updated = new Map<string, Habit>();
  for (const order of orders) {
    const habit = updated.get(order.habitId) ?? (await requireHabit(repos, ownerId, order.habitId));
    updated.set(habit.id, { ...habit, display_order: order.displayOrder });
  }
  return repos.habits.saveAll([...updated.values()]);
}

// ─── Stats & Heatmap ────────────────────────────────────

export async function getHabitStats(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  habitId: string
): Promise<HabitStats> {
  const habit = await requireHabit(repos, ownerId, habitId);
  const logs = await repos.logs.listByHabit(habit.id);
  return { habitId: habit.id, ...computeStats(logs, habit.created_at, clock.today()) };
}

export async function getHeatmap(
  repos: Repositories,
  clock: Clock,
  ownerId: string,
  habitId: string,
  query: HeatmapRangeQuery
): Promise<Heatmap> {
  const habit = await requireHabit(repos, ownerId, habitId);
  const { start, end } = resolveHeatmapRange(query, clock.today());
  // Validate before the range query so an oversized request never hits storage
  assertDateRange(start, end);
  const logs = await repos.logs.listByHabitInRange(habit.id, start, end);
  return buildHeatmap(habit.id, start, end, logs);
}
