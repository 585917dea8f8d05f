import { describe, it, expect } from "vitest";
import { fixedClock } from "../dates";
import { NotFoundError } from "../errors";
import {
  archiveHabit,
  createHabit,
  deleteHabit,
  getHabitStats,
  getHeatmap,
  listHabits,
  reorderHabits,
  updateHabit,
} from "../habitCrud";
import { HABIT, OTHER_HABIT, OWNER, STRANGER, makeHabit, makeLog, seedLogs, seededStore } from "./fixtures";

const clock = fixedClock("2026-01-10");

describe("createHabit", () => {
  it("trims the name and starts at the top of the order", async () => {
    const { repos } = seededStore();
    const habit = await createHabit(repos, clock, OWNER, { name: "  Stretch  ", description: null, color: null });

    expect(habit).toMatchObject({
      user_id: OWNER,
      name: "Stretch",
      display_order: 0,
      archived: false,
      archived_at: null,
      created_at: clock.now().toISOString(),
    });
    expect(await repos.habits.findByIdAndOwner(habit.id, OWNER)).toEqual(habit);
  });
});

describe("updateHabit", () => {
  it("replaces name, description and color only", async () => {
    const { repos } = seededStore();
    const updated = await updateHabit(repos, OWNER, HABIT, { name: "Read fiction", description: "20 pages", color: null });

    expect(updated).toMatchObject({ id: HABIT, name: "Read fiction", description: "20 pages", color: null, display_order: 0 });
  });

  it("hides other owners' habits", async () => {
    const { repos } = seededStore();
    await expect(updateHabit(repos, STRANGER, HABIT, { name: "x", description: null, color: null })).rejects.toThrow(
      "Habit not found."
    );
  });
});

describe("archiveHabit", () => {
  it("records the first archive time and keeps it", async () => {
    const { repos } = seededStore();

    const first = await archiveHabit(repos, clock, OWNER, HABIT);
    const again = await archiveHabit(repos, fixedClock("2026-01-20"), OWNER, HABIT);

    expect(first.archived).toBe(true);
    expect(first.archived_at).toBe(clock.now().toISOString());
    expect(again.archived_at).toBe(first.archived_at);
  });

  it("drops archived habits from the default listing", async () => {
    const { repos } = seededStore();
    await archiveHabit(repos, clock, OWNER, HABIT);

    expect(await listHabits(repos, OWNER)).toEqual([]);
    expect((await listHabits(repos, OWNER, true)).map((h) => h.id)).toEqual([HABIT]);
  });
});

describe("reorderHabits", () => {
  it("applies every order", async () => {
    const { db, repos } = seededStore();
    db.habits.set(OTHER_HABIT, makeHabit({ id: OTHER_HABIT, name: "Walk", display_order: 1 }));

    await reorderHabits(repos, OWNER, [
      { habitId: HABIT, displayOrder: 1 },
      { habitId: OTHER_HABIT, displayOrder: 0 },
    ]);

    expect((await listHabits(repos, OWNER)).map((h) => h.id)).toEqual([OTHER_HABIT, HABIT]);
  });

  it("changes nothing when one id is not owned", async () => {
    const { db, repos } = seededStore();
    db.habits.set(OTHER_HABIT, makeHabit({ id: OTHER_HABIT, user_id: STRANGER }));

    await expect(
      reorderHabits(repos, OWNER, [
        { habitId: HABIT, displayOrder: 5 },
        { habitId: OTHER_HABIT, displayOrder: 6 },
      ])
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(db.habits.get(HABIT)?.display_order).toBe(0);
  });
});

describe("deleteHabit", () => {
  it("removes the habit with its logs", async () => {
    const { db, repos } = seededStore();
    seedLogs(db, makeLog({ log_date: "2026-01-02" }), makeLog({ log_date: "2026-01-03" }));

    await deleteHabit(repos, OWNER, HABIT);

    expect(db.habits.has(HABIT)).toBe(false);
    expect(db.logs.size).toBe(0);
  });

  it("refuses another owner's habit", async () => {
    const { db, repos } = seededStore();
    await expect(deleteHabit(repos, STRANGER, HABIT)).rejects.toMatchObject({ code: "HABIT_NOT_FOUND" });
    expect(db.habits.has(HABIT)).toBe(true);
  });
});

describe("getHabitStats", () => {
  it("computes stats from stored logs", async () => {
    const { db, repos } = seededStore();
    for (let day = 1; day <= 7; day++) {
      seedLogs(db, makeLog({ log_date: `2026-01-0${day}` }));
    }

    expect(await getHabitStats(repos, clock, OWNER, HABIT)).toEqual({
      habitId: HABIT,
      currentStreak: 0,
      longestStreak: 7,
      totalCompleted: 7,
      completionPercentage: 70,
    });
  });
});

describe("getHeatmap", () => {
  it("resolves a month query", async () => {
    const { db, repos } = seededStore();
    seedLogs(db, makeLog({ log_date: "2026-02-14", notes: "valentine" }), makeLog({ log_date: "2026-03-01" }));

    const heatmap = await getHeatmap(repos, clock, OWNER, HABIT, { month: "2026-02" });

    expect(heatmap.startDate).toBe("2026-02-01");
    expect(heatmap.endDate).toBe("2026-02-28");
    expect(heatmap.days).toHaveLength(28);
    expect(heatmap.days.filter((d) => d.completed)).toEqual([
      { date: "2026-02-14", completed: true, notes: "valentine" },
    ]);
  });

  it("defaults to the current year", async () => {
    const { repos } = seededStore();
    const heatmap = await getHeatmap(repos, clock, OWNER, HABIT, {});
    expect(heatmap.days).toHaveLength(365);
  });

  it("rejects an oversized explicit range", async () => {
    const { repos } = seededStore();
    await expect(
      getHeatmap(repos, clock, OWNER, HABIT, { startDate: "2025-01-01", endDate: "2026-01-05" })
    ).rejects.toMatchObject({ code: "INVALID_DATE_RANGE", status: 400 });
  });
});
