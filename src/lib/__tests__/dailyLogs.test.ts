import { describe, it, expect } from "vitest";
import { deleteLog, getLog, getLogsInRange } from "../dailyLogs";
import { HABIT, OWNER, STRANGER, makeLog, seedLogs, seededStore } from "./fixtures";

describe("getLogsInRange", () => {
  it("returns logs inside the range, ascending", async () => {
    const { db, repos } = seededStore();
    seedLogs(
      db,
      makeLog({ log_date: "2026-01-05" }),
      makeLog({ log_date: "2026-01-02" }),
      makeLog({ log_date: "2026-01-09" })
    );

    const logs = await getLogsInRange(repos, OWNER, HABIT, "2026-01-01", "2026-01-05");
    expect(logs.map((l) => l.log_date)).toEqual(["2026-01-02", "2026-01-05"]);
  });

  it("checks ownership before the range", async () => {
    const { repos } = seededStore();
    await expect(getLogsInRange(repos, STRANGER, HABIT, "2026-01-05", "2026-01-01")).rejects.toMatchObject({
      code: "HABIT_NOT_FOUND",
    });
  });

  it("rejects a reversed range", async () => {
    const { repos } = seededStore();
    await expect(getLogsInRange(repos, OWNER, HABIT, "2026-01-05", "2026-01-01")).rejects.toMatchObject({
      code: "INVALID_DATE_RANGE",
    });
  });
});

describe("getLog / deleteLog", () => {
  it("hides another owner's log", async () => {
    const { db, repos } = seededStore();
    seedLogs(db, makeLog({ id: "log-1" }));

    expect((await getLog(repos, OWNER, "log-1")).id).toBe("log-1");
    await expect(getLog(repos, STRANGER, "log-1")).rejects.toMatchObject({ code: "LOG_NOT_FOUND", status: 404 });
  });

  it("deletes only the owner's log", async () => {
    const { db, repos } = seededStore();
    seedLogs(db, makeLog({ id: "log-1" }));

    await expect(deleteLog(repos, STRANGER, "log-1")).rejects.toMatchObject({ code: "LOG_NOT_FOUND" });
    expect(db.logs.has("log-1")).toBe(true);

    await deleteLog(repos, OWNER, "log-1");
    expect(db.logs.has("log-1")).toBe(false);
  });
});
