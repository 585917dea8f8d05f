import type { HeatmapDay } from "@/types/database";

const MONTH_LABELS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

export interface Cell {
  date: string;
  col: number;
  row: number;
  completed: boolean;
}

export interface MonthMarker {
  col: number;
  label: string;
}

/** Lay days out Sunday-first; the first column may be partial */
export function layoutCells(days: HeatmapDay[]): { cells: Cell[]; monthMarkers: MonthMarker[] } {
  const cells: Cell[] = [];
  const monthMarkers: MonthMarker[] = [];
  if (days.length === 0) return { cells, monthMarkers };

  const firstWeekday = new Date(`${days[0].date}T00:00:00Z`).getUTCDay();
  let prevMonth = -1;

  days.forEach((day, i) => {
    const offset = firstWeekday + i;
    const col = Math.floor(offset / 7);
    const month = Number(day.date.slice(5, 7)) - 1;
    if (month !== prevMonth) {
      monthMarkers.push({ col, label: MONTH_LABELS[month] });
      prevMonth = month;
    }
    cells.push({ date: day.date, col, row: offset % 7, completed: day.completed });
  });

  return { cells, monthMarkers };
}

export function cellClassName(clickable: boolean): string {
  return clickable ? "cursor-pointer transition-opacity hover:opacity-80" : "cursor-default";
}
