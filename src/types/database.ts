// Row types for the Postgres schema in supabase/migrations.
// Column names stay snake_case end to end; API responses use the same shape.

export interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: string;
  updated_at: string;
}

/** User as returned to clients — never carries the password hash */
export type PublicUser = Omit<UserRow, "password_hash" | "updated_at">;

export interface Habit {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  color: string | null;        // "#RRGGBB"
  display_order: number;
  archived: boolean;
  archived_at: string | null;  // set once, on the first archive
  created_at: string;
}

export interface DailyLog {
  id: string;
  habit_id: string;
  log_date: string;            // "YYYY-MM-DD"
  completed: boolean;
  notes: string | null;
  created_at: string;
  updated_at: string;
}

export interface HabitStats {
  habitId: string;
  currentStreak: number;
  longestStreak: number;
  totalCompleted: number;
  completionPercentage: number; // 0-100, two decimals
}

export interface HeatmapDay {
  date: string;
  completed: boolean;
  notes: string | null;
}

export interface Heatmap {
  habitId: string;
  startDate: string;
  endDate: string;
  days: HeatmapDay[];
}
