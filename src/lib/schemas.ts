// Request body and query schemas shared by the route handlers.

import { z } from "zod";
import { isValidDate } from "./dates";
import { MAX_BATCH_SIZE } from "./reconcile";

const isoDate = z.string().refine(isValidDate, "Must be a valid date (YYYY-MM-DD)");

const optionalText = (max: number, label: string) =>
  z
    .string()
    .max(max, `${label} must not exceed ${max} characters`)
    .nullish()
    .transform((value) => value ?? null);

// ─── Auth ───────────────────────────────────────────────

export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, "Username must be between 3 and 50 characters")
    .max(50, "Username must be between 3 and 50 characters")
    .regex(/^[A-Za-z0-9_.-]+$/, "Username may only contain letters, digits, '_', '.' and '-'"),
  email: z.string().trim().toLowerCase().email("Email must be valid").max(255),
  password: z
    .string()
    .min(8, "Password must be between 8 and 128 characters")
    .max(128, "Password must be between 8 and 128 characters"),
});

export const loginSchema = z.object({
  usernameOrEmail: z.string().trim().min(1, "Username or email is required"),
  password: z.string().min(1, "Password is required"),
});

export const refreshSchema = z.object({
  refreshToken: z.string().min(1, "Refresh token is required"),
});

// ─── Habits ─────────────────────────────────────────────

export const habitInputSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "Habit name is required")
    .max(100, "Habit name must not exceed 100 characters"),
  description: optionalText(1000, "Description"),
  color: z
    .string()
    .regex(/^#[0-9A-Fa-f]{6}$/, "Color must be a valid hex code (e.g., #3498db)")
    .nullish()
    .transform((value) => value ?? null),
});

export const reorderSchema = z.object({
  habitOrders: z
    .array(
      z.object({
        habitId: z.string().min(1, "Habit ID is required"),
        displayOrder: z.number().int().min(0, "Display order must be non-negative"),
      })
    )
    .min(1, "Habit order list cannot be empty"),
});

export const listHabitsQuerySchema = z.object({
  includeArchived: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
});

export const heatmapQuerySchema = z.object({
  year: z.coerce.number().int().min(1970).max(9999).optional(),
  month: z.string().optional(),
  startDate: isoDate.optional(),
  endDate: isoDate.optional(),
});

// ─── Daily Logs ─────────────────────────────────────────

export const logWriteSchema = z.object({
  habitId: z.string().min(1, "Habit ID is required"),
  logDate: isoDate,
  completed: z.boolean({ required_error: "Completed status is required" }),
  notes: optionalText(1000, "Notes"),
});

export const batchLogSchema = z.object({
  logs: z
    .array(logWriteSchema)
    .min(1, "Logs list cannot be empty")
    .max(MAX_BATCH_SIZE, `Cannot process more than ${MAX_BATCH_SIZE} logs at once`),
});

export const logRangeQuerySchema = z.object({
  habitId: z.string().min(1, "habitId is required"),
  startDate: isoDate,
  endDate: isoDate,
});

export const exportQuerySchema = z.object({
  format: z.enum(["csv", "json"]).default("json"),
});
