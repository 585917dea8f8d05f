// GET  /api/habits — the caller's habits in display order (?includeArchived=true for all)
// POST /api/habits — create a habit

import { NextRequest } from "next/server";
import {
  apiJson,
  createApiRequestContext,
  handleApiError,
  parseJsonBody,
  parseQuery,
} from "@/lib/api-runtime";
import { requireOwner } from "@/lib/auth";
import { systemClock } from "@/lib/dates";
import { createHabit, listHabits } from "@/lib/habitCrud";
import { getRepositories } from "@/lib/repositories";
import { habitInputSchema, listHabitsQuerySchema } from "@/lib/schemas";

export async function GET(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/habits");

  try {
    const ownerId = requireOwner(req);
    const { includeArchived } = parseQuery(req, listHabitsQuerySchema);
    return apiJson(await listHabits(getRepositories(), ownerId, includeArchived), context);
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to load habits.");
  }
}

export async function POST(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/habits");

  try {
    const ownerId = requireOwner(req);
    const input = await parseJsonBody(req, habitInputSchema);
    const habit = await createHabit(getRepositories(), systemClock, ownerId, input);
    return apiJson(habit, context, { status: 201 });
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to create habit.");
  }
}
