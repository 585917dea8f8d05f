// POST /api/logs/batch — up to 100 upserts applied all-or-nothing

import { NextRequest } from "next/server";
import {
  apiJson,
  createApiRequestContext,
  handleApiError,
  parseIdParam,
  parseJsonBody,
} from "@/lib/api-runtime";
import { requireOwner } from "@/lib/auth";
import { systemClock } from "@/lib/dates";
import { NotFoundError } from "@/lib/errors";
import { reconcileLogs } from "@/lib/reconcile";
import { getRepositories } from "@/lib/repositories";
import { batchLogSchema } from "@/lib/schemas";

export async function POST(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/logs/batch");

  try {
    const ownerId = requireOwner(req);
    const { logs } = await parseJsonBody(req, batchLogSchema);
    for (const entry of logs) parseIdParam(entry.habitId, NotFoundError.habit);
    const saved = await reconcileLogs(getRepositories(), systemClock, ownerId, logs);
    return apiJson(saved, context, { status: 201 });
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to save logs.");
  }
}
