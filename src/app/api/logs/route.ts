// GET  /api/logs?habitId=&startDate=&endDate= — a habit's logs in range, ascending
// POST /api/logs — create or update the log for (habitId, logDate)

import { NextRequest } from "next/server";
import {
  apiJson,
  createApiRequestContext,
  handleApiError,
  parseIdParam,
  parseJsonBody,
  parseQuery,
} from "@/lib/api-runtime";
import { requireOwner } from "@/lib/auth";
import { getLogsInRange } from "@/lib/dailyLogs";
import { systemClock } from "@/lib/dates";
import { NotFoundError } from "@/lib/errors";
import { reconcileLog } from "@/lib/reconcile";
import { getRepositories } from "@/lib/repositories";
import { logRangeQuerySchema, logWriteSchema } from "@/lib/schemas";

export async function GET(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/logs");

  try {
    const ownerId = requireOwner(req);
    const query = parseQuery(req, logRangeQuerySchema);
    const habitId = parseIdParam(query.habitId, NotFoundError.habit);
    const logs = await getLogsInRange(
      getRepositories(),
      ownerId,
      habitId,
      query.startDate,
      query.endDate
    );
    return apiJson(logs, context);
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to load logs.");
  }
}

export async function POST(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/logs");

  try {
    const ownerId = requireOwner(req);
    const entry = await parseJsonBody(req, logWriteSchema);
    parseIdParam(entry.habitId, NotFoundError.habit);
    const log = await reconcileLog(getRepositories(), systemClock, ownerId, entry);
    return apiJson(log, context, { status: 201 });
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to save log.");
  }
}
