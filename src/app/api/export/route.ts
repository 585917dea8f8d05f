// GET /api/export?format=csv|json — download every habit with its log history

import { NextRequest } from "next/server";
import { apiJson, createApiRequestContext, handleApiError, parseQuery } from "@/lib/api-runtime";
import { requireOwner } from "@/lib/auth";
import { systemClock } from "@/lib/dates";
import { loadExportData, toCsv, toJsonExport } from "@/lib/export";
import { getRepositories } from "@/lib/repositories";
import { exportQuerySchema } from "@/lib/schemas";

export async function GET(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/export");

  try {
    const ownerId = requireOwner(req);
    const { format } = parseQuery(req, exportQuerySchema);
    const data = await loadExportData(getRepositories(), ownerId);
    const today = systemClock.today();

    if (format === "csv") {
      return new Response(toCsv(data), {
        headers: {
          "Content-Type": "text/csv; charset=utf-8",
          "Content-Disposition": `attachment; filename="habitline-export-${today}.csv"`,
          "x-request-id": context.requestId,
        },
      });
    }
    return apiJson(toJsonExport(data, today), context, {
      headers: {
        "Content-Disposition": `attachment; filename="habitline-export-${today}.json"`,
      },
    });
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to export data.");
  }
}
