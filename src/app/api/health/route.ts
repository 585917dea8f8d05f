// GET /api/health — liveness check; also hands clients the server's calendar date

import { NextRequest } from "next/server";
import { apiJson, createApiRequestContext } from "@/lib/api-runtime";
import { systemClock } from "@/lib/dates";

export function GET(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/health");
  return apiJson(
    {
      status: "UP",
      timestamp: new Date().toISOString(),
      service: "habitline-api",
      today: systemClock.today(),
    },
    context
  );
}
