// POST /api/auth/refresh — trade a refresh token for a new token pair

import { NextRequest } from "next/server";
import {
  apiJson,
  apiPreflight,
  createApiRequestContext,
  handleApiError,
  parseJsonBody,
} from "@/lib/api-runtime";
import { getTokenService, refreshTokens } from "@/lib/auth";
import { assertAuthRateLimit } from "@/lib/rateLimit";
import { getRepositories } from "@/lib/repositories";
import { refreshSchema } from "@/lib/schemas";

const ROUTE = "/api/auth/refresh";

export async function POST(req: NextRequest) {
  const context = createApiRequestContext(req, ROUTE);

  try {
    assertAuthRateLimit(req);
    const { refreshToken } = await parseJsonBody(req, refreshSchema);
    const response = await refreshTokens(getRepositories(), getTokenService(), refreshToken);
    return apiJson(response, context);
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to refresh token.");
  }
}

export function OPTIONS(req: NextRequest) {
  return apiPreflight(createApiRequestContext(req, ROUTE), ["POST"]);
}
