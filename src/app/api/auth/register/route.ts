// POST /api/auth/register — create an account and return a token pair

import { NextRequest } from "next/server";
import {
  apiJson,
  apiPreflight,
  createApiRequestContext,
  handleApiError,
  parseJsonBody,
} from "@/lib/api-runtime";
import { getTokenService, registerUser } from "@/lib/auth";
import { systemClock } from "@/lib/dates";
import { assertAuthRateLimit } from "@/lib/rateLimit";
import { getRepositories } from "@/lib/repositories";
import { registerSchema } from "@/lib/schemas";

const ROUTE = "/api/auth/register";

export async function POST(req: NextRequest) {
  const context = createApiRequestContext(req, ROUTE);

  try {
    assertAuthRateLimit(req);
    const input = await parseJsonBody(req, registerSchema);
    const response = await registerUser(getRepositories(), getTokenService(), systemClock, input);
    return apiJson(response, context, { status: 201 });
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to register.");
  }
}

export function OPTIONS(req: NextRequest) {
  return apiPreflight(createApiRequestContext(req, ROUTE), ["POST"]);
}
