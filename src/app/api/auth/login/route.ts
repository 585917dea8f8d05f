// POST /api/auth/login — exchange username/email + password for a token pair

import { NextRequest } from "next/server";
import {
  apiJson,
  apiPreflight,
  createApiRequestContext,
  handleApiError,
  parseJsonBody,
} from "@/lib/api-runtime";
import { authenticateUser, getTokenService } from "@/lib/auth";
import { assertAuthRateLimit } from "@/lib/rateLimit";
import { getRepositories } from "@/lib/repositories";
import { loginSchema } from "@/lib/schemas";

const ROUTE = "/api/auth/login";

export async function POST(req: NextRequest) {
  const context = createApiRequestContext(req, ROUTE);

  try {
    assertAuthRateLimit(req);
    const input = await parseJsonBody(req, loginSchema);
    const response = await authenticateUser(getRepositories(), getTokenService(), input);
    return apiJson(response, context);
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to sign in.");
  }
}

export function OPTIONS(req: NextRequest) {
  return apiPreflight(createApiRequestContext(req, ROUTE), ["POST"]);
}
