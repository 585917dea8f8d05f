import { NextRequest } from "next/server";
import { apiJson, createApiRequestContext, handleApiError } from "@/lib/api-runtime";
import { getCurrentUser, requireOwner } from "@/lib/auth";
import { getRepositories } from "@/lib/repositories";

export async function GET(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/auth/me");

  try {
    const ownerId = requireOwner(req);
    return apiJson(await getCurrentUser(getRepositories(), ownerId), context);
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to load account.");
  }
}
