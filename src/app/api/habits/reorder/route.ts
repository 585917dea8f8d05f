import { NextRequest } from "next/server";
import {
  apiNoContent,
  createApiRequestContext,
  handleApiError,
  parseJsonBody,
} from "@/lib/api-runtime";
import { requireOwner } from "@/lib/auth";
import { reorderHabits } from "@/lib/habitCrud";
import { getRepositories } from "@/lib/repositories";
import { reorderSchema } from "@/lib/schemas";

export async function PUT(req: NextRequest) {
  const context = createApiRequestContext(req, "/api/habits/reorder");

  try {
    const ownerId = requireOwner(req);
    const { habitOrders } = await parseJsonBody(req, reorderSchema);
    await reorderHabits(getRepositories(), ownerId, habitOrders);
    return apiNoContent(context);
  } catch (error: unknown) {
    return handleApiError(error, context, "Failed to reorder habits.");
  }
}
