import { randomUUID } from "crypto";
import { NextRequest, NextResponse } from "next/server";
import { z, type ZodTypeAny } from "zod";
import { serverEnv } from "./env";
import { DomainError, NotFoundError, RateLimitedError, ValidationError } from "./errors";
import { log, type LogLevel } from "./log";

export interface ApiRequestContext {
  route: string;
  method: string;
  requestId: string;
  startedAt: number;
}

export function createApiRequestContext(req: NextRequest, route: string): ApiRequestContext {
  const headerId = req.headers.get("x-request-id")?.trim();
  return {
    route,
    method: req.method,
    requestId: headerId || randomUUID(),
    startedAt: Date.now(),
  };
}

export function apiLog(
  level: LogLevel,
  context: ApiRequestContext,
  event: string,
  fields: Record<string, unknown> = {}
): void {
  log(level, event, {
    requestId: context.requestId,
    route: context.route,
    method: context.method,
    ...fields,
  });
}

function withRequestIdHeader(response: NextResponse, requestId: string): NextResponse {
  response.headers.set("x-request-id", requestId);
  return response;
}

export function apiJson(
  body: unknown,
  context: ApiRequestContext,
  init?: { status?: number; headers?: Record<string, string> }
): NextResponse {
  const response = NextResponse.json(body, {
    status: init?.status,
    headers: init?.headers,
  });
  return withRequestIdHeader(response, context.requestId);
}

export function apiNoContent(context: ApiRequestContext): NextResponse {
  return withRequestIdHeader(new NextResponse(null, { status: 204 }), context.requestId);
}

/** 204 answer to a CORS pre-flight. Never touches auth or rate limiting. */
export function apiPreflight(context: ApiRequestContext, methods: string[]): NextResponse {
  const origin = serverEnv().CORS_ALLOWED_ORIGIN;
  const headers: Record<string, string> = {
    "Access-Control-Allow-Methods": [...methods, "OPTIONS"].join(", "),
    "Access-Control-Allow-Headers": "Authorization, Content-Type, X-Request-Id",
    "Access-Control-Max-Age": "600",
  };
  if (origin) headers["Access-Control-Allow-Origin"] = origin;
  return withRequestIdHeader(new NextResponse(null, { status: 204, headers }), context.requestId);
}

// ─── Input Parsing ──────────────────────────────────────

function zodIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

export async function parseJsonBody<TSchema extends ZodTypeAny>(
  req: NextRequest,
  schema: TSchema
): Promise<z.infer<TSchema>> {
  let rawBody: unknown;
  try {
    rawBody = await req.json();
  } catch {
    throw new ValidationError("Invalid JSON body.", [{ path: "", message: "Body is not valid JSON" }]);
  }

  const parsed = schema.safeParse(rawBody);
  if (!parsed.success) {
    const issues = zodIssues(parsed.error);
    throw new ValidationError(issues[0]?.message ?? "Request validation failed.", issues);
  }
  return parsed.data;
}

export function parseQuery<TSchema extends ZodTypeAny>(
  req: NextRequest,
  schema: TSchema
): z.infer<TSchema> {
  const rawParams = Object.fromEntries(req.nextUrl.searchParams.entries());
  const parsed = schema.safeParse(rawParams);
  if (!parsed.success) {
    const issues = zodIssues(parsed.error);
    throw new ValidationError(issues[0]?.message ?? "Query validation failed.", issues);
  }
  return parsed.data;
}

const uuidSchema = z.string().uuid();

/** Path ids that aren't UUIDs can't exist; report them like any other miss */
export function parseIdParam(value: string, notFound: () => NotFoundError): string {
  if (!uuidSchema.safeParse(value).success) throw notFound();
  return value;
}

// ─── Errors ─────────────────────────────────────────────

export function handleApiError(
  error: unknown,
  context: ApiRequestContext,
  fallbackMessage: string
): NextResponse {
  if (error instanceof DomainError) {
    const elapsedMs = Date.now() - context.startedAt;
    apiLog("warn", context, "api_error", {
      category: error.category,
      code: error.code,
      status: error.status,
      message: error.message,
      elapsedMs,
    });

    const body: Record<string, unknown> = {
      error: error.message,
      code: error.code,
      category: error.category,
    };
    const headers: Record<string, string> = {};
    if (error instanceof ValidationError && error.issues.length > 0) {
      body.details = error.issues;
    }
    if (error instanceof RateLimitedError) {
      body.retryAfterSeconds = error.retryAfterSeconds;
      headers["Retry-After"] = String(error.retryAfterSeconds);
    }
    return apiJson(body, context, { status: error.status, headers });
  }

  const message = error instanceof Error ? error.message : fallbackMessage;
  apiLog("error", context, "api_unhandled_error", {
    message,
    elapsedMs: Date.now() - context.startedAt,
  });
  return apiJson(
    {
      error: fallbackMessage,
      code: "INTERNAL_ERROR",
      category: "internal",
    },
    context,
    { status: 500 }
  );
}
