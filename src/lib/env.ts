// Server configuration — parsed from process.env once, on first use.

import { z } from "zod";
import { log } from "./log";

export const DEV_JWT_SECRET = "habitline-dev-secret-change-me-before-deploying";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const serverEnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  JWT_SECRET: z.string().min(32).default(DEV_JWT_SECRET),
  JWT_ISSUER: z.string().min(1).default("habitline"),
  JWT_ACCESS_TTL_SECONDS: z.coerce.number().int().positive().default(15 * 60),
  JWT_REFRESH_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
  RATE_LIMIT_ENABLED: booleanFlag.default("true"),
  RATE_LIMIT_AUTH_PER_MINUTE: z.coerce.number().int().positive().default(10),
  CLIENT_IP_HEADER: z.string().min(1).default("x-real-ip"),
  CORS_ALLOWED_ORIGIN: z.string().min(1).optional(),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

/** Parse an env record. Throws one error listing every invalid variable. */
export function parseServerEnv(source: Record<string, string | undefined>): ServerEnv {
  const parsed = serverEnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment variables: ${details}`);
  }

  const env = parsed.data;
  if (env.JWT_SECRET === DEV_JWT_SECRET) {
    if (env.NODE_ENV === "production") {
      throw new Error("JWT_SECRET must be set in production; the development default is not allowed");
    }
    log("warn", "jwt_default_secret", {
      message: "Using the development JWT secret. Set JWT_SECRET before deploying.",
    });
  }
  return env;
}

let cached: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (!cached) cached = parseServerEnv(process.env);
  return cached;
}

export function getSupabaseEnv(): { url: string; serviceRoleKey: string } | null {
  const env = serverEnv();
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) return null;
  return { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY };
}

export function getJwtEnv() {
  const env = serverEnv();
  return {
    secret: env.JWT_SECRET,
    issuer: env.JWT_ISSUER,
    accessTtlSeconds: env.JWT_ACCESS_TTL_SECONDS,
    refreshTtlSeconds: env.JWT_REFRESH_TTL_SECONDS,
  };
}

export function getRateLimitEnv() {
  const env = serverEnv();
  return {
    enabled: env.RATE_LIMIT_ENABLED,
    authPerMinute: env.RATE_LIMIT_AUTH_PER_MINUTE,
    clientIpHeader: env.CLIENT_IP_HEADER,
  };
}
