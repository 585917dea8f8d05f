// Accounts and tokens — registration, login, refresh, and the bearer-token
// check every protected route runs first. Everything past requireOwner()
// receives a verified owner id and never sees a token.

import bcrypt from "bcryptjs";
import jwt from "jsonwebtoken";
import type { PublicUser, UserRow } from "@/types/database";
import type { Clock } from "./dates";
import { getJwtEnv } from "./env";
import { ConflictError, UnauthorizedError } from "./errors";
import type { Repositories } from "./repositories";

const PASSWORD_HASH_ROUNDS = 10;

// ─── Tokens ─────────────────────────────────────────────

export type TokenType = "access" | "refresh";

export interface TokenConfig {
  secret: string;
  issuer: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
}

export interface AuthResponse {
  accessToken: string;
  refreshToken: string;
  tokenType: "Bearer";
  expiresIn: number;            // access token lifetime, seconds
  user: PublicUser;
}

type TokenClaims = jwt.JwtPayload & { sub: string; typ: TokenType };

function isTokenClaims(value: string | jwt.JwtPayload): value is TokenClaims {
  return (
    typeof value === "object" &&
    typeof value.sub === "string" &&
    (value.typ === "access" || value.typ === "refresh")
  );
}

export class TokenService {
  constructor(private readonly config: TokenConfig) {}

  get accessTtlSeconds(): number {
    return this.config.accessTtlSeconds;
  }

  issue(userId: string, type: TokenType): string {
    return jwt.sign({ typ: type }, this.config.secret, {
      algorithm: "HS256",
      subject: userId,
      issuer: this.config.issuer,
      expiresIn: type === "access" ? this.config.accessTtlSeconds : this.config.refreshTtlSeconds,
    });
  }

  /** The user id a token was issued to. Wrong type, bad signature or expiry ⇒ 401. */
  verify(token: string, expected: TokenType): string {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: ["HS256"],
        issuer: this.config.issuer,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw UnauthorizedError.invalidToken("Token has expired.");
      }
      throw UnauthorizedError.invalidToken();
    }
    if (!isTokenClaims(decoded) || decoded.typ !== expected) {
      throw UnauthorizedError.invalidToken(`Expected a${expected === "access" ? "n" : ""} ${expected} token.`);
    }
    return decoded.sub;
  }
}

let defaultTokens: TokenService | null = null;

export function getTokenService(): TokenService {
  if (!defaultTokens) defaultTokens = new TokenService(getJwtEnv());
  return defaultTokens;
}

// ─── Guard ──────────────────────────────────────────────

/** Owner id from the request's `Authorization: Bearer <access token>` */
export function requireOwner(req: Request, tokens: TokenService = getTokenService()): string {
  const header = req.headers.get("authorization") ?? "";
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  if (!match) throw UnauthorizedError.missingToken();
  return tokens.verify(match[1], "access");
}

// ─── Accounts ───────────────────────────────────────────

export function toPublicUser(user: UserRow): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.created_at,
  };
}

function authResponse(user: UserRow, tokens: TokenService): AuthResponse {
  return {
    accessToken: tokens.issue(user.id, "access"),
    refreshToken: tokens.issue(user.id, "refresh"),
    tokenType: "Bearer",
    expiresIn: tokens.accessTtlSeconds,
    user: toPublicUser(user),
  };
}

export interface RegisterInput {
  username: string;
  email: string;
  password: string;
}

export async function registerUser(
  repos: Repositories,
  tokens: TokenService,
  clock: Clock,
  input: RegisterInput
): Promise<AuthResponse> {
  if (await repos.users.findByUsername(input.username)) {
    throw new ConflictError("USERNAME_TAKEN", `Username '${input.username}' is already taken.`);
  }
  if (await repos.users.findByEmail(input.email)) {
    throw new ConflictError("EMAIL_TAKEN", `Email '${input.email}' is already registered.`);
  }

  const now = clock.now().toISOString();
  const user = await repos.users.insert({
    id: crypto.randomUUID(),
    username: input.username,
    email: input.email,
    password_hash: await bcrypt.hash(input.password, PASSWORD_HASH_ROUNDS),
    created_at: now,
    updated_at: now,
  });
  return authResponse(user, tokens);
}

export interface LoginInput {
  usernameOrEmail: string;
  password: string;
}

/** Unknown account and wrong password fail identically */
export async function authenticateUser(
  repos: Repositories,
  tokens: TokenService,
  input: LoginInput
): Promise<AuthResponse> {
  const user =
    (await repos.users.findByUsername(input.usernameOrEmail)) ??
    (await repos.users.findByEmail(input.usernameOrEmail.toLowerCase()));
  if (!user) throw UnauthorizedError.invalidCredentials();

  const valid = await bcrypt.compare(input.password, user.password_hash);
  if (!valid) throw UnauthorizedError.invalidCredentials();

  return authResponse(user, tokens);
}

export async function refreshTokens(
  repos: Repositories,
  tokens: TokenService,
  refreshToken: string
): Promise<AuthResponse> {
  const userId = tokens.verify(refreshToken, "refresh");
  const user = await repos.users.findById(userId);
  if (!user) throw UnauthorizedError.invalidToken("Account no longer exists.");
  return authResponse(user, tokens);
}

export async function getCurrentUser(repos: Repositories, ownerId: string): Promise<PublicUser> {
  const user = await repos.users.findById(ownerId);
  if (!user) throw UnauthorizedError.invalidToken("Account no longer exists.");
  return toPublicUser(user);
}
