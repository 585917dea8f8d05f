// Browser-side API client — fetch wrapper with bearer tokens and one
// transparent refresh-and-retry when the access token has expired.

import type { AuthResponse } from "@/lib/auth";
import type { DailyLog, Habit, HabitStats, Heatmap, PublicUser } from "@/types/database";

const API_URL = process.env.NEXT_PUBLIC_API_URL ?? "";
const MAX_ERROR_BODY = 200;

// ─── Types ──────────────────────────────────────────────

export interface StoredTokens {
  accessToken: string;
  refreshToken: string;
}

export interface TokenStore {
  load(): StoredTokens | null;
  save(tokens: StoredTokens | null): void;
}

export class ApiClientError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = "ApiClientError";
    this.status = status;
    this.code = code;
  }
}

export interface HabitPayload {
  name: string;
  description?: string | null;
  color?: string | null;
}

export interface LogPayload {
  habitId: string;
  logDate: string;
  completed: boolean;
  notes?: string | null;
}

// ─── Token Stores ───────────────────────────────────────

export function memoryTokenStore(initial: StoredTokens | null = null): TokenStore {
  let tokens = initial;
  return {
    load: () => tokens,
    save: (next) => {
      tokens = next;
    },
  };
}

const TOKENS_KEY = "habitline-tokens";

/** localStorage-backed store; behaves as empty during server rendering */
export function browserTokenStore(): TokenStore {
  return {
    load() {
      if (typeof window === "undefined") return null;
      try {
        const raw = localStorage.getItem(TOKENS_KEY);
        return raw ? (JSON.parse(raw) as StoredTokens) : null;
      } catch {
        return null;
      }
    },
    save(tokens) {
      if (typeof window === "undefined") return;
      if (tokens) localStorage.setItem(TOKENS_KEY, JSON.stringify(tokens));
      else localStorage.removeItem(TOKENS_KEY);
    },
  };
}

// ─── Errors ─────────────────────────────────────────────

/** Build an error from a failed response; non-JSON bodies are truncated */
export async function toApiError(res: Response): Promise<ApiClientError> {
  const text = await res.text();
  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
      const code = "code" in body && typeof body.code === "string" ? body.code : "HTTP_ERROR";
      return new ApiClientError(res.status, code, body.error);
    }
  } catch {
    // not JSON; fall through to the raw body
  }
  const detail = text.length > MAX_ERROR_BODY ? `${text.slice(0, MAX_ERROR_BODY)}...` : text;
  return new ApiClientError(
    res.status,
    "HTTP_ERROR",
    detail.trim() ? `HTTP ${res.status}: ${detail}` : `HTTP ${res.status}`
  );
}

// ─── Client ─────────────────────────────────────────────

export class ApiClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly tokens: TokenStore;
  private refreshing: Promise<boolean> | null = null;

  constructor(options: { baseUrl?: string; fetch?: typeof fetch; tokens?: TokenStore } = {}) {
    this.baseUrl = options.baseUrl ?? API_URL;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.tokens = options.tokens ?? memoryTokenStore();
  }

  isSignedIn(): boolean {
    return this.tokens.load() !== null;
  }

  signOut(): void {
    this.tokens.save(null);
  }

  // ── Auth ──

  async login(usernameOrEmail: string, password: string): Promise<AuthResponse> {
    const auth = await this.request<AuthResponse>("POST", "/api/auth/login", { usernameOrEmail, password });
    this.remember(auth);
    return auth;
  }

  async register(username: string, email: string, password: string): Promise<AuthResponse> {
    const auth = await this.request<AuthResponse>("POST", "/api/auth/register", { username, email, password });
    this.remember(auth);
    return auth;
  }

  me(): Promise<PublicUser> {
    return this.request("GET", "/api/auth/me");
  }

  /** The server's calendar date; log dates are validated against it */
  async serverToday(): Promise<string> {
    const health = await this.request<{ today: string }>("GET", "/api/health");
    return health.today;
  }

  // ── Habits ──

  listHabits(includeArchived = false): Promise<Habit[]> {
    return this.request("GET", `/api/habits${includeArchived ? "?includeArchived=true" : ""}`);
  }

  createHabit(input: HabitPayload): Promise<Habit> {
    return this.request("POST", "/api/habits", input);
  }

  archiveHabit(habitId: string): Promise<Habit> {
    return this.request("PUT", `/api/habits/${encodeURIComponent(habitId)}/archive`);
  }

  async deleteHabit(habitId: string): Promise<void> {
    await this.call("DELETE", `/api/habits/${encodeURIComponent(habitId)}`);
  }

  getStats(habitId: string): Promise<HabitStats> {
    return this.request("GET", `/api/habits/${encodeURIComponent(habitId)}/stats`);
  }

  getHeatmap(habitId: string, range: { year?: number; month?: string } = {}): Promise<Heatmap> {
    const params = new URLSearchParams();
    if (range.year !== undefined) params.set("year", String(range.year));
    if (range.month !== undefined) params.set("month", range.month);
    const query = params.toString();
    return this.request("GET", `/api/habits/${encodeURIComponent(habitId)}/heatmap${query ? `?${query}` : ""}`);
  }

  // ── Logs ──

  upsertLog(entry: LogPayload): Promise<DailyLog> {
    return this.request("POST", "/api/logs", entry);
  }

  // ── Transport ──

  private remember(auth: AuthResponse): void {
    this.tokens.save({ accessToken: auth.accessToken, refreshToken: auth.refreshToken });
  }

  /**
   * Exchange the refresh token for a new pair. Concurrent callers share one
   * request. Only a rejected refresh token (400/401) signs the user out; a
   * rate limit or server error leaves the stored tokens for a later retry.
   */
  private refresh(): Promise<boolean> {
    if (!this.refreshing) {
      this.refreshing = this.exchangeRefreshToken().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async exchangeRefreshToken(): Promise<boolean> {
    const current = this.tokens.load();
    if (!current) return false;
    const res = await this.send("POST", "/api/auth/refresh", { refreshToken: current.refreshToken }, null);
    if (res.status === 400 || res.status === 401) {
      this.tokens.save(null);
      return false;
    }
    if (!res.ok) return false;
    this.remember(await res.json());
    return true;
  }

  private send(method: string, path: string, body: unknown, accessToken: string | null): Promise<Response> {
    const headers: Record<string, string> = {};
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (accessToken) headers.Authorization = `Bearer ${accessToken}`;
    return this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  private async call(method: string, path: string, body?: unknown): Promise<Response> {
    const isAuthCall = path.startsWith("/api/auth/") && path !== "/api/auth/me";
    const sentToken = this.tokens.load()?.accessToken ?? null;
    let res = await this.send(method, path, body, sentToken);

    if (res.status === 401 && !isAuthCall) {
      // Another call may have refreshed while this one was in flight
      const renewed = this.tokens.load()?.accessToken ?? null;
      if ((renewed !== null && renewed !== sentToken) || (await this.refresh())) {
        res = await this.send(method, path, body, this.tokens.load()?.accessToken ?? null);
      }
    }
    if (!res.ok) throw await toApiError(res);
    return res;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const res = await this.call(method, path, body);
    return (await res.json()) as T;
  }
}
