// Repository wiring for route handlers. One instance per server process,
// kept on globalThis so Next.js dev-mode module reloads don't drop the
// in-memory store between requests.

import { log } from "../log";
import { getSupabase } from "../supabase";
import { createMemoryRepositories } from "./memory";
import { createSupabaseRepositories } from "./supabase";
import type { Repositories } from "./types";

export type { Repositories, UserStore, HabitStore, LogStore } from "./types";

declare global {
  var __habitlineRepositories: Repositories | undefined;
}

export function getRepositories(): Repositories {
  if (globalThis.__habitlineRepositories) return globalThis.__habitlineRepositories;

  const supabase = getSupabase();
  let repos: Repositories;
  if (supabase) {
    repos = createSupabaseRepositories(supabase);
  } else {
    log("warn", "storage_fallback", {
      message: "Supabase is not configured; using the in-memory store. Data is lost on restart.",
    });
    repos = createMemoryRepositories();
  }
  globalThis.__habitlineRepositories = repos;
  return repos;
}

/** Replace the process-wide repositories (tests, scripts) */
export function setRepositories(repos: Repositories | undefined): void {
  globalThis.__habitlineRepositories = repos;
}
