"use client";

import { useCallback, useEffect, useMemo, useState } from "react";
import type { FormEvent } from "react";
import HeatMap from "@/components/charts/HeatMap";
import { ApiClient, ApiClientError, browserTokenStore } from "@/lib/client/apiClient";
import type { Habit, HabitStats, Heatmap, PublicUser } from "@/types/database";

interface HabitView {
  habit: Habit;
  stats: HabitStats;
  heatmap: Heatmap;
}

const inputClass =
  "rounded-lg bg-surface-900 border border-surface-700 px-3 py-2 text-sm text-neutral-200 placeholder:text-neutral-600 focus:outline-none focus:border-brand/50";
const buttonClass =
  "rounded-lg px-3 py-2 text-sm font-bold bg-brand text-surface-900 transition-all active:scale-[0.98] disabled:opacity-50";
const ghostButtonClass =
  "rounded-lg px-3 py-2 text-sm font-medium bg-surface-700 text-neutral-300 hover:text-white transition-colors disabled:opacity-50";

function messageOf(error: unknown): string {
  if (error instanceof ApiClientError) return error.message;
  if (error instanceof Error) return error.message;
  return "Something went wrong.";
}

export default function Home() {
  const client = useMemo(() => new ApiClient({ tokens: browserTokenStore() }), []);
  const [user, setUser] = useState<PublicUser | null>(null);
  const [habits, setHabits] = useState<HabitView[]>([]);
  const [today, setToday] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [busy, setBusy] = useState(false);

  const run = useCallback(async (task: () => Promise<void>) => {
    setBusy(true);
    setError(null);
    try {
      await task();
    } catch (err) {
      if (err instanceof ApiClientError && err.status === 401) {
        client.signOut();
        setUser(null);
      }
      setError(messageOf(err));
    } finally {
      setBusy(false);
    }
  }, [client]);

  const loadHabits = useCallback(async () => {
    const [list, serverToday] = await Promise.all([client.listHabits(), client.serverToday()]);
    setToday(serverToday);
    const views = await Promise.all(
      list.map(async (habit) => ({
        habit,
        stats: await client.getStats(habit.id),
        heatmap: await client.getHeatmap(habit.id),
      }))
    );
    setHabits(views);
  }, [client]);

  useEffect(() => {
    if (!client.isSignedIn()) return;
    void run(async () => {
      setUser(await client.me());
      await loadHabits();
    });
  }, [client, run, loadHabits]);

  if (!user) {
    return (
      <AuthForm
        busy={busy}
        error={error}
        onLogin={(login, password) =>
          run(async () => {
            const auth = await client.login(login, password);
            setUser(auth.user);
            await loadHabits();
          })
        }
        onRegister={(username, email, password) =>
          run(async () => {
            const auth = await client.register(username, email, password);
            setUser(auth.user);
            await loadHabits();
          })
        }
      />
    );
  }

  return (
    <div>
      <header className="flex items-center justify-between mb-6">
        <h1 className="text-2xl font-black text-white">Habitline</h1>
        <div className="flex items-center gap-3">
          <span className="text-sm text-neutral-400">{user.username}</span>
          <button
            className={ghostButtonClass}
            onClick={() => {
              client.signOut();
              setUser(null);
              setHabits([]);
            }}
          >
            Sign out
          </button>
        </div>
      </header>

      {error && <p className="text-sm text-missed mb-4">{error}</p>}

      <NewHabitForm
        busy={busy}
        onCreate={(name, color) =>
          run(async () => {
            await client.createHabit({ name, color });
            await loadHabits();
          })
        }
      />

      {habits.length === 0 && <p className="text-sm text-neutral-400">No habits yet.</p>}

      {habits.map(({ habit, stats, heatmap }) => {
        const doneToday = today !== null && heatmap.days.some((d) => d.date === today && d.completed);
        return (
          <section key={habit.id} className="rounded-xl bg-surface-800 border border-surface-700 p-4 mb-4">
            <div className="flex items-center justify-between mb-2">
              <h2 className="text-lg font-semibold" style={{ color: habit.color ?? "#e5e5e5" }}>
                {habit.name}
              </h2>
              <div className="flex gap-2">
                <button
                  className={doneToday ? ghostButtonClass : buttonClass}
                  disabled={busy || today === null}
                  onClick={() =>
                    run(async () => {
                      if (today === null) return;
                      await client.upsertLog({ habitId: habit.id, logDate: today, completed: !doneToday });
                      await loadHabits();
                    })
                  }
                >
                  {doneToday ? "Undo today" : "Done today"}
                </button>
                <button
                  className={ghostButtonClass}
                  disabled={busy}
                  onClick={() =>
                    run(async () => {
                      await client.archiveHabit(habit.id);
                      await loadHabits();
                    })
                  }
                >
                  Archive
                </button>
              </div>
            </div>
            {habit.description && <p className="text-sm text-neutral-400 mb-2">{habit.description}</p>}
            <p className="font-mono text-xs text-neutral-400 mb-3">
              streak {stats.currentStreak} · best {stats.longestStreak} · done {stats.totalCompleted} ·{" "}
              {stats.completionPercentage}%
            </p>
            <HeatMap days={heatmap.days} color={habit.color} />
          </section>
        );
      })}
    </div>
  );
}

// ─── Forms ──────────────────────────────────────────────

function AuthForm({
  busy,
  error,
  onLogin,
  onRegister,
}: {
  busy: boolean;
  error: string | null;
  onLogin: (login: string, password: string) => Promise<void>;
  onRegister: (username: string, email: string, password: string) => Promise<void>;
}) {
  const [mode, setMode] = useState<"login" | "register">("login");
  const [login, setLogin] = useState("");
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");

  const submit = (e: FormEvent) => {
    e.preventDefault();
    void (mode === "login" ? onLogin(login, password) : onRegister(login, email, password));
  };

  return (
    <form onSubmit={submit} className="max-w-sm mx-auto mt-20 rounded-xl bg-surface-800 border border-surface-700 p-6">
      <h1 className="text-2xl font-black text-white mb-4">{mode === "login" ? "Sign in" : "Create account"}</h1>
      <div className="grid gap-3">
        <input
          className={inputClass}
          placeholder={mode === "login" ? "Username or email" : "Username"}
          value={login}
          onChange={(e) => setLogin(e.target.value)}
        />
        {mode === "register" && (
          <input className={inputClass} placeholder="Email" type="email" value={email} onChange={(e) => setEmail(e.target.value)} />
        )}
        <input
          className={inputClass}
          placeholder="Password"
          type="password"
          value={password}
          onChange={(e) => setPassword(e.target.value)}
        />
        <button className={buttonClass} type="submit" disabled={busy}>
          {mode === "login" ? "Sign in" : "Register"}
        </button>
        <button
          className={ghostButtonClass}
          type="button"
          onClick={() => setMode(mode === "login" ? "register" : "login")}
        >
          {mode === "login" ? "Need an account?" : "Have an account?"}
        </button>
      </div>
      {error && <p className="text-sm text-missed mt-3">{error}</p>}
    </form>
  );
}

function NewHabitForm({ busy, onCreate }: { busy: boolean; onCreate: (name: string, color: string) => Promise<void> }) {
  const [name, setName] = useState("");
  const [color, setColor] = useState("#10b981");

  const submit = (e: FormEvent) => {
    e.preventDefault();
    if (!name.trim()) return;
    void onCreate(name.trim(), color).then(() => setName(""));
  };

  return (
    <form onSubmit={submit} className="flex items-center gap-2 rounded-xl bg-surface-800 border border-surface-700 p-4 mb-6">
      <input className={`${inputClass} flex-1`} placeholder="New habit" value={name} onChange={(e) => setName(e.target.value)} />
      <input className="h-9 w-10 rounded bg-transparent" type="color" value={color} onChange={(e) => setColor(e.target.value)} />
      <button className={buttonClass} type="submit" disabled={busy}>
        Add
      </button>
    </form>
  );
}
