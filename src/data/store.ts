// ============================================================
// Exercise Tracker — Completion Store
// ============================================================

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { dayKey, isDayKey } from "./analytics.js";
import { ParseError } from "./errors.js";
import type { KeyValueStorage } from "./storage.js";
import type { HistoryLedger } from "./types.js";

export const COMPLETED_KEY = "completed_exercises";
export const HISTORY_KEY = "completion_history";
export const STREAK_KEY = "streak";

const HistorySchema = Type.Record(Type.String(), Type.Integer({ minimum: 0 }));

export class CompletionStore {
  private storage: KeyValueStorage;

  constructor(storage: KeyValueStorage) {
    this.storage = storage;
  }

  // ── Completed set ──────────────────────────────────────

  isCompleted(id: string): boolean {
    return this.readCompleted().includes(id);
  }

  markCompleted(id: string): void {
    const completed = this.readCompleted();
    if (completed.includes(id)) return;
    this.storage.commit({ [COMPLETED_KEY]: [...completed, id] });
  }

  listCompleted(): Set<string> {
    return new Set(this.readCompleted());
  }

  // ── History ledger ─────────────────────────────────────

  recordForDay(day: Date): void {
    const history = this.historySnapshot();
    const key = dayKey(day);
    history[key] = (history[key] ?? 0) + 1;
    this.storage.commit({ [HISTORY_KEY]: JSON.stringify(history) });
  }

  historySnapshot(): HistoryLedger {
    const raw = this.storage.read(HISTORY_KEY);
    if (raw === undefined) return {};
    if (typeof raw !== "string") {
      throw new ParseError(`Expected a JSON string under "${HISTORY_KEY}"`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ParseError("Completion history is not valid JSON", { cause: err });
    }
    if (Array.isArray(parsed) || !Value.Check(HistorySchema, parsed)) {
      throw new ParseError("Completion history must map days to non-negative integer counts");
    }
    const bad = Object.keys(parsed).find(k => !isDayKey(k));
    if (bad !== undefined) {
      throw new ParseError(`Invalid day in completion history: "${bad}"`);
    }
    return { ...parsed };
  }

  // ── Streak ─────────────────────────────────────────────

  currentStreak(): number {
    const raw = this.storage.read(STREAK_KEY);
    if (raw === undefined) return 0;
    if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 0) {
      throw new ParseError(`Expected a non-negative integer under "${STREAK_KEY}"`);
    }
    return raw;
  }

  // ── Combined write ─────────────────────────────────────

  /**
   * Marks `id`, bumps the count for `day` and stores the streak computed from
   * the updated ledger, all in a single commit.
   */
  applyCompletion(
    id: string,
    day: Date,
    streakFor: (history: HistoryLedger) => number,
  ): { history: HistoryLedger; streak: number; firstCompletion: boolean } {
    const completed = this.readCompleted();
    const firstCompletion = !completed.includes(id);
    const history = this.historySnapshot();
    const key = dayKey(day);
    history[key] = (history[key] ?? 0) + 1;
    const streak = streakFor(history);

    this.storage.commit({
      [COMPLETED_KEY]: firstCompletion ? [...completed, id] : completed,
      [HISTORY_KEY]: JSON.stringify(history),
      [STREAK_KEY]: streak,
    });
    return { history, streak, firstCompletion };
  }

  /** Administrative reset of every key this store owns */
  clear(): void {
    this.storage.commit({
      [COMPLETED_KEY]: undefined,
      [HISTORY_KEY]: undefined,
      [STREAK_KEY]: undefined,
    });
  }

  // ── Helpers ────────────────────────────────────────────

  private readCompleted(): string[] {
    const raw = this.storage.read(COMPLETED_KEY);
    if (raw === undefined) return [];
    if (!Array.isArray(raw)) {
      throw new ParseError(`Expected a string list under "${COMPLETED_KEY}"`);
    }
    return raw;
  }
}
