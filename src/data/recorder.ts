// ============================================================
// Exercise Tracker — Completion Recorder
// ============================================================

import { computeStreak, dayKey, normalizeDay } from "./analytics.js";
import type { CompletionStore } from "./store.js";
import type { CompletionResult, HistoryLedger } from "./types.js";

export type Clock = () => Date;

/**
 * Records one completed exercise run. The ledger is keyed by the event's day,
 * while the streak is always recomputed against the clock at recording time.
 */
export class CompletionRecorder {
  private store: CompletionStore;
  private clock: Clock;

  constructor(store: CompletionStore, clock: Clock = () => new Date()) {
    this.store = store;
    this.clock = clock;
  }

  recordCompletion(exerciseId: string, date: Date = this.clock()): CompletionResult {
    if (!exerciseId) throw new RangeError("exerciseId must not be empty");
    if (Number.isNaN(date.getTime())) throw new RangeError("Invalid completion date");

    const day = normalizeDay(date);
    const { history, streak, firstCompletion } = this.store.applyCompletion(
      exerciseId,
      day,
      h => computeStreak(h, this.clock()),
    );
    const key = dayKey(day);
    return {
      exerciseId,
      day: key,
      dayCount: history[key] ?? 0,
      streak,
      firstCompletion,
    };
  }

  isCompleted(id: string): boolean {
    return this.store.isCompleted(id);
  }

  listCompleted(): Set<string> {
    return this.store.listCompleted();
  }

  historySnapshot(): HistoryLedger {
    return this.store.historySnapshot();
  }

  currentStreak(): number {
    return this.store.currentStreak();
  }
}
