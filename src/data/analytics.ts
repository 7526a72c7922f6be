// ============================================================
// Exercise Tracker — Streak & History Analytics
// ============================================================

import type { DayCount, HistoryLedger, ProgressSnapshot, ScheduleDay, TrackerState } from "./types.js";

const DAY_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Local midnight of the given moment */
export function normalizeDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, n: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + n);
}

/** Local calendar day as "YYYY-MM-DD" */
export function dayKey(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function isDayKey(value: string): boolean {
  const match = DAY_KEY.exec(value);
  if (!match) return false;
  const date = new Date(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return dayKey(date) === value;
}

/** Inverse of dayKey; null for anything that isn't a real calendar day */
export function parseDayKey(value: string): Date | null {
  if (!isDayKey(value)) return null;
  const [y, m, d] = value.split("-").map(Number);
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1);
}

export function countForDay(history: HistoryLedger, day: Date): number {
  return history[dayKey(day)] ?? 0;
}

/**
 * Consecutive days with at least one completion, walking back from `today`
 * inclusive. Stops at the first empty day, so an empty today means 0.
 */
export function computeStreak(history: HistoryLedger, today: Date): number {
  let streak = 0;
  let cursor = normalizeDay(today);
  while (countForDay(history, cursor) > 0) {
    streak++;
    cursor = addDays(cursor, -1);
  }
  return streak;
}

/** Longest run of consecutive completion days anywhere in the ledger */
export function computeLongestStreak(history: HistoryLedger): number {
  const days = Object.keys(history)
    .filter(k => (history[k] ?? 0) > 0)
    .sort();

  let longest = 0;
  let run = 0;
  let prev: string | null = null;
  for (const key of days) {
    const date = parseDayKey(key);
    if (!date) continue;
    run = prev !== null && dayKey(addDays(date, -1)) === prev ? run + 1 : 1;
    longest = Math.max(longest, run);
    prev = key;
  }
  return longest;
}

/** The `n` days ending at `today`, oldest first; missing days count 0 */
export function lastNDays(n: number, today: Date, history: HistoryLedger = {}): DayCount[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Day count must be a non-negative integer, got ${n}`);
  }
  const end = normalizeDay(today);
  const days: DayCount[] = [];
  for (let i = n - 1; i >= 0; i--) {
    const date = addDays(end, -i);
    days.push({ date: dayKey(date), count: countForDay(history, date) });
  }
  return days;
}

/** Seven-day schedule; any positive count means the day is done */
export function scheduleDays(history: HistoryLedger, today: Date): ScheduleDay[] {
  return lastNDays(7, today, history).map(d => ({ ...d, done: d.count > 0 }));
}

/** Share of fetched exercises completed at least once, one decimal */
export function calcCompletionRate(exerciseIds: string[], completed: Set<string>): number {
  if (exerciseIds.length === 0) return 0;
  const done = exerciseIds.filter(id => completed.has(id)).length;
  return Math.round((done / exerciseIds.length) * 1000) / 10;
}

/** Full progress snapshot */
export function calcProgressSnapshot(state: TrackerState, now: Date = new Date()): ProgressSnapshot {
  const ids = state.exercises.map(e => e.id);
  return {
    totalExercises: ids.length,
    completedCount: ids.filter(id => state.completed.has(id)).length,
    completionRate: calcCompletionRate(ids, state.completed),
    streak: state.streak,
    longestStreak: computeLongestStreak(state.history),
    todayCount: countForDay(state.history, now),
    week: lastNDays(7, now, state.history),
  };
}
