// ============================================================
// Exercise Tracker — Core Data Types
// ============================================================

/** An exercise as returned by the remote catalog */
export interface Exercise {
  id: string;
  name: string;
  description: string;
  duration: number; // seconds
  difficulty: string;
}

/** Completion counts per local day: { "2024-01-10": 2, ... } */
export interface HistoryLedger {
  [date: string]: number;
}

/** One bucket of the rolling day window */
export interface DayCount {
  date: string; // "YYYY-MM-DD"
  count: number;
}

export interface ScheduleDay extends DayCount {
  done: boolean;
}

/** Outcome of a single recorded completion */
export interface CompletionResult {
  exerciseId: string;
  day: string;
  dayCount: number;
  streak: number;
  firstCompletion: boolean;
}

/** Everything the overlays and tools render from */
export interface TrackerState {
  exercises: Exercise[];
  completed: Set<string>;
  history: HistoryLedger;
  streak: number;
  isLoading: boolean;
  error: string | null;
}

/** Computed analytics snapshot */
export interface ProgressSnapshot {
  totalExercises: number;
  completedCount: number;
  completionRate: number;
  streak: number;
  longestStreak: number;
  todayCount: number;
  week: DayCount[];
}
