// ============================================================
// Exercise Tracker — Fetch / Complete Orchestration
// ============================================================

import { describeError } from "./errors.js";
import type { ExerciseSource } from "./exercise-source.js";
import type { CompletionRecorder } from "./recorder.js";
import type { CompletionResult, Exercise, TrackerState } from "./types.js";

export function emptyState(): TrackerState {
  return {
    exercises: [],
    completed: new Set(),
    history: {},
    streak: 0,
    isLoading: false,
    error: null,
  };
}

export class ExerciseTracker {
  private source: ExerciseSource;
  private recorder: CompletionRecorder;
  private current: TrackerState = emptyState();

  constructor(source: ExerciseSource, recorder: CompletionRecorder) {
    this.source = source;
    this.recorder = recorder;
  }

  get state(): TrackerState {
    return this.current;
  }

  /**
   * Loads the catalog, then the local completion state. Failures land in
   * `state.error` and keep the previously loaded exercises.
   */
  async fetchAll(signal?: AbortSignal): Promise<TrackerState> {
    this.current = { ...this.current, isLoading: true };
    try {
      const exercises = await this.source.fetchExercises(signal);
      this.current = { ...this.current, ...this.readLocal(), exercises, isLoading: false, error: null };
    } catch (err) {
      this.current = { ...this.current, isLoading: false, error: describeError(err) };
    }
    return this.current;
  }

  /** Reads only the local ledger; used when the catalog is not needed */
  refreshLocal(): TrackerState {
    this.current = { ...this.current, ...this.readLocal() };
    return this.current;
  }

  markCompleted(exerciseId: string, date?: Date): { result: CompletionResult; state: TrackerState } {
    const result = this.recorder.recordCompletion(exerciseId, date);
    return { result, state: this.refreshLocal() };
  }

  findExercise(id: string): Exercise | undefined {
    return this.current.exercises.find(e => e.id === id);
  }

  private readLocal(): Pick<TrackerState, "completed" | "history" | "streak"> {
    return {
      completed: this.recorder.listCompleted(),
      history: this.recorder.historySnapshot(),
      streak: this.recorder.currentStreak(),
    };
  }
}
