/**
 * Exercise List Overlay
 *
 * Catalog with completion marks. Enter opens the countdown for the selected
 * exercise; when it reaches zero the run is recorded as a completion.
 */

import type { ExtensionContext } from "@mariozechner/pi-coding-agent";
import { matchesKey, truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { Countdown, formatMMSS } from "../data/countdown.js";
import { describeError } from "../data/errors.js";
import type { ExerciseTracker } from "../data/tracker.js";
import type { CompletionResult, Exercise } from "../data/types.js";
import type { OverlayTheme } from "./format.js";

type Mode = "list" | "timer";

export interface Renderer {
  requestRender(): void;
}

export class ExerciseListComponent {
  private tracker: ExerciseTracker;
  private tui: Renderer;
  private theme: OverlayTheme;
  private done: (result: void) => void;
  private onCompleted: (result: CompletionResult) => void;
  private mode: Mode = "list";
  private selected = 0;
  private active?: Exercise;
  private countdown?: Countdown;
  private message?: { text: string; kind: "success" | "error" };
  private cachedWidth?: number;
  private cachedLines?: string[];

  constructor(
    tracker: ExerciseTracker,
    tui: Renderer,
    theme: OverlayTheme,
    done: (result: void) => void,
    onCompleted: (result: CompletionResult) => void,
  ) {
    this.tracker = tracker;
    this.tui = tui;
    this.theme = theme;
    this.done = done;
    this.onCompleted = onCompleted;
  }

  handleInput(data: string): void {
    if (this.mode === "timer") {
      this.handleTimerInput(data);
      return;
    }

    const exercises = this.tracker.state.exercises;
    if (matchesKey(data, "escape") || matchesKey(data, "q")) {
      this.done();
      return;
    }
    if (matchesKey(data, "up")) {
      this.selected = Math.max(0, this.selected - 1);
      this.invalidate();
    }
    if (matchesKey(data, "down")) {
      this.selected = Math.min(Math.max(0, exercises.length - 1), this.selected + 1);
      this.invalidate();
    }
    if (matchesKey(data, "r") && !this.tracker.state.isLoading) {
      void this.reload();
    }
    if (matchesKey(data, "return")) {
      const exercise = exercises[this.selected];
      if (exercise) this.openTimer(exercise);
    }
  }

  private handleTimerInput(data: string): void {
    if (matchesKey(data, "escape") || matchesKey(data, "q")) {
      this.countdown?.stop();
      this.countdown = undefined;
      this.active = undefined;
      this.message = undefined;
      this.mode = "list";
      this.invalidate();
      return;
    }
    if ((matchesKey(data, "return") || matchesKey(data, "space")) && this.countdown && !this.countdown.running) {
      if (this.countdown.done) this.countdown.reset();
      this.message = undefined;
      this.countdown.start();
      this.invalidate();
    }
  }

  private openTimer(exercise: Exercise): void {
    this.active = exercise;
    this.message = undefined;
    this.countdown = new Countdown(exercise.duration, {
      onTick: () => this.refresh(),
      onFinish: () => this.complete(exercise),
    });
    this.mode = "timer";
    this.invalidate();
  }

  private complete(exercise: Exercise): void {
    try {
      const { result } = this.tracker.markCompleted(exercise.id);
      this.message = { text: `Exercise Completed! You have completed ${exercise.name}!`, kind: "success" };
      this.onCompleted(result);
    } catch (err) {
      this.message = { text: `Could not save completion: ${describeError(err)}`, kind: "error" };
    }
    this.refresh();
  }

  private async reload(): Promise<void> {
    this.message = undefined;
    this.refresh();
    await this.tracker.fetchAll();
    this.selected = Math.min(this.selected, Math.max(0, this.tracker.state.exercises.length - 1));
    this.refresh();
  }

  private refresh(): void {
    this.invalidate();
    this.tui.requestRender();
  }

  render(width: number): string[] {
    if (this.cachedLines && this.cachedWidth === width) {
      return this.cachedLines;
    }

    const th = this.theme;
    const innerW = Math.min(width - 2, 62);
    const lines: string[] = [];

    const pad = (content: string, w: number) => {
      const vis = visibleWidth(content);
      return content + " ".repeat(Math.max(0, w - vis));
    };
    const row = (content: string) =>
      th.fg("border", "│") + " " + pad(truncateToWidth(content, innerW - 2), innerW - 2) + " " + th.fg("border", "│");

    lines.push(th.fg("border", `╭${"─".repeat(innerW)}╮`));

    if (this.mode === "timer" && this.active && this.countdown) {
      const ex = this.active;
      lines.push(row(th.fg("accent", th.bold(`⏱️ ${ex.name}`))));
      lines.push(row(""));
      lines.push(row(th.fg("muted", ex.description)));
      lines.push(row(th.fg("dim", `Duration: ${ex.duration} seconds │ ${ex.difficulty}`)));
      lines.push(row(""));
      const clock = formatMMSS(this.countdown.remaining);
      lines.push(row("   " + (this.countdown.running ? th.fg("accent", th.bold(clock)) : th.fg("text", clock))));
      lines.push(row(""));
      if (this.message) lines.push(row(th.fg(this.message.kind, this.message.text)));
      const hint = this.countdown.running
        ? "  Esc stop"
        : this.countdown.done
          ? "  Enter again • Esc back"
          : "  Enter/Space start exercise • Esc back";
      lines.push(row(th.fg("dim", hint)));
    } else {
      const state = this.tracker.state;
      lines.push(row(th.fg("accent", th.bold("🏋️ EXERCISES"))));
      lines.push(row(th.fg("muted", `🔥 Streak: ${state.streak} days`)));
      lines.push(row(""));

      if (state.isLoading) {
        lines.push(row(th.fg("dim", "  Loading…")));
      } else if (state.error) {
        lines.push(row(th.fg("error", `  Error: ${state.error}`)));
        lines.push(row(th.fg("dim", "  Press r to retry")));
      } else if (state.exercises.length === 0) {
        lines.push(row(th.fg("dim", "  No exercises available")));
      }

      if (!state.isLoading) {
        state.exercises.forEach((ex, i) => {
          const isSelected = i === this.selected;
          const prefix = isSelected ? th.fg("accent", "▶ ") : "  ";
          const mark = state.completed.has(ex.id) ? th.fg("success", "✅") : th.fg("dim", "☐ ");
          const name = isSelected ? th.fg("accent", ex.name) : th.fg("text", ex.name);
          lines.push(row(`${prefix}${mark} ${name} ${th.fg("dim", `${ex.duration}s`)}`));
        });
      }

      lines.push(row(""));
      lines.push(row(th.fg("dim", "  ↑↓ select • Enter timer • r reload • q close")));
    }

    lines.push(th.fg("border", `╰${"─".repeat(innerW)}╯`));

    this.cachedWidth = width;
    this.cachedLines = lines;
    return lines;
  }

  invalidate(): void {
    this.cachedWidth = undefined;
    this.cachedLines = undefined;
  }

  dispose(): void {
    this.countdown?.stop();
  }
}

export async function showExerciseList(
  ctx: ExtensionContext,
  tracker: ExerciseTracker,
  onCompleted: (result: CompletionResult) => void,
): Promise<void> {
  let component: ExerciseListComponent | undefined;
  try {
    await ctx.ui.custom<void>(
      (tui, theme, _kb, done) => {
        component = new ExerciseListComponent(tracker, tui, theme, done, onCompleted);
        return component;
      },
      {
        overlay: true,
        overlayOptions: {
          anchor: "center",
          width: 66,
          maxHeight: "85%",
        },
      },
    );
  } finally {
    component?.dispose();
  }
}
