/**
 * Progress Overlay
 *
 * Totals, completion rate, streaks and a bar chart of the last seven days.
 */

import type { ExtensionContext } from "@mariozechner/pi-coding-agent";
import { matchesKey, truncateToWidth, visibleWidth } from "@mariozechner/pi-tui";
import { calcProgressSnapshot } from "../data/analytics.js";
import { describeError } from "../data/errors.js";
import type { ExerciseTracker } from "../data/tracker.js";
import type { ProgressSnapshot } from "../data/types.js";
import { type OverlayTheme, progressBar, weeklyChartLines } from "./format.js";

export class ProgressComponent {
  private tracker: ExerciseTracker;
  private snapshot: ProgressSnapshot;
  private error?: string;
  private theme: OverlayTheme;
  private done: (result: void) => void;
  private cachedWidth?: number;
  private cachedLines?: string[];

  constructor(tracker: ExerciseTracker, theme: OverlayTheme, done: (result: void) => void) {
    this.tracker = tracker;
    this.snapshot = calcProgressSnapshot(tracker.state);
    this.theme = theme;
    this.done = done;
  }

  handleInput(data: string): void {
    if (matchesKey(data, "escape") || matchesKey(data, "q")) {
      this.done();
      return;
    }
    if (matchesKey(data, "r")) {
      try {
        this.snapshot = calcProgressSnapshot(this.tracker.refreshLocal());
        this.error = undefined;
      } catch (err) {
        this.error = `Could not refresh: ${describeError(err)}`;
      }
      this.invalidate();
    }
  }

  render(width: number): string[] {
    if (this.cachedLines && this.cachedWidth === width) {
      return this.cachedLines;
    }

    const th = this.theme;
    const s = this.snapshot;
    const innerW = Math.min(width - 2, 62);
    const lines: string[] = [];

    const pad = (content: string, w: number) => {
      const vis = visibleWidth(content);
      return content + " ".repeat(Math.max(0, w - vis));
    };
    const row = (content: string) =>
      th.fg("border", "│") + " " + pad(truncateToWidth(content, innerW - 2), innerW - 2) + " " + th.fg("border", "│");
    const hr = () => th.fg("border", `├${"─".repeat(innerW)}┤`);

    lines.push(th.fg("border", `╭${"─".repeat(innerW)}╮`));
    lines.push(row(th.fg("accent", th.bold("📈 YOUR PROGRESS"))));
    if (this.error) lines.push(row(th.fg("error", this.error)));
    lines.push(row(""));
    lines.push(row(th.fg("muted", `Total Exercises: ${th.fg("text", String(s.totalExercises))}`)));
    lines.push(row(th.fg("muted", `Completed: ${th.fg("text", String(s.completedCount))}`)));
    lines.push(row(
      th.fg("muted", "Completion Rate: ")
      + th.fg("success", progressBar(s.completionRate, 20))
      + th.fg("text", ` ${s.completionRate.toFixed(1)}%`),
    ));
    lines.push(row(
      th.fg("muted", `🔥 Streak: ${th.fg("text", `${s.streak} days`)}`)
      + th.fg("muted", `  │  🏆 Best: ${th.fg("text", `${s.longestStreak} days`)}`),
    ));

    lines.push(hr());
    lines.push(row(th.fg("accent", "Weekly Completions")));
    if (s.week.every(d => d.count === 0)) {
      lines.push(row(th.fg("dim", "  No completion data available")));
    } else {
      for (const line of weeklyChartLines(s.week, 20)) {
        lines.push(row(th.fg("text", "  " + line)));
      }
    }

    lines.push(row(""));
    lines.push(row(th.fg("dim", "  r refresh • q/Esc close")));
    lines.push(th.fg("border", `╰${"─".repeat(innerW)}╯`));

    this.cachedWidth = width;
    this.cachedLines = lines;
    return lines;
  }

  invalidate(): void {
    this.cachedWidth = undefined;
    this.cachedLines = undefined;
  }
}

export async function showProgress(ctx: ExtensionContext, tracker: ExerciseTracker): Promise<void> {
  await ctx.ui.custom<void>(
    (_tui, theme, _kb, done) => new ProgressComponent(tracker, theme, done),
    {
      overlay: true,
      overlayOptions: {
        anchor: "center",
        width: 66,
        maxHeight: "85%",
      },
    },
  );
}
