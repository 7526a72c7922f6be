/**
 * Schedule Overlay — the last seven days, oldest first.
 */

import type { ExtensionContext } from "@mariozechner/pi-coding-agent";
import { matchesKey, visibleWidth } from "@mariozechner/pi-tui";
import { dayKey, scheduleDays } from "../data/analytics.js";
import type { HistoryLedger } from "../data/types.js";
import { longDayLabel, type OverlayTheme } from "./format.js";

class ScheduleComponent {
  private history: HistoryLedger;
  private theme: OverlayTheme;
  private done: (result: void) => void;
  private cachedWidth?: number;
  private cachedLines?: string[];

  constructor(history: HistoryLedger, theme: OverlayTheme, done: (result: void) => void) {
    this.history = history;
    this.theme = theme;
    this.done = done;
  }

  handleInput(data: string): void {
    if (matchesKey(data, "escape") || matchesKey(data, "q")) {
      this.done();
    }
  }

  render(width: number): string[] {
    if (this.cachedLines && this.cachedWidth === width) {
      return this.cachedLines;
    }

    const th = this.theme;
    const innerW = Math.min(width - 2, 56);
    const lines: string[] = [];
    const pad = (content: string, w: number) => content + " ".repeat(Math.max(0, w - visibleWidth(content)));
    const row = (content: string) =>
      th.fg("border", "│") + " " + pad(content, innerW - 2) + " " + th.fg("border", "│");

    const now = new Date();
    const todayStr = dayKey(now);

    lines.push(th.fg("border", `╭${"─".repeat(innerW)}╮`));
    lines.push(row(th.fg("accent", th.bold("📅 YOUR SCHEDULE"))));
    lines.push(row(""));

    for (const day of scheduleDays(this.history, now)) {
      const label = longDayLabel(day.date);
      const styled = day.date === todayStr ? th.fg("accent", th.bold(label)) : th.fg("text", label);
      const status = day.done
        ? th.fg("success", "✅ Exercises completed")
        : th.fg("dim", "☐  No exercises completed");
      lines.push(row(styled));
      lines.push(row("   " + status));
    }

    lines.push(row(""));
    lines.push(row(th.fg("dim", "  q/Esc close")));
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

export async function showSchedule(ctx: ExtensionContext, history: HistoryLedger): Promise<void> {
  await ctx.ui.custom<void>(
    (_tui, theme, _kb, done) => new ScheduleComponent(history, theme, done),
    {
      overlay: true,
      overlayOptions: {
        anchor: "center",
        width: 60,
        maxHeight: "85%",
      },
    },
  );
}
