import type { Theme } from "@mariozechner/pi-coding-agent";
import { parseDayKey } from "../data/analytics.js";
import type { DayCount, ScheduleDay } from "../data/types.js";

/** The part of the pi theme the overlays draw with */
export type OverlayTheme = Pick<Theme, "fg" | "bold">;

export function progressBar(pct: number, width: number): string {
  const filled = Math.max(0, Math.min(width, Math.round((pct / 100) * width)));
  return "█".repeat(filled) + "░".repeat(width - filled);
}

/** "Mon", "Tue", ... */
export function weekdayLabel(key: string): string {
  const date = parseDayKey(key);
  return date ? date.toLocaleDateString("en-US", { weekday: "short" }) : key;
}

/** "Wednesday, January 10" */
export function longDayLabel(key: string): string {
  const date = parseDayKey(key);
  return date ? date.toLocaleDateString("en-US", { weekday: "long", month: "long", day: "numeric" }) : key;
}

/** Horizontal bar per day, scaled to the busiest day of the window */
export function weeklyChartLines(week: DayCount[], barWidth = 20): string[] {
  const max = Math.max(1, ...week.map(d => d.count));
  return week.map(d => {
    const pct = (d.count / max) * 100;
    return `${weekdayLabel(d.date)} ${d.date.slice(5)} ${progressBar(pct, barWidth)} ${d.count}`;
  });
}

export function scheduleLine(day: ScheduleDay): string {
  const mark = day.done ? "✅" : "☐ ";
  return `${mark} ${longDayLabel(day.date)} — ${day.done ? "Exercises completed" : "No exercises completed"}`;
}
