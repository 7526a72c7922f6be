import { StringEnum } from "@mariozechner/pi-ai";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Text } from "@mariozechner/pi-tui";
import { type Static, Type } from "@sinclair/typebox";
import { calcProgressSnapshot, lastNDays, scheduleDays } from "../data/analytics.js";
import { describeError } from "../data/errors.js";
import type { CompletionStore } from "../data/store.js";
import type { ExerciseTracker } from "../data/tracker.js";
import { progressBar, scheduleLine, weeklyChartLines } from "../ui/format.js";
import { failResult, textResult, type ToolDetails, type ToolResult } from "./exercises.js";

const ProgressParams = Type.Object({
  action: StringEnum(["snapshot", "weekly", "schedule", "history", "reset"] as const),
  days: Type.Optional(Type.Integer({ minimum: 1, description: "Number of days for history (default 7)" })),
  confirm: Type.Optional(Type.Boolean({ description: "Must be true for reset" })),
});

export type ProgressParamsType = Static<typeof ProgressParams>;

/** Runs one `exercise_progress` action against the ledger as of `now` */
export async function runProgressAction(
  tracker: ExerciseTracker,
  store: CompletionStore,
  params: ProgressParamsType,
  now: Date = new Date(),
  signal?: AbortSignal,
): Promise<ToolResult> {
  try {
    switch (params.action) {
      case "snapshot": {
        if (tracker.state.exercises.length === 0) await tracker.fetchAll(signal);
        const state = tracker.refreshLocal();
        const s = calcProgressSnapshot(state, now);
        const lines = [
          "📊 PROGRESS SNAPSHOT",
          "",
          `🏋️ Total Exercises: ${s.totalExercises}`,
          `✅ Completed: ${s.completedCount}`,
          `📈 Completion Rate: ${progressBar(s.completionRate, 15)} ${s.completionRate.toFixed(1)}%`,
          `🔥 Streak: ${s.streak} days (best: ${s.longestStreak})`,
          `📅 Today: ${s.todayCount} completion${s.todayCount === 1 ? "" : "s"}`,
        ];
        if (state.error) lines.push("", `⚠️ Catalog unavailable: ${state.error}`);
        return textResult(lines.join("\n"), { action: "snapshot", error: false, snapshot: s });
      }

      case "weekly": {
        const state = tracker.refreshLocal();
        const week = lastNDays(7, now, state.history);
        const total = week.reduce((sum, d) => sum + d.count, 0);
        const lines = ["📊 Weekly Completions", "", ...weeklyChartLines(week), "", `Total: ${total}`];
        return textResult(lines.join("\n"), { action: "weekly", error: false, week });
      }

      case "schedule": {
        const state = tracker.refreshLocal();
        const days = scheduleDays(state.history, now);
        const lines = ["📅 Your Schedule", "", ...days.map(scheduleLine)];
        return textResult(lines.join("\n"), { action: "schedule", error: false, days });
      }

      case "history": {
        const numDays = params.days ?? 7;
        const state = tracker.refreshLocal();
        const days = lastNDays(numDays, now, state.history);
        const lines = [`📊 Completion History (last ${numDays} days)`, ""];
        for (const d of days) lines.push(`  ${d.date}  ${String(d.count).padStart(3)}`);
        return textResult(lines.join("\n"), { action: "history", error: false, numDays, days });
      }

      case "reset": {
        if (params.confirm !== true) return failResult("reset", "reset clears all completion data; pass confirm=true");
        store.clear();
        tracker.refreshLocal();
        return textResult("🗑️ Completion data cleared", { action: "reset", error: false });
      }

      default:
        return failResult("unknown", `Unknown action: ${String(params.action)}`);
    }
  } catch (err) {
    return failResult(params.action, describeError(err));
  }
}

export function registerProgressTool(
  pi: ExtensionAPI,
  getTracker: () => ExerciseTracker,
  getStore: () => CompletionStore,
): void {
  pi.registerTool<typeof ProgressParams, ToolDetails>({
    name: "exercise_progress",
    label: "Exercise Progress",
    description:
      "Query workout progress. Actions: snapshot (totals, completion rate, streaks), weekly (7-day completion chart), schedule (which of the last 7 days had exercises), history (daily counts for N days), reset (clear all completion data, requires confirm=true).",
    parameters: ProgressParams,

    async execute(_toolCallId, params, signal, _onUpdate, _ctx) {
      return runProgressAction(getTracker(), getStore(), params, new Date(), signal);
    },

    renderCall(args, theme) {
      return new Text(theme.fg("toolTitle", theme.bold("exercise_progress ")) + theme.fg("muted", args.action), 0, 0);
    },

    renderResult(result, _options, theme) {
      const text = result.content[0];
      const content = text?.type === "text" ? text.text : "";
      if (result.details?.error) return new Text(theme.fg("error", content), 0, 0);
      return new Text(theme.fg("success", "✓ ") + theme.fg("muted", content.split("\n")[0] ?? ""), 0, 0);
    },
  });
}
