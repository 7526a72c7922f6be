/**
 * Exercise Tracker Extension for pi
 *
 * Lists exercises from a remote catalog, runs a countdown per exercise and
 * keeps a local ledger of completions with streak and weekly stats.
 *
 * Commands:
 *   /exercises          — Exercise list with per-exercise timer
 *   /exercise-progress  — Totals, completion rate, streaks, weekly chart
 *   /exercise-schedule  — Last seven days, done / not done
 *
 * Tools (LLM callable):
 *   exercise_catalog   — List, inspect and complete exercises
 *   exercise_progress  — Snapshot, weekly chart, schedule, history
 */

import type { ExtensionAPI, ExtensionContext } from "@mariozechner/pi-coding-agent";

import { countForDay } from "./data/analytics.js";
import { loadConfig } from "./data/config.js";
import { describeError } from "./data/errors.js";
import { HttpExerciseSource } from "./data/exercise-source.js";
import { CompletionRecorder } from "./data/recorder.js";
import { FileKeyValueStorage } from "./data/storage.js";
import { CompletionStore } from "./data/store.js";
import { ExerciseTracker } from "./data/tracker.js";
import type { HistoryLedger } from "./data/types.js";
import { registerExerciseCatalogTool } from "./tools/exercises.js";
import { registerProgressTool } from "./tools/progress.js";
import { showExerciseList } from "./ui/exercise-list.js";
import { showProgress } from "./ui/progress.js";
import { showSchedule } from "./ui/schedule.js";

export interface TrackerServices {
  store: CompletionStore;
  tracker: ExerciseTracker;
}

export function createServices(cwd: string, env: NodeJS.ProcessEnv = process.env): TrackerServices {
  const config = loadConfig(cwd, env);
  const store = new CompletionStore(new FileKeyValueStorage(config.dataDir));
  const recorder = new CompletionRecorder(store);
  const source = new HttpExerciseSource({ apiUrl: config.apiUrl, timeoutMs: config.timeoutMs });
  return { store, tracker: new ExerciseTracker(source, recorder) };
}

export default function exerciseTrackerExtension(pi: ExtensionAPI): void {
  let services: TrackerServices | undefined;

  // ── Initialize on session events ────────────────────────

  function init(ctx: ExtensionContext): void {
    try {
      services = createServices(ctx.cwd);
    } catch (err) {
      services = undefined;
      ctx.ui.notify(`Exercise tracker unavailable: ${describeError(err)}`, "error");
    }
    if (services) {
      try {
        services.tracker.refreshLocal();
      } catch (err) {
        ctx.ui.notify(`Could not read completion data: ${describeError(err)}`, "error");
      }
    }
    updateWidgetAndStatus(ctx);
  }

  function requireServices(): TrackerServices {
    if (!services) throw new Error("Exercise tracker is not initialized");
    return services;
  }

  // ── Widget & Status Updates ─────────────────────────────

  function updateWidgetAndStatus(ctx: ExtensionContext): void {
    if (!services) {
      ctx.ui.setStatus("exercise-tracker", ctx.ui.theme.fg("dim", "🏋️ unavailable"));
      ctx.ui.setWidget("exercise-tracker", undefined);
      return;
    }

    const state = services.tracker.state;
    const todayCount = countForDay(state.history, new Date());
    const th = ctx.ui.theme;
    const statusText = state.streak > 0 ? `🏋️ 🔥 ${state.streak}d` : "🏋️ /exercises";
    ctx.ui.setStatus("exercise-tracker", th.fg(state.streak > 0 ? "accent" : "dim", statusText));

    if (todayCount > 0 || state.streak > 0) {
      const parts = [
        state.streak > 0 ? `🔥 ${state.streak}-day streak` : "",
        todayCount > 0 ? `✅ ${todayCount} today` : "",
      ].filter(Boolean);
      ctx.ui.setWidget("exercise-tracker", [th.fg("accent", "🏋️ ") + th.fg("muted", parts.join(" │ "))]);
    } else {
      ctx.ui.setWidget("exercise-tracker", undefined);
    }
  }

  // ── Session Events ──────────────────────────────────────

  pi.on("session_start", async (_event, ctx) => { init(ctx); });
  pi.on("session_switch", async (_event, ctx) => { init(ctx); });

  pi.on("tool_result", async (event, ctx) => {
    if (event.toolName?.startsWith("exercise_")) {
      updateWidgetAndStatus(ctx);
    }
  });

  // ── Register Tools ──────────────────────────────────────

  registerExerciseCatalogTool(pi, () => requireServices().tracker);
  registerProgressTool(pi, () => requireServices().tracker, () => requireServices().store);

  // ── Register Commands ───────────────────────────────────

  pi.registerCommand("exercises", {
    description: "Browse exercises and run the exercise timer",
    handler: async (_args, ctx) => {
      if (!ctx.hasUI) { ctx.ui.notify("/exercises requires interactive mode", "error"); return; }
      if (!services) { ctx.ui.notify("Exercise tracker is not initialized", "error"); return; }
      const { tracker } = services;
      await tracker.fetchAll();
      if (tracker.state.error) {
        ctx.ui.notify(`Error: ${tracker.state.error} (press r in the list to retry)`, "warning");
      }
      await showExerciseList(ctx, tracker, result => {
        ctx.ui.notify(`🎉 Completed ${result.exerciseId} — ${result.streak}-day streak`, "info");
        updateWidgetAndStatus(ctx);
      });
      updateWidgetAndStatus(ctx);
    },
  });

  pi.registerCommand("exercise-progress", {
    description: "Show exercise progress and the weekly completion chart",
    handler: async (_args, ctx) => {
      if (!ctx.hasUI) { ctx.ui.notify("/exercise-progress requires interactive mode", "error"); return; }
      if (!services) { ctx.ui.notify("Exercise tracker is not initialized", "error"); return; }
      const { tracker } = services;
      if (tracker.state.exercises.length === 0) await tracker.fetchAll();
      try {
        tracker.refreshLocal();
      } catch (err) {
        ctx.ui.notify(describeError(err), "error");
        return;
      }
      await showProgress(ctx, tracker);
    },
  });

  pi.registerCommand("exercise-schedule", {
    description: "Show which of the last seven days had completed exercises",
    handler: async (_args, ctx) => {
      if (!ctx.hasUI) { ctx.ui.notify("/exercise-schedule requires interactive mode", "error"); return; }
      if (!services) { ctx.ui.notify("Exercise tracker is not initialized", "error"); return; }
      let history: HistoryLedger;
      try {
        history = services.tracker.refreshLocal().history;
      } catch (err) {
        ctx.ui.notify(describeError(err), "error");
        return;
      }
      await showSchedule(ctx, history);
    },
  });
}
