import { StringEnum } from "@mariozechner/pi-ai";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { Text } from "@mariozechner/pi-tui";
import { type Static, Type } from "@sinclair/typebox";
import { parseDayKey } from "../data/analytics.js";
import { describeError } from "../data/errors.js";
import type { ExerciseTracker } from "../data/tracker.js";
import type { Exercise } from "../data/types.js";

const CatalogParams = Type.Object({
  action: StringEnum(["list", "show", "complete", "status"] as const),
  exerciseId: Type.Optional(Type.String({ description: "Exercise ID for show/complete/status" })),
  date: Type.Optional(Type.String({ description: "Completion date (YYYY-MM-DD), defaults to now" })),
});

export type CatalogParamsType = Static<typeof CatalogParams>;

export interface ToolDetails {
  action: string;
  error: boolean;
  [key: string]: unknown;
}

export function textResult(text: string, details: ToolDetails) {
  return { content: [{ type: "text" as const, text }], details };
}

export function failResult(action: string, text: string) {
  return textResult(text, { action, error: true });
}

export type ToolResult = ReturnType<typeof textResult>;

export function formatExerciseLine(exercise: Exercise, done: boolean): string {
  const mark = done ? "✅" : "☐";
  return `  ${mark} [${exercise.id}] ${exercise.name} — ${exercise.duration}s (${exercise.difficulty})`;
}

/** Runs one `exercise_catalog` action; failures come back as `details.error` results */
export async function runCatalogAction(
  tracker: ExerciseTracker,
  params: CatalogParamsType,
  signal?: AbortSignal,
): Promise<ToolResult> {
  try {
    switch (params.action) {
      case "list": {
        const state = await tracker.fetchAll(signal);
        if (state.error) return failResult("list", `Error: ${state.error}`);
        if (state.exercises.length === 0) {
          return textResult("No exercises available", { action: "list", error: false, count: 0 });
        }

        const lines = [`🏋️ Exercises (${state.exercises.length})`, ""];
        for (const e of state.exercises) {
          lines.push(formatExerciseLine(e, state.completed.has(e.id)));
        }
        lines.push("");
        lines.push(`🔥 Streak: ${state.streak} days`);

        return textResult(lines.join("\n"), {
          action: "list",
          error: false,
          count: state.exercises.length,
          completed: [...state.completed],
        });
      }

      case "show": {
        if (!params.exerciseId) return failResult("show", "exerciseId required");
        if (tracker.state.exercises.length === 0) await tracker.fetchAll(signal);
        const exercise = tracker.findExercise(params.exerciseId);
        if (!exercise) {
          const { error } = tracker.state;
          return failResult("show", error ? `Error: ${error}` : `Exercise '${params.exerciseId}' not found`);
        }

        const done = tracker.state.completed.has(exercise.id);
        const lines = [
          `🏋️ ${exercise.name}`,
          exercise.description,
          "",
          `Duration: ${exercise.duration} seconds`,
          `Difficulty: ${exercise.difficulty}`,
          `Status: ${done ? "completed" : "not completed yet"}`,
        ];
        return textResult(lines.join("\n"), { action: "show", error: false, exercise, completed: done });
      }

      case "complete": {
        if (!params.exerciseId) return failResult("complete", "exerciseId required");
        let date: Date | undefined;
        if (params.date) {
          const parsed = parseDayKey(params.date);
          if (!parsed) return failResult("complete", `Invalid date '${params.date}', expected YYYY-MM-DD`);
          date = parsed;
        }

        const { result } = tracker.markCompleted(params.exerciseId, date);
        const name = tracker.findExercise(params.exerciseId)?.name ?? params.exerciseId;
        const text = `✅ ${name} — completed on ${result.day} (${result.dayCount} that day) | 🔥 ${result.streak}-day streak`;
        return textResult(text, { action: "complete", error: false, ...result });
      }

      case "status": {
        if (!params.exerciseId) return failResult("status", "exerciseId required");
        tracker.refreshLocal();
        const done = tracker.state.completed.has(params.exerciseId);
        return textResult(
          done ? `✅ ${params.exerciseId} has been completed` : `☐ ${params.exerciseId} has not been completed yet`,
          { action: "status", error: false, exerciseId: params.exerciseId, completed: done },
        );
      }

      default:
        return failResult("unknown", `Unknown action: ${String(params.action)}`);
    }
  } catch (err) {
    return failResult(params.action, describeError(err));
  }
}

export function registerExerciseCatalogTool(pi: ExtensionAPI, getTracker: () => ExerciseTracker): void {
  pi.registerTool<typeof CatalogParams, ToolDetails>({
    name: "exercise_catalog",
    label: "Exercise Catalog",
    description:
      "Browse and complete exercises. Actions: list (fetch the catalog with completion marks), show (one exercise), complete (record a finished run, optional date YYYY-MM-DD), status (whether an exercise was ever completed).",
    parameters: CatalogParams,

    async execute(_toolCallId, params, signal, _onUpdate, _ctx) {
      return runCatalogAction(getTracker(), params, signal);
    },

    renderCall(args, theme) {
      let text = theme.fg("toolTitle", theme.bold("exercise_catalog ")) + theme.fg("muted", args.action);
      if (args.exerciseId) text += " " + theme.fg("accent", args.exerciseId);
      return new Text(text, 0, 0);
    },

    renderResult(result, _options, theme) {
      const text = result.content[0];
      const content = text?.type === "text" ? text.text : "";
      if (result.details?.error) return new Text(theme.fg("error", content), 0, 0);
      return new Text(theme.fg("success", "✓ ") + theme.fg("muted", content.split("\n")[0] ?? ""), 0, 0);
    },
  });
}
