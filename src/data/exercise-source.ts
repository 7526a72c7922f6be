// ============================================================
// Exercise Tracker — Remote Exercise Catalog
// ============================================================

import { describeError, NetworkError, ParseError } from "./errors.js";
import type { Exercise } from "./types.js";

export interface ExerciseSource {
  fetchExercises(signal?: AbortSignal): Promise<Exercise[]>;
}

export interface HttpExerciseSourceOptions {
  apiUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

function asText(value: unknown, fallback: string): string {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return fallback;
}

function asSeconds(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number.parseInt(value, 10) : NaN;
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

/** Maps one catalog item; the catalog often leaves `name` empty and puts the title in `description` */
export function parseExercise(raw: unknown): Exercise {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ParseError("Exercise entry is not an object");
  }
  const item = new Map<string, unknown>(Object.entries(raw));
  return {
    id: asText(item.get("id"), ""),
    name: asText(item.get("name"), asText(item.get("description"), "Unknown Exercise")),
    description: asText(item.get("description"), "No description"),
    duration: asSeconds(item.get("duration")),
    difficulty: asText(item.get("difficulty"), "Unknown"),
  };
}

export class HttpExerciseSource implements ExerciseSource {
  private apiUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: HttpExerciseSourceOptions) {
    this.apiUrl = options.apiUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetchExercises(signal?: AbortSignal): Promise<Exercise[]> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const combined = signal ? anySignal([signal, timeout]) : timeout;

    let text: string;
    try {
      const response = await this.fetchImpl(this.apiUrl, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: combined,
      });
      if (!response.ok) {
        throw new NetworkError(`Failed to load exercises: ${response.status}`, { status: response.status });
      }
      // body read shares the transport timeout
      text = await response.text();
    } catch (err) {
      if (err instanceof NetworkError) throw err;
      throw new NetworkError(`Network error: ${describeError(err)}`, { cause: err });
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (err) {
      throw new ParseError("Exercise catalog is not valid JSON", { cause: err });
    }
    if (!Array.isArray(body)) {
      throw new ParseError("Exercise catalog must be a JSON array");
    }
    return body.map(parseExercise);
  }
}

function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const s of signals) {
    if (s.aborted) {
      controller.abort(s.reason);
      break;
    }
    s.addEventListener("abort", () => controller.abort(s.reason), { once: true });
  }
  return controller.signal;
}
