// ============================================================
// Exercise Tracker — Error Types
// ============================================================

export class TrackerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Remote catalog unreachable or answered with a non-success status. Retryable. */
export class NetworkError extends TrackerError {
  readonly status?: number;
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** Persistence read/write failure */
export class StorageError extends TrackerError {}

/** Malformed stored or fetched data */
export class ParseError extends TrackerError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
