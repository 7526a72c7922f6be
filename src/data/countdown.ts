// ============================================================
// Exercise Tracker — Exercise Countdown
// ============================================================

export interface CountdownHandlers {
  onTick?: (remaining: number) => void;
  onFinish?: () => void;
}

/** One-second countdown driving the exercise timer overlay */
export class Countdown {
  private seconds: number;
  private handlers: CountdownHandlers;
  private handle?: ReturnType<typeof setInterval>;
  private finished = false;
  remaining: number;

  constructor(seconds: number, handlers: CountdownHandlers = {}) {
    this.seconds = Math.max(0, Math.floor(seconds));
    this.handlers = handlers;
    this.remaining = this.seconds;
  }

  get running(): boolean {
    return this.handle !== undefined;
  }

  get done(): boolean {
    return this.finished;
  }

  start(): void {
    if (this.running || this.finished) return;
    if (this.remaining <= 0) {
      this.finish();
      return;
    }
    this.handlers.onTick?.(this.remaining);
    this.handle = setInterval(() => this.tick(), 1000);
  }

  stop(): void {
    if (this.handle !== undefined) {
      clearInterval(this.handle);
      this.handle = undefined;
    }
  }

  reset(): void {
    this.stop();
    this.finished = false;
    this.remaining = this.seconds;
  }

  private tick(): void {
    this.remaining--;
    if (this.remaining <= 0) {
      this.remaining = 0;
      this.finish();
      return;
    }
    this.handlers.onTick?.(this.remaining);
  }

  private finish(): void {
    this.stop();
    this.finished = true;
    this.handlers.onTick?.(0);
    this.handlers.onFinish?.();
  }
}

export function formatMMSS(n: number): string {
  const m = Math.floor(n / 60).toString().padStart(2, "0");
  const s = (n % 60).toString().padStart(2, "0");
  return `${m}:${s}`;
}
