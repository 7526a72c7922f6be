import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Countdown, formatMMSS } from "../src/data/countdown.js";

describe("Countdown", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("ticks once per second and finishes once", () => {
    const onTick = vi.fn();
    const onFinish = vi.fn();
    const countdown = new Countdown(3, { onTick, onFinish });

    countdown.start();
    expect(onTick.mock.calls).toEqual([[3]]);
    expect(countdown.running).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(countdown.remaining).toBe(2);

    vi.advanceTimersByTime(2000);
    expect(onTick.mock.calls).toEqual([[3], [2], [1], [0]]);
    expect(onFinish).toHaveBeenCalledTimes(1);
    expect(countdown.running).toBe(false);
    expect(countdown.done).toBe(true);

    vi.advanceTimersByTime(5000);
    expect(onTick).toHaveBeenCalledTimes(4);
    expect(onFinish).toHaveBeenCalledTimes(1);
  });

  it("ignores start while running", () => {
    const onTick = vi.fn();
    const countdown = new Countdown(5, { onTick });
    countdown.start();
    countdown.start();
    expect(onTick).toHaveBeenCalledTimes(1);
    countdown.stop();
  });

  it("finishes immediately for a zero duration", () => {
    const onFinish = vi.fn();
    const countdown = new Countdown(0, { onFinish });
    countdown.start();
    expect(onFinish).toHaveBeenCalledTimes(1);
    expect(countdown.done).toBe(true);
  });

  it("stops without finishing", () => {
    const onFinish = vi.fn();
    const countdown = new Countdown(3, { onFinish });
    countdown.start();
    vi.advanceTimersByTime(1000);
    countdown.stop();
    vi.advanceTimersByTime(5000);
    expect(countdown.remaining).toBe(2);
    expect(onFinish).not.toHaveBeenCalled();
  });

  it("can run again after reset", () => {
    const onFinish = vi.fn();
    const countdown = new Countdown(1, { onFinish });
    countdown.start();
    vi.advanceTimersByTime(1000);
    countdown.start();
    expect(onFinish).toHaveBeenCalledTimes(1);

    countdown.reset();
    expect(countdown.remaining).toBe(1);
    countdown.start();
    vi.advanceTimersByTime(1000);
    expect(onFinish).toHaveBeenCalledTimes(2);
  });
});

describe("formatMMSS", () => {
  it("pads minutes and seconds", () => {
    expect(formatMMSS(0)).toBe("00:00");
    expect(formatMMSS(75)).toBe("01:15");
    expect(formatMMSS(600)).toBe("10:00");
  });
});
