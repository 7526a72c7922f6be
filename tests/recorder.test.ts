import { beforeEach, describe, expect, it } from "vitest";
import { StorageError } from "../src/data/errors.js";
import { CompletionRecorder } from "../src/data/recorder.js";
import { MemoryKeyValueStorage } from "../src/data/storage.js";
import { CompletionStore } from "../src/data/store.js";

describe("CompletionRecorder", () => {
  let storage: MemoryKeyValueStorage;
  let now: Date;
  let recorder: CompletionRecorder;

  beforeEach(() => {
    storage = new MemoryKeyValueStorage();
    now = new Date(2024, 0, 10, 9, 0);
    recorder = new CompletionRecorder(new CompletionStore(storage), () => now);
  });

  it("records a first completion on an empty store", () => {
    const result = recorder.recordCompletion("ex1", new Date(2024, 0, 10, 15, 30));

    expect(result).toEqual({
      exerciseId: "ex1",
      day: "2024-01-10",
      dayCount: 1,
      streak: 1,
      firstCompletion: true,
    });
    expect(recorder.isCompleted("ex1")).toBe(true);
    expect(recorder.historySnapshot()).toEqual({ "2024-01-10": 1 });
    expect(recorder.currentStreak()).toBe(1);
  });

  it("adds up different exercises on the same day", () => {
    recorder.recordCompletion("ex1", new Date(2024, 0, 10, 8));
    recorder.recordCompletion("ex2", new Date(2024, 0, 10, 19));
    expect(recorder.historySnapshot()["2024-01-10"]).toBe(2);
  });

  it("counts repeated runs of the same exercise", () => {
    const first = recorder.recordCompletion("ex1", new Date(2024, 0, 10, 8));
    const second = recorder.recordCompletion("ex1", new Date(2024, 0, 10, 8, 5));

    expect(first.firstCompletion).toBe(true);
    expect(second.firstCompletion).toBe(false);
    expect(second.dayCount).toBe(2);
    expect(recorder.listCompleted()).toEqual(new Set(["ex1"]));
  });

  it("defaults the date to the clock", () => {
    expect(recorder.recordCompletion("ex1").day).toBe("2024-01-10");
  });

  it("computes the streak against the clock, not the event date", () => {
    const result = recorder.recordCompletion("ex1", new Date(2024, 0, 5, 12));
    expect(result.streak).toBe(0);
    expect(recorder.historySnapshot()).toEqual({ "2024-01-05": 1 });
    expect(recorder.currentStreak()).toBe(0);
  });

  it("stops the streak at the first missing day", () => {
    recorder.recordCompletion("ex1", new Date(2024, 0, 7));
    expect(recorder.recordCompletion("ex1", new Date(2024, 0, 9)).streak).toBe(0);
    expect(recorder.recordCompletion("ex2", new Date(2024, 0, 10)).streak).toBe(2);
    expect(recorder.currentStreak()).toBe(2);
  });

  it("recomputes the stored streak when the clock moves on", () => {
    recorder.recordCompletion("ex1", new Date(2024, 0, 10));
    now = new Date(2024, 0, 12, 9, 0);
    expect(recorder.recordCompletion("ex1", new Date(2024, 0, 12)).streak).toBe(1);
    now = new Date(2024, 0, 13, 9, 0);
    expect(recorder.recordCompletion("ex1", new Date(2024, 0, 13)).streak).toBe(2);
  });

  it("keeps membership monotonic and counts every call per day", () => {
    const calls: Array<[string, Date]> = [
      ["ex1", new Date(2024, 0, 8, 7)],
      ["ex2", new Date(2024, 0, 8, 20)],
      ["ex1", new Date(2024, 0, 9, 7)],
      ["ex1", new Date(2024, 0, 9, 7, 30)],
      ["ex3", new Date(2024, 0, 10, 6)],
    ];
    for (const [id, date] of calls) {
      recorder.recordCompletion(id, date);
      expect(recorder.isCompleted("ex1")).toBe(true);
    }
    expect(recorder.historySnapshot()).toEqual({ "2024-01-08": 2, "2024-01-09": 2, "2024-01-10": 1 });
    expect(recorder.currentStreak()).toBe(3);
  });

  it("commits once per completion", () => {
    recorder.recordCompletion("ex1");
    recorder.recordCompletion("ex1");
    expect(storage.commits).toBe(2);
  });

  it("rejects empty ids and invalid dates", () => {
    expect(() => recorder.recordCompletion("")).toThrow(RangeError);
    expect(() => recorder.recordCompletion("ex1", new Date("not a date"))).toThrow(RangeError);
    expect(storage.commits).toBe(0);
  });

  it("leaves the store untouched when persistence fails", () => {
    storage.failNextCommit();
    expect(() => recorder.recordCompletion("ex1")).toThrow(StorageError);
    expect(recorder.isCompleted("ex1")).toBe(false);
    expect(recorder.historySnapshot()).toEqual({});
    expect(recorder.currentStreak()).toBe(0);
  });
});
