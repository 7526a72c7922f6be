import { beforeEach, describe, expect, it } from "vitest";
import { ParseError, StorageError } from "../src/data/errors.js";
import { MemoryKeyValueStorage } from "../src/data/storage.js";
import { COMPLETED_KEY, CompletionStore, HISTORY_KEY, STREAK_KEY } from "../src/data/store.js";

describe("CompletionStore", () => {
  let storage: MemoryKeyValueStorage;
  let store: CompletionStore;

  beforeEach(() => {
    storage = new MemoryKeyValueStorage();
    store = new CompletionStore(storage);
  });

  describe("empty state", () => {
    it("reads defaults when nothing was written", () => {
      expect(store.isCompleted("ex1")).toBe(false);
      expect(store.listCompleted()).toEqual(new Set());
      expect(store.historySnapshot()).toEqual({});
      expect(store.currentStreak()).toBe(0);
    });
  });

  describe("completed set", () => {
    it("inserts idempotently", () => {
      store.markCompleted("ex1");
      store.markCompleted("ex1");
      store.markCompleted("ex2");

      expect(store.listCompleted()).toEqual(new Set(["ex1", "ex2"]));
      expect(storage.commits).toBe(2);
      expect(storage.read(COMPLETED_KEY)).toEqual(["ex1", "ex2"]);
    });

    it("returns a snapshot the caller cannot use to mutate storage", () => {
      store.markCompleted("ex1");
      const snapshot = store.listCompleted();
      snapshot.add("ex9");
      expect(store.isCompleted("ex9")).toBe(false);
    });
  });

  describe("history ledger", () => {
    it("increments the normalized day", () => {
      store.recordForDay(new Date(2024, 0, 10, 8, 0));
      store.recordForDay(new Date(2024, 0, 10, 21, 30));
      store.recordForDay(new Date(2024, 0, 11, 6, 0));

      expect(store.historySnapshot()).toEqual({ "2024-01-10": 2, "2024-01-11": 1 });
      expect(storage.read(HISTORY_KEY)).toBe(JSON.stringify({ "2024-01-10": 2, "2024-01-11": 1 }));
    });

    it("hands out copies", () => {
      store.recordForDay(new Date(2024, 0, 10));
      const snapshot = store.historySnapshot();
      snapshot["2024-01-10"] = 99;
      expect(store.historySnapshot()).toEqual({ "2024-01-10": 1 });
    });

    it("rejects a blob that is not JSON", () => {
      store = new CompletionStore(new MemoryKeyValueStorage({ [HISTORY_KEY]: "{not json" }));
      expect(() => store.historySnapshot()).toThrow(ParseError);
    });

    it("rejects negative or fractional counts", () => {
      store = new CompletionStore(new MemoryKeyValueStorage({ [HISTORY_KEY]: '{"2024-01-10":-1}' }));
      expect(() => store.historySnapshot()).toThrow(ParseError);
      store = new CompletionStore(new MemoryKeyValueStorage({ [HISTORY_KEY]: '{"2024-01-10":1.5}' }));
      expect(() => store.historySnapshot()).toThrow(ParseError);
    });

    it("rejects keys that are not calendar days", () => {
      store = new CompletionStore(new MemoryKeyValueStorage({ [HISTORY_KEY]: '{"yesterday":1}' }));
      expect(() => store.historySnapshot()).toThrow('Invalid day in completion history: "yesterday"');
    });

    it("rejects a value of the wrong kind", () => {
      store = new CompletionStore(new MemoryKeyValueStorage({ [HISTORY_KEY]: 3 }));
      expect(() => store.historySnapshot()).toThrow(ParseError);
    });

    it("refuses to increment a corrupted ledger", () => {
      const bad = new MemoryKeyValueStorage({ [HISTORY_KEY]: "[]" });
      store = new CompletionStore(bad);
      expect(() => store.recordForDay(new Date(2024, 0, 10))).toThrow(ParseError);
      expect(bad.read(HISTORY_KEY)).toBe("[]");
    });
  });

  describe("typed reads", () => {
    it("rejects a completed list stored as a string", () => {
      store = new CompletionStore(new MemoryKeyValueStorage({ [COMPLETED_KEY]: "ex1" }));
      expect(() => store.isCompleted("ex1")).toThrow(ParseError);
    });

    it("rejects a streak that is not a non-negative integer", () => {
      store = new CompletionStore(new MemoryKeyValueStorage({ [STREAK_KEY]: "3" }));
      expect(() => store.currentStreak()).toThrow(ParseError);
      store = new CompletionStore(new MemoryKeyValueStorage({ [STREAK_KEY]: -2 }));
      expect(() => store.currentStreak()).toThrow(ParseError);
    });
  });

  describe("applyCompletion", () => {
    it("writes membership, ledger and streak in one commit", () => {
      const out = store.applyCompletion("ex1", new Date(2024, 0, 10), history => Object.keys(history).length + 4);

      expect(out).toEqual({ history: { "2024-01-10": 1 }, streak: 5, firstCompletion: true });
      expect(storage.commits).toBe(1);
      expect(storage.read(COMPLETED_KEY)).toEqual(["ex1"]);
      expect(storage.read(HISTORY_KEY)).toBe('{"2024-01-10":1}');
      expect(storage.read(STREAK_KEY)).toBe(5);
    });

    it("passes the updated ledger to the streak function", () => {
      store.applyCompletion("ex1", new Date(2024, 0, 9), () => 0);
      let seen: Record<string, number> = {};
      store.applyCompletion("ex1", new Date(2024, 0, 10), history => {
        seen = history;
        return 2;
      });
      expect(seen).toEqual({ "2024-01-09": 1, "2024-01-10": 1 });
    });

    it("writes nothing when the commit fails", () => {
      storage.failNextCommit();
      expect(() => store.applyCompletion("ex1", new Date(2024, 0, 10), () => 1)).toThrow(StorageError);
      expect(store.isCompleted("ex1")).toBe(false);
      expect(store.historySnapshot()).toEqual({});
      expect(store.currentStreak()).toBe(0);
    });
  });

  describe("clear", () => {
    it("removes every key", () => {
      store.applyCompletion("ex1", new Date(2024, 0, 10), () => 1);
      store.clear();
      expect(store.listCompleted()).toEqual(new Set());
      expect(store.historySnapshot()).toEqual({});
      expect(store.currentStreak()).toBe(0);
    });
  });
});
