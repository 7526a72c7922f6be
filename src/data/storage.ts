// ============================================================
// Exercise Tracker — Key-Value Persistence
// ============================================================

import * as fs from "node:fs";
import * as path from "node:path";
import { ParseError, StorageError } from "./errors.js";

export type StoredValue = string | number | string[];

/**
 * Minimal durable key-value contract. `commit` applies every change or none,
 * and returns once the data is on disk. An `undefined` change removes the key.
 */
export interface KeyValueStorage {
  read(key: string): StoredValue | undefined;
  commit(changes: Record<string, StoredValue | undefined>): void;
}

function isStoredValue(value: unknown): value is StoredValue {
  if (typeof value === "string" || typeof value === "number") return true;
  return Array.isArray(value) && value.every(v => typeof v === "string");
}

function applyChanges(target: Map<string, StoredValue>, changes: Record<string, StoredValue | undefined>): void {
  for (const [key, value] of Object.entries(changes)) {
    if (value === undefined) target.delete(key);
    else target.set(key, Array.isArray(value) ? [...value] : value);
  }
}

/** All keys in one JSON document, replaced atomically via tmp + rename */
export class FileKeyValueStorage implements KeyValueStorage {
  private filepath: string;
  private cache?: Map<string, StoredValue>;

  constructor(dataDir: string) {
    this.filepath = path.join(dataDir, "state.json");
    try {
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    } catch (err) {
      throw new StorageError(`Cannot create data directory ${dataDir}`, { cause: err });
    }
  }

  read(key: string): StoredValue | undefined {
    const value = this.load().get(key);
    return Array.isArray(value) ? [...value] : value;
  }

  commit(changes: Record<string, StoredValue | undefined>): void {
    const next = new Map(this.load());
    applyChanges(next, changes);

    const tmp = this.filepath + ".tmp";
    try {
      fs.writeFileSync(tmp, JSON.stringify(Object.fromEntries(next), null, 2), "utf-8");
      fs.renameSync(tmp, this.filepath);
    } catch (err) {
      throw new StorageError(`Failed to write ${this.filepath}`, { cause: err });
    }
    this.cache = next;
  }

  private load(): Map<string, StoredValue> {
    if (this.cache) return this.cache;
    if (!fs.existsSync(this.filepath)) {
      this.cache = new Map();
      return this.cache;
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.filepath, "utf-8");
    } catch (err) {
      throw new StorageError(`Failed to read ${this.filepath}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ParseError(`${this.filepath} is not valid JSON`, { cause: err });
    }
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ParseError(`${this.filepath} does not hold a JSON object`);
    }

    const map = new Map<string, StoredValue>();
    for (const [key, value] of Object.entries(parsed)) {
      if (!isStoredValue(value)) {
        throw new ParseError(`Unsupported value stored under "${key}"`);
      }
      map.set(key, value);
    }
    this.cache = map;
    return map;
  }
}

/** In-process storage for tests and throwaway sessions */
export class MemoryKeyValueStorage implements KeyValueStorage {
  private data = new Map<string, StoredValue>();
  private failures = 0;
  commits = 0;

  constructor(initial: Record<string, StoredValue> = {}) {
    applyChanges(this.data, initial);
  }

  read(key: string): StoredValue | undefined {
    const value = this.data.get(key);
    return Array.isArray(value) ? [...value] : value;
  }

  commit(changes: Record<string, StoredValue | undefined>): void {
    if (this.failures > 0) {
      this.failures--;
      throw new StorageError("Simulated storage failure");
    }
    applyChanges(this.data, changes);
    this.commits++;
  }

  /** Make the next `count` commits throw without writing anything */
  failNextCommit(count = 1): void {
    this.failures += count;
  }
}
