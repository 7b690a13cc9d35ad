import type { KeyValueStore } from '../schema/ConversionModelV1';
import { toPersistenceError } from './PersistenceUnavailableError';

// ─── In-memory store ─────────────────────────────────────────────────────────

/** Map-backed store for tests and sessions without durable storage. */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries: Map<string, number>;

  constructor(seed: Record<string, number> = {}) {
    this.entries = new Map(Object.entries(seed));
  }

  async getNumber(key: string): Promise<number | undefined> {
    return this.entries.get(key);
  }

  async setNumber(key: string, value: number): Promise<void> {
    this.entries.set(key, value);
  }

  /** Copy of every stored entry, for inspection. */
  toRecord(): Record<string, number> {
    return Object.fromEntries(this.entries);
  }
}

// ─── Browser store ───────────────────────────────────────────────────────────

/** The part of the DOM `Storage` API the browser store relies on. */
export type StorageLike = Pick<Storage, 'getItem' | 'setItem'>;

/**
 * BrowserKeyValueStore
 *
 * Stores each number as its own `Storage` entry, written with `String(n)`
 * (shortest round-trip form, so a reload reproduces the exact double).
 * Entries that no longer parse as a finite number read back as missing.
 *
 * `Storage` throws synchronously on quota or privacy-mode failures; those
 * surface as a rejected promise carrying PersistenceUnavailableError.
 */
export class BrowserKeyValueStore implements KeyValueStore {
  private readonly storage: StorageLike;

  constructor(storage: StorageLike) {
    this.storage = storage;
  }

  async getNumber(key: string): Promise<number | undefined> {
    let raw: string | null;
    try {
      raw = this.storage.getItem(key);
    } catch (err) {
      throw toPersistenceError('read', key, err);
    }
    if (raw === null || raw.trim() === '') return undefined;
    const n = Number(raw);
    return Number.isFinite(n) ? n : undefined;
  }

  async setNumber(key: string, value: number): Promise<void> {
    try {
      this.storage.setItem(key, String(value));
    } catch (err) {
      throw toPersistenceError('write', key, err);
    }
  }
}
