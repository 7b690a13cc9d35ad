import { describe, it, expect } from 'vitest';
import { ConversionEngine } from '../ConversionEngine';
import { DEFAULT_MATERIALS, DEFAULT_SETTINGS, valueKey } from '../defaults.catalog';
import { BrowserKeyValueStore, MemoryKeyValueStore } from '../persistence/KeyValueStores';
import type { StorageLike } from '../persistence/KeyValueStores';
import { PersistenceUnavailableError } from '../persistence/PersistenceUnavailableError';
import type { EngineChangeEvent, KeyValueStore } from '../schema/ConversionModelV1';

/** Store whose reads or writes fail once `failOnKey` is reached. */
class FailingStore implements KeyValueStore {
  readonly inner: MemoryKeyValueStore;
  private readonly failOnKey: string;
  private readonly mode: 'read' | 'write';

  constructor(mode: 'read' | 'write', failOnKey: string, seed: Record<string, number> = {}) {
    this.mode = mode;
    this.failOnKey = failOnKey;
    this.inner = new MemoryKeyValueStore(seed);
  }

  async getNumber(key: string): Promise<number | undefined> {
    if (this.mode === 'read' && key === this.failOnKey) throw new Error('storage offline');
    return this.inner.getNumber(key);
  }

  async setNumber(key: string, value: number): Promise<void> {
    if (this.mode === 'write' && key === this.failOnKey) throw new Error('disk full');
    return this.inner.setNumber(key, value);
  }
}

/** In-process stand-in for window.localStorage. */
function createFakeStorage(initial: Record<string, string> = {}) {
  const items = new Map(Object.entries(initial));
  const storage: StorageLike = {
    getItem: key => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
  };
  return { storage, items };
}

// ── save ──────────────────────────────────────────────────────────────────────

describe('ConversionEngine.save', () => {
  it('writes one flat entry per material and per setting', async () => {
    const store = new MemoryKeyValueStore();
    const engine = new ConversionEngine({ store });
    await engine.save();
    expect(store.toRecord()).toEqual({
      'value:Vegetable peels': 8,
      'value:Sawdust': 5,
      'value:Dry leaves': 4,
      'value:Plastic shreds': 2,
      'value:Straws / fibers': 1,
      'value:E-waste': 0.2,
      'value:Sand': 0.5,
      'value:Other': 0.3,
      brickMass: 2,
      brickVolume: 0.002,
      landfillArea: 1000,
      landfillDepth: 2,
    });
  });

  it('rejects with PersistenceUnavailableError when no store is configured', async () => {
    const engine = new ConversionEngine();
    await expect(engine.save()).rejects.toBeInstanceOf(PersistenceUnavailableError);
    await expect(engine.load()).rejects.toThrow('No key-value store is configured for this engine');
  });

  it('wraps store write failures and keeps earlier fields written', async () => {
    const store = new FailingStore('write', 'brickMass');
    const engine = new ConversionEngine({ store });
    engine.updateValue('Sand', 9);

    const err = await engine.save().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PersistenceUnavailableError);
    if (err instanceof PersistenceUnavailableError) {
      expect(err.code).toBe('PersistenceUnavailable');
      expect(err.message).toBe('Could not write "brickMass": disk full');
      expect(err.cause).toBeInstanceOf(Error);
    }
    expect(store.inner.toRecord()[valueKey('Sand')]).toBe(9);
    expect(store.inner.toRecord().brickMass).toBeUndefined();
    // In-memory state is still usable.
    expect(engine.getValue('Sand')).toBe(9);
  });
});

// ── load ──────────────────────────────────────────────────────────────────────

describe('ConversionEngine.load', () => {
  it('round-trips registry and settings into a fresh engine', async () => {
    const store = new MemoryKeyValueStore();
    const first = new ConversionEngine({ store });
    first.updateValue('Vegetable peels', 0.1 + 0.2);
    first.updateValue('E-waste', 1 / 3);
    first.updateSetting('brickVolume', 0.0035);
    first.updateSetting('landfillArea', 123.456);
    await first.save();

    const second = new ConversionEngine({ store });
    await second.load();
    expect(second.orderedEntries()).toEqual(first.orderedEntries());
    expect(second.getSettings()).toEqual(first.getSettings());
  });

  it('keeps defaults for fields missing from the store', async () => {
    const store = new MemoryKeyValueStore({ [valueKey('Sand')]: 9, brickMass: 4 });
    const engine = new ConversionEngine({ store });
    const report = await engine.load();
    expect(report).toEqual({ restoredKeys: ['value:Sand', 'brickMass'], ignoredKeys: [] });
    expect(engine.getValue('Sand')).toBe(9);
    expect(engine.getValue('Sawdust')).toBe(5);
    expect(engine.getSettings()).toEqual({ ...DEFAULT_SETTINGS, brickMass: 4 });
  });

  it('resets fields missing from the store to defaults after a mutation', async () => {
    const store = new MemoryKeyValueStore({ [valueKey('Sand')]: 9 });
    const engine = new ConversionEngine({ store });
    engine.updateValue('Sawdust', 40);
    engine.updateSetting('brickMass', 8);
    await engine.load();
    expect(engine.getValue('Sand')).toBe(9);
    expect(engine.getValue('Sawdust')).toBe(5);
    expect(engine.getSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('clamps stored negative quantities and ignores non-positive settings', async () => {
    const store = new MemoryKeyValueStore({ [valueKey('Other')]: -3, brickVolume: -1, landfillDepth: 0 });
    const engine = new ConversionEngine({ store });
    const report = await engine.load();
    expect(report).toEqual({ restoredKeys: ['value:Other'], ignoredKeys: ['brickVolume', 'landfillDepth'] });
    expect(engine.getValue('Other')).toBe(0);
    expect(engine.getSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('ignores entries for labels outside the registry', async () => {
    const store = new MemoryKeyValueStore({ [valueKey('Gravel')]: 50 });
    const engine = new ConversionEngine({ store });
    await engine.load();
    expect(engine.labels()).toHaveLength(DEFAULT_MATERIALS.length);
    expect(engine.getValue('Gravel')).toBeUndefined();
  });

  it('notifies once after every field is read', async () => {
    const store = new MemoryKeyValueStore({ [valueKey('Sand')]: 2, [valueKey('Other')]: 3 });
    const engine = new ConversionEngine({ store });
    const events: EngineChangeEvent[] = [];
    engine.subscribe(e => events.push(e));
    await engine.load();
    expect(events).toEqual([{ reason: 'load', version: 1 }]);
  });

  it('applies nothing when a read fails part-way', async () => {
    const store = new FailingStore('read', 'landfillArea', { [valueKey('Sand')]: 9, brickMass: 4 });
    const engine = new ConversionEngine({ store });
    await expect(engine.load()).rejects.toThrow('Could not read "landfillArea": storage offline');
    expect(engine.getValue('Sand')).toBe(0.5);
    expect(engine.getSetting('brickMass')).toBe(2);
    expect(engine.version).toBe(0);
  });
});

// ── Store adapters ────────────────────────────────────────────────────────────

describe('MemoryKeyValueStore', () => {
  it('returns undefined for missing keys', async () => {
    const store = new MemoryKeyValueStore();
    expect(await store.getNumber('brickMass')).toBeUndefined();
    await store.setNumber('brickMass', 2.5);
    expect(await store.getNumber('brickMass')).toBe(2.5);
  });
});

describe('BrowserKeyValueStore', () => {
  it('stores numbers as decimal strings', async () => {
    const { storage, items } = createFakeStorage();
    const store = new BrowserKeyValueStore(storage);
    await store.setNumber('brickVolume', 0.002);
    expect(items.get('brickVolume')).toBe('0.002');
    expect(await store.getNumber('brickVolume')).toBe(0.002);
  });

  it('reproduces the exact double after a round trip', async () => {
    const { storage } = createFakeStorage();
    const store = new BrowserKeyValueStore(storage);
    await store.setNumber('value:Sand', 0.1 + 0.2);
    expect(await store.getNumber('value:Sand')).toBe(0.30000000000000004);
  });

  it('treats missing, blank and unparsable entries as absent', async () => {
    const { storage } = createFakeStorage({ blank: '  ', junk: 'abc', inf: 'Infinity' });
    const store = new BrowserKeyValueStore(storage);
    expect(await store.getNumber('missing')).toBeUndefined();
    expect(await store.getNumber('blank')).toBeUndefined();
    expect(await store.getNumber('junk')).toBeUndefined();
    expect(await store.getNumber('inf')).toBeUndefined();
  });

  it('turns Storage exceptions into PersistenceUnavailableError', async () => {
    const storage: StorageLike = {
      getItem: () => {
        throw new Error('SecurityError');
      },
      setItem: () => {
        throw new Error('QuotaExceededError');
      },
    };
    const store = new BrowserKeyValueStore(storage);
    await expect(store.setNumber('brickMass', 1)).rejects.toThrow('Could not write "brickMass": QuotaExceededError');
    await expect(store.getNumber('brickMass')).rejects.toBeInstanceOf(PersistenceUnavailableError);
  });

  it('backs a full engine save/load cycle', async () => {
    const { storage } = createFakeStorage();
    const first = new ConversionEngine({ store: new BrowserKeyValueStore(storage) });
    first.updateValue('Straws / fibers', 2.75);
    first.updateSetting('landfillDepth', 3);
    await first.save();

    const second = new ConversionEngine({ store: new BrowserKeyValueStore(storage) });
    await second.load();
    expect(second.getValue('Straws / fibers')).toBe(2.75);
    expect(second.getSetting('landfillDepth')).toBe(3);
  });
});
