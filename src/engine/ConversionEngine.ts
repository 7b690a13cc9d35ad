import type {
  ConversionMetricsV1,
  ConversionSettings,
  EngineChangeEvent,
  EngineChangeReason,
  EngineDefaults,
  EngineListener,
  ImportFromTextResult,
  ImportReport,
  KeyValueStore,
  LoadReport,
  MaterialEntry,
  SetAllResult,
  SettingName,
  TextSource,
  UpdateSettingResult,
  UpdateValueResult,
} from './schema/ConversionModelV1';
import { SETTING_NAMES } from './schema/ConversionModelV1';
import { DEFAULT_ENGINE_DEFAULTS, valueKey } from './defaults.catalog';
import {
  areaReducedM2,
  bricksProducible,
  computeConversionMetrics,
  percentLandfillReduced,
  totalAvailableWasteKg,
  volumeDivertedM3,
} from './modules/ConversionMetricsModule';
import { coerceQuantity, matchLabels } from './importer/LabelMatcher';
import { parseImportSource } from './importer/ImportSource';
import type { ImportSource } from './importer/ImportSource';
import {
  PersistenceUnavailableError,
  toPersistenceError,
} from './persistence/PersistenceUnavailableError';

export function isSettingName(name: string): name is SettingName {
  return SETTING_NAMES.some(n => n === name);
}

function assertValidDefaults(defaults: EngineDefaults): void {
  const seen = new Set<string>();
  for (const { label, quantityKg } of defaults.materials) {
    if (seen.has(label)) throw new RangeError(`Duplicate material label "${label}" in defaults`);
    if (!Number.isFinite(quantityKg) || quantityKg < 0) {
      throw new RangeError(`Default quantity for "${label}" must be a finite number ≥ 0`);
    }
    seen.add(label);
  }
  for (const name of SETTING_NAMES) {
    const v = defaults.settings[name];
    if (!Number.isFinite(v) || v <= 0) {
      throw new RangeError(`Default ${name} must be a finite number > 0`);
    }
  }
}

export interface ConversionEngineOptions {
  /** Durable store used by save()/load(). Without one both reject. */
  store?: KeyValueStore;
  /** Canonical registry and settings; used at construction and by resetToDefaults(). */
  defaults?: EngineDefaults;
}

/**
 * ConversionEngine
 *
 * Owns the material registry (label → kg, fixed key set) and the four
 * conversion settings. Every mutation goes through this class so that:
 *
 *  - quantities stay ≥ 0 (negative proposals clamp to 0),
 *  - settings stay > 0 (non-positive proposals are rejected),
 *  - subscribers hear about each change exactly once, after it is complete.
 *
 * Derived metrics are computed on every read; nothing is cached.
 *
 * Mutators are synchronous and run to the point of notification before
 * returning. save()/load() are asynchronous; load() reads every field before
 * assigning any of them.
 */
export class ConversionEngine {
  private readonly defaults: EngineDefaults;
  private readonly store: KeyValueStore | undefined;
  private readonly values: Map<string, number>;
  private settings: ConversionSettings;
  private readonly listeners = new Set<EngineListener>();
  private changeVersion = 0;

  constructor(options: ConversionEngineOptions = {}) {
    this.defaults = options.defaults ?? DEFAULT_ENGINE_DEFAULTS;
    assertValidDefaults(this.defaults);
    this.store = options.store;
    this.values = new Map(this.defaults.materials.map(m => [m.label, m.quantityKg]));
    this.settings = { ...this.defaults.settings };
  }

  // ── Subscriptions ─────────────────────────────────────────────────────────

  /** Register a change listener. Returns the matching unsubscribe function. */
  subscribe = (listener: EngineListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /** Monotonic change counter; bumps once per notification. */
  get version(): number {
    return this.changeVersion;
  }

  private notify(reason: EngineChangeReason): void {
    this.changeVersion += 1;
    const event: EngineChangeEvent = { reason, version: this.changeVersion };
    // Snapshot: listeners may unsubscribe (or subscribe) while being notified.
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  // ── Queries ───────────────────────────────────────────────────────────────

  labels(): string[] {
    return [...this.values.keys()];
  }

  hasLabel(label: string): boolean {
    return this.values.has(label);
  }

  getValue(label: string): number | undefined {
    return this.values.get(label);
  }

  /** Registry pairs in canonical order. */
  orderedEntries(): MaterialEntry[] {
    return [...this.values].map(([label, quantityKg]) => ({ label, quantityKg }));
  }

  getSettings(): ConversionSettings {
    return { ...this.settings };
  }

  getSetting(name: SettingName): number {
    return this.settings[name];
  }

  totalAvailableWaste(): number {
    return totalAvailableWasteKg(this.orderedEntries());
  }

  bricksProducible(): number {
    return bricksProducible(this.totalAvailableWaste(), this.settings.brickMass);
  }

  volumeDiverted(): number {
    return volumeDivertedM3(this.bricksProducible(), this.settings.brickVolume);
  }

  areaReduced(): number {
    return areaReducedM2(this.volumeDiverted(), this.settings.landfillDepth);
  }

  percentLandfillReduced(): number {
    return percentLandfillReduced(this.areaReduced(), this.settings.landfillArea);
  }

  /** All derived metrics from a single read of the current state. */
  metrics(): ConversionMetricsV1 {
    return computeConversionMetrics(this.orderedEntries(), this.settings);
  }

  // ── Mutations ─────────────────────────────────────────────────────────────

  updateValue(label: string, quantityKg: number): UpdateValueResult {
    if (!this.values.has(label)) {
      return { ok: false, error: 'UnknownLabel', label };
    }
    if (!Number.isFinite(quantityKg)) {
      return { ok: false, error: 'InvalidInput', label };
    }
    const value = Math.max(0, quantityKg);
    this.values.set(label, value);
    this.notify('value');
    return { ok: true, label, value, clamped: value !== quantityKg };
  }

  updateSetting(name: string, value: number): UpdateSettingResult {
    if (!isSettingName(name)) {
      return { ok: false, error: 'UnknownSetting', name };
    }
    const previous = this.settings[name];
    if (!Number.isFinite(value) || value <= 0) {
      return { ok: false, error: 'InvalidInput', name, retained: previous };
    }
    this.settings = { ...this.settings, [name]: value };
    this.notify('setting');
    return { ok: true, name, value, previous };
  }

  /** Restore the canonical registry and settings in one step. */
  resetToDefaults(): void {
    for (const { label, quantityKg } of this.defaults.materials) {
      this.values.set(label, quantityKg);
    }
    this.settings = { ...this.defaults.settings };
    this.notify('reset');
  }

  /**
   * Replace quantities for every known label in `values`. Unknown labels and
   * non-finite values are skipped and reported; negatives clamp to 0.
   */
  setAll(values: Record<string, number>): SetAllResult {
    const result: SetAllResult = { updated: [], unknownLabels: [], invalidLabels: [] };
    for (const [label, quantityKg] of Object.entries(values)) {
      if (!this.values.has(label)) {
        result.unknownLabels.push(label);
      } else if (!Number.isFinite(quantityKg)) {
        result.invalidLabels.push(label);
      } else {
        this.values.set(label, Math.max(0, quantityKg));
        result.updated.push(label);
      }
    }
    this.notify('bulk');
    return result;
  }

  // ── Import ────────────────────────────────────────────────────────────────

  /**
   * Apply an external name → quantity mapping (values in kg) using fuzzy
   * label matching. A key may update several labels. Keys that match nothing
   * are reported as unmatched; matched keys whose value is not numeric are
   * reported as malformed and skipped.
   */
  importQuantities(source: ImportSource): ImportReport {
    const report: ImportReport = { updated: [], unmatchedKeys: [], malformedKeys: [] };
    const labels = this.labels();

    for (const [key, raw] of Object.entries(source)) {
      const matches = matchLabels(key, labels);
      if (matches.length === 0) {
        report.unmatchedKeys.push(key);
        continue;
      }
      const quantityKg = coerceQuantity(raw);
      if (quantityKg === undefined) {
        report.malformedKeys.push(key);
        continue;
      }
      for (const label of matches) {
        this.values.set(label, Math.max(0, quantityKg));
        report.updated.push(label);
      }
    }

    this.notify('import');
    return report;
  }

  /** Decode a JSON document and import it. Malformed documents change nothing. */
  importFromText(text: string): ImportFromTextResult {
    const parsed = parseImportSource(text);
    if (!parsed.ok) {
      return { ok: false, error: 'MalformedImportSource', message: parsed.message };
    }
    return { ok: true, report: this.importQuantities(parsed.source) };
  }

  /** Read a document through `readText` and import it. Read failures reject. */
  async loadFromAsset(readText: TextSource): Promise<ImportFromTextResult> {
    const text = await readText();
    return this.importFromText(text);
  }

  // ── Persistence ───────────────────────────────────────────────────────────

  private requireStore(): KeyValueStore {
    if (!this.store) {
      throw new PersistenceUnavailableError('No key-value store is configured for this engine');
    }
    return this.store;
  }

  /**
   * Write each quantity under `value:<label>` and each setting under its own
   * name, one entry at a time. A write interrupted part-way leaves a mix of
   * old and new fields, each individually valid.
   */
  async save(): Promise<void> {
    const store = this.requireStore();
    // Snapshot before the first await so later mutations don't mix in.
    const writes: Array<[string, number]> = [
      ...this.orderedEntries().map((e): [string, number] => [valueKey(e.label), e.quantityKg]),
      ...SETTING_NAMES.map((name): [string, number] => [name, this.settings[name]]),
    ];

    for (const [key, value] of writes) {
      try {
        await store.setNumber(key, value);
      } catch (err) {
        throw toPersistenceError('write', key, err);
      }
    }
  }

  /**
   * Restore every field present in the store; missing or rejected fields
   * take the default. Fields are all read first, then applied together with
   * a single notification.
   */
  async load(): Promise<LoadReport> {
    const store = this.requireStore();
    const read = async (key: string): Promise<number | undefined> => {
      try {
        return await store.getNumber(key);
      } catch (err) {
        throw toPersistenceError('read', key, err);
      }
    };

    const storedValues: Array<[string, number]> = [];
    for (const label of this.labels()) {
      const v = await read(valueKey(label));
      if (v !== undefined) storedValues.push([label, v]);
    }
    const storedSettings: Array<[SettingName, number]> = [];
    for (const name of SETTING_NAMES) {
      const v = await read(name);
      if (v !== undefined) storedSettings.push([name, v]);
    }

    const report: LoadReport = { restoredKeys: [], ignoredKeys: [] };
    for (const { label, quantityKg } of this.defaults.materials) {
      this.values.set(label, quantityKg);
    }
    for (const [label, v] of storedValues) {
      if (!Number.isFinite(v)) {
        report.ignoredKeys.push(valueKey(label));
        continue;
      }
      this.values.set(label, Math.max(0, v));
      report.restoredKeys.push(valueKey(label));
    }
    const nextSettings = { ...this.defaults.settings };
    for (const [name, v] of storedSettings) {
      if (!Number.isFinite(v) || v <= 0) {
        report.ignoredKeys.push(name);
        continue;
      }
      nextSettings[name] = v;
      report.restoredKeys.push(name);
    }
    this.settings = nextSettings;

    this.notify('load');
    return report;
  }
}
