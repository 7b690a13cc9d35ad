export type SettingName = 'brickMass' | 'brickVolume' | 'landfillArea' | 'landfillDepth';

export const SETTING_NAMES: readonly SettingName[] = [
  'brickMass',
  'brickVolume',
  'landfillArea',
  'landfillDepth',
];

export interface ConversionSettings {
  brickMass: number;     // kg per brick
  brickVolume: number;   // m³ per brick
  landfillArea: number;  // m²
  landfillDepth: number; // m
}

/** One (label, kg) pair of the material registry, in canonical order. */
export interface MaterialEntry {
  label: string;
  quantityKg: number;
}

export interface EngineDefaults {
  materials: readonly MaterialEntry[];
  settings: ConversionSettings;
}

export interface ConversionMetricsV1 {
  totalAvailableWasteKg: number;
  bricksProducible: number;       // whole bricks
  volumeDivertedM3: number;
  areaReducedM2: number;
  percentLandfillReduced: number; // 0–100
}

// ─── Error taxonomy ───────────────────────────────────────────────────────────

export type EngineErrorCode =
  | 'InvalidInput'
  | 'UnknownLabel'
  | 'UnknownSetting'
  | 'MalformedImportValue'
  | 'MalformedImportSource'
  | 'PersistenceUnavailable';

// ─── Mutation results ─────────────────────────────────────────────────────────

export type UpdateValueResult =
  | { ok: true; label: string; value: number; clamped: boolean }
  | { ok: false; error: 'UnknownLabel' | 'InvalidInput'; label: string };

export type UpdateSettingResult =
  | { ok: true; name: SettingName; value: number; previous: number }
  | { ok: false; error: 'InvalidInput'; name: SettingName; retained: number }
  | { ok: false; error: 'UnknownSetting'; name: string };

export interface SetAllResult {
  updated: string[];
  unknownLabels: string[];
  /** Known labels whose proposed value was not a finite number. */
  invalidLabels: string[];
}

export interface LoadReport {
  /** Store keys whose value replaced the in-memory default. */
  restoredKeys: string[];
  /** Store keys present but rejected (non-positive or non-finite setting). */
  ignoredKeys: string[];
}

export interface ImportReport {
  /** Registry labels written, in the order they were written (may repeat). */
  updated: string[];
  unmatchedKeys: string[];
  malformedKeys: string[];
}

export type ImportFromTextResult =
  | { ok: true; report: ImportReport }
  | { ok: false; error: 'MalformedImportSource'; message: string };

// ─── Change notifications ─────────────────────────────────────────────────────

export type EngineChangeReason = 'value' | 'setting' | 'reset' | 'bulk' | 'import' | 'load';

export interface EngineChangeEvent {
  reason: EngineChangeReason;
  version: number;
}

export type EngineListener = (event: EngineChangeEvent) => void;

// ─── External capabilities ────────────────────────────────────────────────────

/** Opaque "read bytes as text" capability (asset bundle, file picker, fetch). */
export type TextSource = () => Promise<string>;

/** Flat namespace of named numeric entries. */
export interface KeyValueStore {
  getNumber(key: string): Promise<number | undefined>;
  setNumber(key: string, value: number): Promise<void>;
}
