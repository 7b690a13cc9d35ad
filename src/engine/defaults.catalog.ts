import type { ConversionSettings, EngineDefaults, MaterialEntry } from './schema/ConversionModelV1';

// ─── Canonical material registry ─────────────────────────────────────────────

/**
 * First-run material quantities (kg), in display order.
 *
 * The label set is fixed for the lifetime of an engine: mutations change
 * quantities only. Order drives chart colour assignment, so append new
 * categories at the end rather than inserting them.
 */
export const DEFAULT_MATERIALS: readonly MaterialEntry[] = [
  { label: 'Vegetable peels', quantityKg: 8.0 },
  { label: 'Sawdust', quantityKg: 5.0 },
  { label: 'Dry leaves', quantityKg: 4.0 },
  { label: 'Plastic shreds', quantityKg: 2.0 },
  { label: 'Straws / fibers', quantityKg: 1.0 },
  { label: 'E-waste', quantityKg: 0.2 },
  { label: 'Sand', quantityKg: 0.5 },
  { label: 'Other', quantityKg: 0.3 },
];

// ─── Brick & landfill settings ───────────────────────────────────────────────

export const DEFAULT_SETTINGS: ConversionSettings = {
  brickMass: 2.0,
  brickVolume: 0.002,
  landfillArea: 1000.0,
  landfillDepth: 2.0,
};

export const DEFAULT_ENGINE_DEFAULTS: EngineDefaults = {
  materials: DEFAULT_MATERIALS,
  settings: DEFAULT_SETTINGS,
};

// ─── Persistence keys ────────────────────────────────────────────────────────

/** Namespace for per-material entries in the key-value store. */
export const VALUE_KEY_PREFIX = 'value:';

export function valueKey(label: string): string {
  return `${VALUE_KEY_PREFIX}${label}`;
}
