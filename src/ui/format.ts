import { coerceQuantity } from '../engine/importer/LabelMatcher';
import { clampPercent } from '../engine/modules/ConversionMetricsModule';

export function formatKg(kg: number): string {
  return `${kg.toFixed(2)} kg`;
}

export function formatVolumeM3(m3: number): string {
  return m3.toFixed(4);
}

export function formatAreaM2(m2: number): string {
  return m2.toFixed(3);
}

export function formatPercent(pct: number): string {
  return `${pct.toFixed(2)}%`;
}

/** Progress-bar fill (0–1) for a landfill reduction percentage. */
export function progressFraction(pct: number): number {
  return clampPercent(pct / 100, 0, 1);
}

/**
 * Parse a number typed into an input field.
 * Returns null when the text is not a plain decimal number.
 */
export function parseNumericInput(text: string): number | null {
  return coerceQuantity(text) ?? null;
}

export type FieldCommit =
  | { kind: 'unchanged' }
  | { kind: 'invalid' }
  | { kind: 'commit'; value: number };

/** Decide what an input field should do with its text when it commits. */
export function planFieldCommit(text: string, current: number): FieldCommit {
  const parsed = parseNumericInput(text);
  if (parsed === null) return { kind: 'invalid' };
  return parsed === current ? { kind: 'unchanged' } : { kind: 'commit', value: parsed };
}
