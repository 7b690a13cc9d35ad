import type { MaterialEntry } from '../../engine/schema/ConversionModelV1';
import { totalAvailableWasteKg } from '../../engine/modules/ConversionMetricsModule';
import { COMPOSITION_PALETTE } from '../ui.catalog';

const FALLBACK_COLOR = '#999999';

export interface CompositionSlice {
  label: string;
  value: number;       // kg
  percent: number;     // share of total, 0–100
  percentLabel: string;
  color: string;
}

/**
 * Pie chart slices for the composition panel.
 *
 * Zero-quantity materials are left out. Colours cycle through the palette by
 * position among the remaining slices, so the same registry order always
 * yields the same colours.
 */
export function buildCompositionSlices(
  entries: readonly MaterialEntry[],
  palette: readonly string[] = COMPOSITION_PALETTE,
): CompositionSlice[] {
  const total = totalAvailableWasteKg(entries);
  return entries
    .filter(e => e.quantityKg > 0)
    .map((e, i) => {
      const percent = total > 0 ? (e.quantityKg / total) * 100 : 0;
      return {
        label: e.label,
        value: e.quantityKg,
        percent,
        percentLabel: `${percent.toFixed(0)}%`,
        color: palette[i % palette.length] ?? FALLBACK_COLOR,
      };
    });
}
