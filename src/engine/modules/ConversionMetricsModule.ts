import type {
  ConversionMetricsV1,
  ConversionSettings,
  MaterialEntry,
} from '../schema/ConversionModelV1';

/**
 * ConversionMetricsModule
 *
 * Closed-form derivation chain from material quantities to landfill savings:
 *
 *   total kg → whole bricks → m³ diverted → m² of landfill → % of landfill
 *
 * Each stage is one arithmetic step with its own divide-by-zero guard.
 * Settings are user-editable, so a caller may hand in a transiently invalid
 * combination; the chain returns 0 rather than Infinity/NaN in that case.
 */

export function totalAvailableWasteKg(entries: readonly MaterialEntry[]): number {
  return entries.reduce((sum, e) => sum + e.quantityKg, 0);
}

export function bricksProducible(totalKg: number, brickMassKg: number): number {
  if (brickMassKg <= 0) return 0;
  return Math.floor(totalKg / brickMassKg);
}

export function volumeDivertedM3(bricks: number, brickVolumeM3: number): number {
  return bricks * brickVolumeM3;
}

export function areaReducedM2(volumeM3: number, landfillDepthM: number): number {
  if (landfillDepthM <= 0) return 0;
  return volumeM3 / landfillDepthM;
}

/** Share of the landfill footprint saved, clamped to the closed interval [0, 100]. */
export function percentLandfillReduced(areaM2: number, landfillAreaM2: number): number {
  if (landfillAreaM2 <= 0) return 0;
  return clampPercent((areaM2 / landfillAreaM2) * 100);
}

export function clampPercent(n: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, n));
}

export function computeConversionMetrics(
  entries: readonly MaterialEntry[],
  settings: ConversionSettings,
): ConversionMetricsV1 {
  const total = totalAvailableWasteKg(entries);
  const bricks = bricksProducible(total, settings.brickMass);
  const volume = volumeDivertedM3(bricks, settings.brickVolume);
  const area = areaReducedM2(volume, settings.landfillDepth);

  return {
    totalAvailableWasteKg: total,
    bricksProducible: bricks,
    volumeDivertedM3: volume,
    areaReducedM2: area,
    percentLandfillReduced: percentLandfillReduced(area, settings.landfillArea),
  };
}
