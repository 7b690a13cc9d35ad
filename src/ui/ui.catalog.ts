/**
 * Static presentation data: chart palette and the production process
 * shown under the analytics.
 */

/** Pie slice colours, assigned by position among the non-zero materials. */
export const COMPOSITION_PALETTE: readonly string[] = [
  '#69F0AE', // green
  '#FFAB40', // orange
  '#448AFF', // blue
  '#FF4081', // pink
  '#FFFF00', // yellow
  '#18FFFF', // cyan
  '#EEFF41', // lime
];

export interface ProcessStep {
  step: number;
  title: string;
  detail: string;
}

export const PROCESS_STEPS: readonly ProcessStep[] = [
  { step: 1, title: 'Dehumidifying', detail: 'removes moisture' },
  { step: 2, title: 'Grinding', detail: 'uniform fine mix' },
  { step: 3, title: 'Molding', detail: 'compact shaping' },
  { step: 4, title: 'Drying', detail: 'set and harden bricks' },
];

/** Served by the dev server from public/data/. */
export const SAMPLE_DATA_URL = '/data/sample_data.json';
