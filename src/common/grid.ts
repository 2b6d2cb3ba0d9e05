import type { CatalogObject } from './types';

export interface GridCenter {
  /** Decimal hours. */
  ra: number;
  /** Decimal degrees. */
  dec: number;
}

export const DEFAULT_GRID_COUNT = 3;
export const DEFAULT_GRID_STEP = 0.75;

function pair(value: number | [number, number]): [number, number] {
  return Array.isArray(value) ? value : [value, value];
}

function offsets(count: number, step: number): number[] {
  return Array.from({ length: count }, (_, k) => step * (k - (count - 1) / 2));
}

/**
 * Builds a DEC-major grid of targets around `center`, e.g. to stitch a
 * panorama. `counts` and `step` take `[dec, ra]` for a non-square grid; the
 * step is an angle in degrees on both axes (a field of view is
 * `sensor / focal * 57.3`).
 */
export function buildGrid(
  center: GridCenter,
  counts: number | [number, number] = DEFAULT_GRID_COUNT,
  step: number | [number, number] = DEFAULT_GRID_STEP
): CatalogObject[] {
  const [decCount, raCount] = pair(counts).map((n) => Math.max(0, Math.round(n)));
  const [decStep, raStep] = pair(step);
  if (![center.ra, center.dec, decCount, raCount, decStep, raStep].every(Number.isFinite)) {
    return [];
  }

  const grid: CatalogObject[] = [];
  for (const decOffset of offsets(decCount, decStep)) {
    for (const raOffset of offsets(raCount, raStep / 15)) {
      const ra = center.ra + raOffset;
      const dec = center.dec + decOffset;
      grid.push({
        catalog: 'grid',
        name: `RA=${ra.toFixed(2)} DEC=${dec.toFixed(2)}`,
        ra: ra * 15,
        dec,
        magnitude: 0,
        type: 'grid',
        distance: 0
      });
    }
  }
  return grid;
}
