import type { TerrainField } from '../types/index.js';
import type { TerrainConfig } from './terrain-config.js';

/** Width of the band just below the river threshold that still dips under water */
const TRIBUTARY_BAND = 0.1;
const RIVER_DEPTH = 5;
const LAKE_MARGIN = 5;
const LAKE_MOISTURE = 0.7;

/**
 * Lower one cell for rivers, tributaries and wet basins. Each clamp can only
 * lower the elevation, so their order does not matter.
 */
export function carveCell(
  elevation: number,
  moisture: number,
  riverValue: number,
  waterLevel: number,
  riverThreshold: number,
): number {
  let e = elevation;

  if (riverValue > riverThreshold) {
    const strength = (riverValue - riverThreshold) / (1 - riverThreshold);
    e = Math.min(e, waterLevel - strength * RIVER_DEPTH);
  }

  if (riverValue > riverThreshold - TRIBUTARY_BAND && riverValue <= riverThreshold) {
    e = Math.min(e, waterLevel - 1);
  }

  if (e < waterLevel + LAKE_MARGIN && moisture > LAKE_MOISTURE) {
    e = Math.min(e, waterLevel - 2);
  }

  return e;
}

/**
 * Pass 2: carve channels and lakes. Returns a new field; does not mutate the input.
 */
export function carveWaterways(field: TerrainField, config: TerrainConfig): TerrainField {
  const { water } = config.levels;
  const elevation = field.elevation.map((e, i) =>
    carveCell(e, field.moisture[i], field.riverValue[i], water, config.riverThreshold),
  );
  return { ...field, elevation };
}
