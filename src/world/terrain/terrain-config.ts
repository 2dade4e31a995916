import type { NoiseLayerConfig } from '../noise/index.js';

export const WORLD_WIDTH = 128;
export const WORLD_HEIGHT = 128;

export const WATER_LEVEL = 20;
export const BEACH_LEVEL = 23;
export const PLAINS_LEVEL = 35;
export const HILLS_LEVEL = 50;
export const MOUNTAIN_LEVEL = 70;

export const CONTINENT_OCTAVES = 4;
export const TERRAIN_OCTAVES = 6;
export const RIVER_OCTAVES = 2;
export const RIVER_THRESHOLD = 0.82;

/** Upper bounds (exclusive) of the elevation bands */
export interface TerrainLevels {
  water: number;
  beach: number;
  plains: number;
  hills: number;
  mountain: number;
}

export type LayerName = 'continent' | 'detail' | 'ridge' | 'moisture' | 'river';

export interface TerrainConfig {
  levels: TerrainLevels;
  riverThreshold: number;
  layers: Record<LayerName, NoiseLayerConfig>;
}

export interface TerrainOverrides {
  levels?: Partial<TerrainLevels>;
  riverThreshold?: number;
  layers?: Partial<Record<LayerName, Partial<NoiseLayerConfig>>>;
}

export const defaultLevels: TerrainLevels = {
  water: WATER_LEVEL,
  beach: BEACH_LEVEL,
  plains: PLAINS_LEVEL,
  hills: HILLS_LEVEL,
  mountain: MOUNTAIN_LEVEL,
};

// Seed offsets put world seed 1 on layer seeds 1..5
export const defaultLayers: Record<LayerName, NoiseLayerConfig> = {
  continent: { coordScale: 0.5, octaves: CONTINENT_OCTAVES, persistence: 0.6, frequency: 0.5, seedOffset: 0 },
  detail:    { coordScale: 5,   octaves: TERRAIN_OCTAVES,   persistence: 0.5, frequency: 2.0, seedOffset: 1 },
  moisture:  { coordScale: 4,   octaves: 4,                 persistence: 0.5, frequency: 2.0, seedOffset: 2 },
  river:     { coordScale: 8,   octaves: RIVER_OCTAVES,     persistence: 0.7, frequency: 3.0, seedOffset: 3 },
  ridge:     { coordScale: 3,   octaves: 4,                 persistence: 0.7, frequency: 1.5, seedOffset: 4 },
};

export const defaultTerrainConfig: TerrainConfig = {
  levels: defaultLevels,
  riverThreshold: RIVER_THRESHOLD,
  layers: defaultLayers,
};

/**
 * Merge overrides onto the defaults. Returns a new config; the defaults are
 * never mutated.
 */
export function resolveTerrainConfig(overrides: TerrainOverrides = {}): TerrainConfig {
  const layers = overrides.layers ?? {};

  return {
    levels: { ...defaultLevels, ...overrides.levels },
    riverThreshold: overrides.riverThreshold ?? RIVER_THRESHOLD,
    layers: {
      continent: { ...defaultLayers.continent, ...layers.continent },
      detail: { ...defaultLayers.detail, ...layers.detail },
      ridge: { ...defaultLayers.ridge, ...layers.ridge },
      moisture: { ...defaultLayers.moisture, ...layers.moisture },
      river: { ...defaultLayers.river, ...layers.river },
    },
  };
}
