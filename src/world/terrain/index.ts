export {
  WORLD_WIDTH,
  WORLD_HEIGHT,
  WATER_LEVEL,
  BEACH_LEVEL,
  PLAINS_LEVEL,
  HILLS_LEVEL,
  MOUNTAIN_LEVEL,
  CONTINENT_OCTAVES,
  TERRAIN_OCTAVES,
  RIVER_OCTAVES,
  RIVER_THRESHOLD,
  defaultLayers,
  defaultLevels,
  defaultTerrainConfig,
  resolveTerrainConfig,
} from './terrain-config.js';
export type { LayerName, TerrainConfig, TerrainLevels, TerrainOverrides } from './terrain-config.js';
export { BIOME_KINDS, BIOME_PROPERTIES, classifyBiome } from './biomes.js';
export { attenuate, blendElevation, islandFactor, ridge, synthesizeRawField } from './raw-field.js';
export { carveCell, carveWaterways } from './carving.js';
export { smoothElevation } from './smoothing.js';
export type { RandomSource } from './finalize.js';
export { finalizeTiles, jitterColor } from './finalize.js';
export { terrainHeight } from './terrain-height.js';
