export * from './world/noise/index.js';
export * from './world/terrain/index.js';
export * from './world/query/index.js';
export {
  BIOME_GLYPHS,
  InvalidDimensionError,
  generateWorld,
  renderPreview,
} from './world/pipeline/index.js';
export type { Dimension, GenerateOptions } from './world/pipeline/index.js';
export type { BiomeKind, BiomeProperties, Rgba, TerrainField, Tile, TileGrid } from './world/types/index.js';
