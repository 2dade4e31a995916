export type {
  BiomeKind,
  BiomeProperties,
  Rgba,
  TerrainField,
} from './terrain.js';

export type {
  Tile,
  TileGrid,
} from './tile-grid.js';
