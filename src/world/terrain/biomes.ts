import type { BiomeKind, BiomeProperties } from '../types/index.js';
import { defaultLevels, type TerrainLevels } from './terrain-config.js';

export const BIOME_KINDS: readonly BiomeKind[] = [
  'deep_water',
  'shallow_water',
  'beach',
  'plains',
  'forest',
  'hills',
  'mountains',
  'snow_caps',
];

function biome(
  baseColor: [number, number, number, number],
  heightModifier: number,
  roughness: number,
  walkable: boolean,
): BiomeProperties {
  return Object.freeze({ baseColor: Object.freeze(baseColor), heightModifier, roughness, walkable });
}

export const BIOME_PROPERTIES: Readonly<Record<BiomeKind, BiomeProperties>> = Object.freeze({
  deep_water:    biome([0, 64, 220, 255],    0.3, 0.1, false),
  shallow_water: biome([0, 128, 255, 255],   0.5, 0.2, false),
  beach:         biome([240, 220, 180, 255], 0.6, 0.2, true),
  plains:        biome([100, 210, 100, 255], 1.0, 0.3, true),
  forest:        biome([21, 120, 35, 255],   1.1, 0.4, true),
  hills:         biome([90, 160, 90, 255],   1.2, 0.6, true),
  mountains:     biome([150, 140, 130, 255], 1.5, 0.8, false),
  snow_caps:     biome([255, 255, 255, 255], 1.6, 0.9, false),
});

/**
 * Pick the biome for a cell. Elevation decides the band; moisture only splits
 * the plains and hills bands into forest.
 */
export function classifyBiome(
  elevation: number,
  moisture: number,
  levels: TerrainLevels = defaultLevels,
): BiomeKind {
  if (elevation < levels.water - 5) return 'deep_water';
  if (elevation < levels.water) return 'shallow_water';
  if (elevation < levels.beach) return 'beach';
  if (elevation < levels.plains) return moisture >= 0.6 ? 'forest' : 'plains';
  if (elevation < levels.hills) return moisture >= 0.4 ? 'forest' : 'hills';
  if (elevation < levels.mountain) return 'mountains';
  return 'snow_caps';
}
