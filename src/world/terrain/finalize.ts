import type { Rgba, TerrainField, Tile } from '../types/index.js';
import { BIOME_PROPERTIES, classifyBiome } from './biomes.js';
import type { TerrainLevels } from './terrain-config.js';

/** Source of uniform values in [0, 1), e.g. Math.random or an alea PRNG */
export type RandomSource = () => number;

const JITTER = 5;

function clampChannel(value: number): number {
  return Math.max(0, Math.min(255, value));
}

/**
 * Offset each color channel by an independent integer in [-5, 5]. Alpha is kept.
 */
export function jitterColor(base: Readonly<Rgba>, random: RandomSource): Rgba {
  const offset = () => Math.min(JITTER, Math.floor(random() * (2 * JITTER + 1)) - JITTER);
  return [
    clampChannel(base[0] + offset()),
    clampChannel(base[1] + offset()),
    clampChannel(base[2] + offset()),
    base[3],
  ];
}

/**
 * Pass 4: classify every cell and emit frozen tiles in row-major order.
 * `random` only feeds color jitter.
 */
export function finalizeTiles(
  field: TerrainField,
  levels: TerrainLevels,
  random: RandomSource,
): Tile[] {
  const { width, height } = field;
  const tiles = new Array<Tile>(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = y * width + x;
      const biome = classifyBiome(field.elevation[idx], field.moisture[idx], levels);
      const props = BIOME_PROPERTIES[biome];

      tiles[idx] = Object.freeze({
        x,
        y,
        elevation: Math.trunc(field.elevation[idx]) || 0,   // no -0
        color: Object.freeze(jitterColor(props.baseColor, random)),
        walkable: props.walkable,
        biome,
      });
    }
  }

  return tiles;
}
