import { createNoiseContext, type GradientVariant } from '../noise/index.js';
import {
  carveWaterways,
  finalizeTiles,
  resolveTerrainConfig,
  smoothElevation,
  synthesizeRawField,
  type RandomSource,
  type TerrainOverrides,
} from '../terrain/index.js';
import { formatStats, summarizeWorld } from '../query/world-stats.js';
import type { TileGrid } from '../types/index.js';
import { assertDimension } from './errors.js';

export interface GenerateOptions {
  terrain?: TerrainOverrides;
  gradient?: GradientVariant;
  /** Color jitter source; defaults to Math.random */
  random?: RandomSource;
  /** Progress sink; defaults to console.log */
  log?: (message: string) => void;
}

/**
 * Generate a complete, frozen tile grid. Everything but tile color is a pure
 * function of (width, height, seed, terrain, gradient).
 */
export function generateWorld(
  width: number,
  height: number,
  seed: number,
  options: GenerateOptions = {},
): TileGrid {
  assertDimension('width', width);
  assertDimension('height', height);

  const log = options.log ?? console.log;
  const random = options.random ?? Math.random;
  const config = resolveTerrainConfig(options.terrain);
  const context = createNoiseContext({ gradient: options.gradient });

  // Pass 1: raw noise fields
  log(`[Pass 1] Sampling noise layers (${width}x${height}, seed: ${seed}, gradient: ${context.gradient})...`);
  const raw = synthesizeRawField(width, height, seed, config, context);

  // Pass 2: rivers, tributaries, lakes
  log('[Pass 2] Carving rivers and lakes...');
  const carved = carveWaterways(raw, config);
  const lowered = carved.elevation.filter((e, i) => e < raw.elevation[i]).length;
  log(`[Pass 2] Lowered ${lowered} cells below their raw elevation`);

  // Pass 3: smoothing
  log('[Pass 3] Smoothing land elevation...');
  const smoothed = smoothElevation(carved, config.levels.water);

  // Pass 4: biomes and tiles
  log('[Pass 4] Classifying biomes...');
  const tiles = finalizeTiles(smoothed, config.levels, random);

  const grid: TileGrid = Object.freeze({
    width,
    height,
    seed,
    tiles: Object.freeze(tiles),
  });

  log(`[Pass 4] ${formatStats(summarizeWorld(grid, config.levels))}`);
  return grid;
}
