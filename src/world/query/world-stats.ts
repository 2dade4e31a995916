import type { BiomeKind, TileGrid } from '../types/index.js';
import { defaultLevels, type TerrainLevels } from '../terrain/index.js';

export interface WorldStats {
  total: number;
  water: number;
  land: number;
  mountain: number;
  waterPercent: number;
  landPercent: number;
  mountainPercent: number;
  biomes: Record<BiomeKind, number>;
}

function percent(count: number, total: number): number {
  return total > 0 ? (100 * count) / total : 0;
}

/**
 * Count water (below the water level), mountain (above the mountain level)
 * and everything in between, plus tiles per biome.
 */
export function summarizeWorld(grid: TileGrid, levels: TerrainLevels = defaultLevels): WorldStats {
  const biomes: Record<BiomeKind, number> = {
    deep_water: 0,
    shallow_water: 0,
    beach: 0,
    plains: 0,
    forest: 0,
    hills: 0,
    mountains: 0,
    snow_caps: 0,
  };
  let water = 0;
  let mountain = 0;
  let land = 0;

  for (const tile of grid.tiles) {
    biomes[tile.biome]++;
    if (tile.elevation < levels.water) water++;
    else if (tile.elevation > levels.mountain) mountain++;
    else land++;
  }

  const total = grid.tiles.length;
  return {
    total,
    water,
    land,
    mountain,
    waterPercent: percent(water, total),
    landPercent: percent(land, total),
    mountainPercent: percent(mountain, total),
    biomes,
  };
}

export function formatStats(stats: WorldStats): string {
  const share = (count: number, pct: number) => `${count} (${pct.toFixed(1)}%)`;
  return [
    `Water tiles: ${share(stats.water, stats.waterPercent)}`,
    `Land tiles: ${share(stats.land, stats.landPercent)}`,
    `Mountain tiles: ${share(stats.mountain, stats.mountainPercent)}`,
  ].join(', ');
}
