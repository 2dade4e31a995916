import type { Tile, TileGrid } from '../types/index.js';

/** Elevation reported for positions off the map */
export const INITIAL_ELEVATION = 0;

export function tileAt(grid: TileGrid, x: number, y: number): Tile | undefined {
  if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
  if (x < 0 || x >= grid.width || y < 0 || y >= grid.height) return undefined;
  return grid.tiles[y * grid.width + x];
}

function tileUnder(grid: TileGrid, x: number, y: number): Tile | undefined {
  return tileAt(grid, Math.trunc(x), Math.trunc(y));
}

/**
 * Ground height under a fractional world position, as a physics step reads it.
 */
export function groundElevationAt(grid: TileGrid, x: number, y: number): number {
  return tileUnder(grid, x, y)?.elevation ?? INITIAL_ELEVATION;
}

export function isWalkableAt(grid: TileGrid, x: number, y: number): boolean {
  return tileUnder(grid, x, y)?.walkable ?? false;
}
