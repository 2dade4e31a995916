import type { BiomeKind, Rgba } from './terrain.js';

export interface Tile {
  readonly x: number;
  readonly y: number;
  readonly elevation: number;   // integer, truncated toward zero
  readonly color: Readonly<Rgba>;
  readonly walkable: boolean;
  readonly biome: BiomeKind;
}

/** A finished world. Frozen once returned; consumers only read it. */
export interface TileGrid {
  readonly width: number;            // tiles horizontally
  readonly height: number;           // tiles vertically
  readonly seed: number;
  readonly tiles: readonly Tile[];   // flat 2D array, row-major
}
