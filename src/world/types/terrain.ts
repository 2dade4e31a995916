/** Biome kinds, ordered by the elevation band they occupy */
export type BiomeKind =
  | 'deep_water'
  | 'shallow_water'
  | 'beach'
  | 'plains'
  | 'forest'
  | 'hills'
  | 'mountains'
  | 'snow_caps';

/** Red, green, blue, alpha; each 0-255 */
export type Rgba = [number, number, number, number];

export interface BiomeProperties {
  baseColor: Readonly<Rgba>;
  heightModifier: number;
  roughness: number;
  walkable: boolean;
}

/**
 * Per-cell terrain attributes while the world is being generated.
 * All arrays are flat, row-major, width * height long.
 */
export interface TerrainField {
  width: number;
  height: number;
  elevation: number[];
  moisture: number[];       // ~[0, 1]
  riverValue: number[];     // ~[0, 1]
}
