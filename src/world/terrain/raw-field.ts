import { sampleLayer, type NoiseContext } from '../noise/index.js';
import type { TerrainField } from '../types/index.js';
import type { TerrainConfig } from './terrain-config.js';

/**
 * Radial falloff from the map center: 1 at the center, 0 at distance 0.5
 * (normalized) and beyond. Square-rooted to soften the coastline.
 */
export function islandFactor(nx: number, ny: number): number {
  const dx = nx - 0.5;
  const dy = ny - 0.5;
  const distanceFromCenter = Math.sqrt(dx * dx + dy * dy) * 2;
  return Math.pow(1 - Math.min(1, distanceFromCenter), 0.5);
}

/** Fold noise around its midpoint and cube it so ridges come out sharp */
export function ridge(value: number): number {
  return Math.pow(1 - Math.abs(value * 2 - 1), 3);
}

/** Weighted blend of the three shape layers, before island attenuation */
export function blendElevation(continent: number, detail: number, mountain: number): number {
  return (continent * 0.5 + detail * 0.2 + mountain * 0.3) * 100;
}

/** Edges keep 30% of their blended elevation; the center keeps all of it */
export function attenuate(elevation: number, island: number): number {
  return elevation * (island * 0.7 + 0.3);
}

/**
 * Pass 1: sample every noise layer for every cell.
 */
export function synthesizeRawField(
  width: number,
  height: number,
  seed: number,
  config: TerrainConfig,
  context: NoiseContext,
): TerrainField {
  const size = width * height;
  const elevation = new Array<number>(size);
  const moisture = new Array<number>(size);
  const riverValue = new Array<number>(size);
  const { layers } = config;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const nx = x / width;
      const ny = y / height;
      const idx = y * width + x;

      const continentShape = sampleLayer(layers.continent, nx, ny, seed, context);
      const terrainDetail = sampleLayer(layers.detail, nx, ny, seed, context);
      const mountainRidge = ridge(sampleLayer(layers.ridge, nx, ny, seed, context));

      elevation[idx] = attenuate(
        blendElevation(continentShape, terrainDetail, mountainRidge),
        islandFactor(nx, ny),
      );
      moisture[idx] = sampleLayer(layers.moisture, nx, ny, seed, context);
      riverValue[idx] = sampleLayer(layers.river, nx, ny, seed, context);
    }
  }

  return { width, height, elevation, moisture, riverValue };
}
