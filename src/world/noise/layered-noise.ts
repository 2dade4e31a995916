import type { NoiseContext } from './noise-context.js';
import { perlin } from './perlin.js';

/**
 * Fractal sum of `octaves` perlin samples, normalized by the summed amplitude.
 * Octave i samples seed + i so each octave reads a different gradient field.
 * Returns exactly 0 when no octave contributes.
 */
export function layeredNoise(
  x: number,
  y: number,
  octaves: number,
  persistence: number,
  scale: number,
  seed: number,
  context: NoiseContext,
): number {
  let total = 0;
  let maxValue = 0;
  let amplitude = 1;
  let frequency = scale;

  for (let i = 0; i < octaves; i++) {
    total += perlin(x * frequency, y * frequency, seed + i, context) * amplitude;
    maxValue += amplitude;
    amplitude *= persistence;
    frequency *= 2;
  }

  return maxValue > 0 ? total / maxValue : 0;
}

/**
 * One named noise field of the terrain: where it samples and how it layers.
 */
export interface NoiseLayerConfig {
  /** Multiplier applied to the normalized cell coordinate before sampling */
  coordScale: number;
  octaves: number;
  persistence: number;
  /** Base frequency of the first octave */
  frequency: number;
  /** Added to the world seed to give this layer its own gradient field */
  seedOffset: number;
}

export function sampleLayer(
  layer: NoiseLayerConfig,
  nx: number,
  ny: number,
  worldSeed: number,
  context: NoiseContext,
): number {
  return layeredNoise(
    nx * layer.coordScale,
    ny * layer.coordScale,
    layer.octaves,
    layer.persistence,
    layer.frequency,
    worldSeed + layer.seedOffset,
    context,
  );
}
