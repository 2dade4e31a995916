import type { GradientVariant, NoiseContext } from './noise-context.js';

// lattice8 directions indexed by hash & 7
const GRADIENTS_X = [1, -1, 1, -1, 1, -1, 0, 0];
const GRADIENTS_Y = [1, 1, -1, -1, 0, 0, 1, -1];

/**
 * Dot product of the gradient selected by `hash` with the corner offset (dx, dy).
 */
export function gradient(
  hash: number,
  dx: number,
  dy: number,
  variant: GradientVariant = 'lattice8',
): number {
  const h = hash & 15;

  if (variant === 'classic') {
    const u = h < 8 ? dx : dy;
    const v = h < 4 ? dy : (h === 12 || h === 14 ? dx : 0);
    return ((h & 1) === 0 ? u : -u) + ((h & 2) === 0 ? v : -v);
  }

  const d = h & 7;
  return GRADIENTS_X[d] * dx + GRADIENTS_Y[d] * dy;
}

/** Quintic smoothstep 6t^5 - 15t^4 + 10t^3 */
export function fade(t: number): number {
  return t * t * t * (t * (t * 6 - 15) + 10);
}

export function lerp(a: number, b: number, t: number): number {
  return a + t * (b - a);
}

/**
 * Single-octave 2D gradient noise, roughly in [-1, 1]. Zero on every lattice point.
 */
export function perlin(x: number, y: number, seed: number, context: NoiseContext): number {
  const p = context.permutation(seed);
  const variant = context.gradient;

  const floorX = Math.floor(x);
  const floorY = Math.floor(y);

  // True modulo: negative coordinates must land in 0..255 too
  const X = ((floorX % 256) + 256) % 256;
  const Y = ((floorY % 256) + 256) % 256;

  const fx = x - floorX;
  const fy = y - floorY;

  const u = fade(fx);
  const v = fade(fy);

  const A = p[X] + Y;
  const B = p[X + 1] + Y;

  return lerp(
    lerp(gradient(p[A], fx, fy, variant), gradient(p[B], fx - 1, fy, variant), u),
    lerp(gradient(p[A + 1], fx, fy - 1, variant), gradient(p[B + 1], fx - 1, fy - 1, variant), u),
    v,
  );
}
