import { WORLD_HEIGHT, WORLD_WIDTH } from './terrain-config.js';

/**
 * Analytic height for points off the generated grid: a corner-to-corner slope,
 * a sine/cosine ripple and a cone at the map center. Does not read noise or tiles.
 */
export function terrainHeight(
  x: number,
  y: number,
  width: number = WORLD_WIDTH,
  height: number = WORLD_HEIGHT,
): number {
  const nx = x / width;
  const ny = y / height;

  let h = (nx + ny) * 50;
  h += 10 * Math.sin(nx * 10) * Math.cos(ny * 10);

  const distFromCenter = Math.sqrt((nx - 0.5) ** 2 + (ny - 0.5) ** 2);
  h += 40 * Math.max(0, 1 - distFromCenter * 4);

  return h;
}
