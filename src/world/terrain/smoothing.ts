import type { TerrainField } from '../types/index.js';

/**
 * Pass 3: blend land cells toward the mean of their 3x3 neighborhood.
 * Neighborhoods are clamped to the grid, so edges average 6 cells and corners 4.
 * Water cells (at or below `waterLevel`) keep their elevation exactly.
 * Every lookup reads the input field; results go to a separate buffer.
 */
export function smoothElevation(field: TerrainField, waterLevel: number): TerrainField {
  const { width, height, elevation: source } = field;
  const elevation = new Array<number>(source.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = y * width + x;
      const own = source[idx];

      if (own <= waterLevel) {
        elevation[idx] = own;
        continue;
      }

      let total = 0;
      let count = 0;
      for (let ny = Math.max(0, y - 1); ny <= Math.min(height - 1, y + 1); ny++) {
        for (let nx = Math.max(0, x - 1); nx <= Math.min(width - 1, x + 1); nx++) {
          total += source[ny * width + nx];
          count++;
        }
      }

      elevation[idx] = (total / count) * 0.7 + own * 0.3;
    }
  }

  return { ...field, elevation };
}
