import type { BiomeKind, TileGrid } from '../types/index.js';

export const BIOME_GLYPHS: Record<BiomeKind, string> = {
  deep_water: '~',
  shallow_water: '-',
  beach: '.',
  plains: ',',
  forest: 'T',
  hills: 'n',
  mountains: 'M',
  snow_caps: '^',
};

/**
 * One glyph per biome, sampling every `step`th tile in both directions so the
 * map fits within `maxColumns`.
 */
export function renderPreview(grid: TileGrid, maxColumns = 64): string {
  const step = Math.max(1, Math.ceil(grid.width / maxColumns));
  const rows: string[] = [];

  for (let y = 0; y < grid.height; y += step) {
    let row = '';
    for (let x = 0; x < grid.width; x += step) {
      row += BIOME_GLYPHS[grid.tiles[y * grid.width + x].biome];
    }
    rows.push(row);
  }

  return rows.join('\n');
}
