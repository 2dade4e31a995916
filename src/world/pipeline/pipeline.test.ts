import { describe, it, expect, vi } from 'vitest';
import { createNoiseContext, sampleLayer } from '../noise/index.js';
import {
  BIOME_PROPERTIES,
  blendElevation,
  carveWaterways,
  classifyBiome,
  defaultTerrainConfig,
  islandFactor,
  ridge,
  smoothElevation,
  synthesizeRawField,
} from '../terrain/index.js';
import type { TileGrid } from '../types/index.js';
import { InvalidDimensionError } from './errors.js';
import { generateWorld } from './pipeline.js';

const quiet = () => {};

function withoutColor(grid: TileGrid) {
  return grid.tiles.map(({ color, ...rest }) => rest);
}

describe('generateWorld', () => {
  it('covers every coordinate exactly once, in row-major order', () => {
    const width = 16;
    const height = 12;
    const grid = generateWorld(width, height, 7, { log: quiet });
    expect(grid.width).toBe(width);
    expect(grid.height).toBe(height);
    expect(grid.seed).toBe(7);
    expect(grid.tiles).toHaveLength(width * height);

    const seen = new Set<string>();
    grid.tiles.forEach((tile, i) => {
      expect(tile.x).toBe(i % width);
      expect(tile.y).toBe(Math.floor(i / width));
      seen.add(`${tile.x},${tile.y}`);
    });
    expect(seen.size).toBe(width * height);
  });

  it('is deterministic apart from color jitter', () => {
    const a = generateWorld(24, 24, 3, { log: quiet, random: () => 0 });
    const b = generateWorld(24, 24, 3, { log: quiet, random: () => 0.99 });
    expect(withoutColor(a)).toEqual(withoutColor(b));
  });

  it('gives different seeds different worlds', () => {
    const a = generateWorld(24, 24, 1, { log: quiet });
    const b = generateWorld(24, 24, 2, { log: quiet });
    const differences = a.tiles.filter((t, i) => t.elevation !== b.tiles[i].elevation);
    expect(differences.length).toBeGreaterThan(0);
  });

  it('runs the four passes in order', () => {
    const grid = generateWorld(20, 16, 5, { log: quiet });
    const raw = synthesizeRawField(20, 16, 5, defaultTerrainConfig, createNoiseContext());
    const smoothed = smoothElevation(carveWaterways(raw, defaultTerrainConfig), 20);
    expect(grid.tiles.map((t) => t.elevation)).toEqual(smoothed.elevation.map((e) => Math.trunc(e)));
  });

  it('colors tiles from the injected random source', () => {
    const grid = generateWorld(10, 10, 4, { log: quiet, random: () => 0.5 });
    for (const tile of grid.tiles) {
      expect(tile.color).toEqual(BIOME_PROPERTIES[tile.biome].baseColor);
      expect(tile.walkable).toBe(BIOME_PROPERTIES[tile.biome].walkable);
    }
  });

  it('returns a frozen grid', () => {
    const grid = generateWorld(4, 4, 1, { log: quiet });
    expect(Object.isFrozen(grid)).toBe(true);
    expect(Object.isFrozen(grid.tiles)).toBe(true);
    expect(Object.isFrozen(grid.tiles[0])).toBe(true);
  });

  it('keeps the origin corner flat and under deep water', () => {
    const grid = generateWorld(128, 128, 1, { log: quiet });
    expect(grid.tiles[0].elevation).toBe(0);
    expect(grid.tiles[0].biome).toBe('deep_water');
    expect(grid.tiles[0].walkable).toBe(false);
  });

  it('never emits a negative zero elevation', () => {
    const grid = generateWorld(128, 128, 1, { log: quiet });
    const negativeZeros = grid.tiles.filter((t) => Object.is(t.elevation, -0));
    expect(negativeZeros).toHaveLength(0);
    expect(grid.tiles[1].elevation).toEqual(0);
  });

  it('builds the center tile from the unattenuated blend', () => {
    const size = 128;
    const center = 64 * size + 64;
    const context = createNoiseContext();
    const { layers } = defaultTerrainConfig;

    const raw = synthesizeRawField(size, size, 1, defaultTerrainConfig, context);
    const blended = blendElevation(
      sampleLayer(layers.continent, 0.5, 0.5, 1, context),
      sampleLayer(layers.detail, 0.5, 0.5, 1, context),
      ridge(sampleLayer(layers.ridge, 0.5, 0.5, 1, context)),
    );
    expect(raw.elevation[center]).toBeCloseTo(blended * islandFactor(0.5, 0.5), 10);

    const smoothed = smoothElevation(carveWaterways(raw, defaultTerrainConfig), 20);
    const grid = generateWorld(size, size, 1, { log: quiet });
    const tile = grid.tiles[center];
    expect(tile.elevation).toBe(Math.trunc(smoothed.elevation[center]) || 0);
    expect(tile.biome).toBe(classifyBiome(smoothed.elevation[center], smoothed.moisture[center]));
    // Detail noise sits on a lattice point here, so seed 1 leaves the center under water
    expect(tile.elevation).toBe(-1);
    expect(tile.biome).toBe('deep_water');
  });

  it('attenuates the corner and keeps the center at full strength', () => {
    expect(islandFactor(64 / 128, 64 / 128)).toBe(1);
    expect(islandFactor(0, 0)).toBe(0);
  });

  it('applies terrain overrides', () => {
    const flooded = generateWorld(16, 16, 2, {
      log: quiet,
      terrain: { levels: { water: 1000, beach: 1001, plains: 1002, hills: 1003, mountain: 1004 } },
    });
    expect(flooded.tiles.every((t) => t.biome === 'deep_water')).toBe(true);
  });

  it('switches the gradient variant', () => {
    const lattice = generateWorld(16, 16, 2, { log: quiet });
    const classic = generateWorld(16, 16, 2, { log: quiet, gradient: 'classic' });
    expect(withoutColor(lattice)).not.toEqual(withoutColor(classic));
  });

  it('logs each pass and a summary', () => {
    const log = vi.fn();
    generateWorld(4, 4, 1, { log });
    expect(log).toHaveBeenCalledTimes(6);
    expect(log.mock.calls[0][0]).toBe('[Pass 1] Sampling noise layers (4x4, seed: 1, gradient: lattice8)...');
    expect(log.mock.calls[1][0]).toBe('[Pass 2] Carving rivers and lakes...');
    expect(log.mock.calls[3][0]).toBe('[Pass 3] Smoothing land elevation...');
    expect(log.mock.calls[4][0]).toBe('[Pass 4] Classifying biomes...');
    expect(log.mock.calls[5][0]).toMatch(/^\[Pass 4\] Water tiles: \d+ \(/);
  });

  it('rejects non-positive or fractional dimensions before doing any work', () => {
    const log = vi.fn();
    expect(() => generateWorld(0, 10, 1, { log })).toThrow(InvalidDimensionError);
    expect(() => generateWorld(10, -3, 1, { log })).toThrow('World height must be a positive integer (got -3)');
    expect(() => generateWorld(2.5, 10, 1, { log })).toThrow('World width must be a positive integer (got 2.5)');
    expect(() => generateWorld(Number.NaN, 10, 1, { log })).toThrow(InvalidDimensionError);
    expect(log).not.toHaveBeenCalled();
  });

  it('reports which dimension was rejected', () => {
    try {
      generateWorld(8, 0, 1, { log: quiet });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidDimensionError);
      if (err instanceof InvalidDimensionError) {
        expect(err.dimension).toBe('height');
        expect(err.value).toBe(0);
        expect(err.name).toBe('InvalidDimensionError');
      }
    }
  });
});
