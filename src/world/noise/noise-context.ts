import Alea from 'alea';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * How a corner hash is turned into a gradient vector.
 *
 * - `lattice8`: the low three bits pick one of the eight directions
 *   (±1,±1), (±1,0), (0,±1). Every residue contributes both axes it names.
 * - `classic`: the legacy bit-test rule, where residues 13 and 15
 *   drop their second term. Kept for output parity with old worlds.
 */
export type GradientVariant = 'lattice8' | 'classic';

export interface NoiseContext {
  readonly gradient: GradientVariant;
  /** Base permutation of 0..255 that every seeded table is shuffled from */
  readonly table: readonly number[];
  /** Seeded permutation, 512 entries long (the 256-entry shuffle repeated twice) */
  permutation(seed: number): Uint8Array;
}

export interface NoiseContextOptions {
  gradient?: GradientVariant;
  table?: readonly number[];
}

let defaultTable: readonly number[] | undefined;

/**
 * The classic Perlin reference permutation, loaded once from data/.
 */
export function loadGradientTable(): readonly number[] {
  if (!defaultTable) {
    const tablePath = resolve(__dirname, '../../../data/gradient-table.json');
    const parsed: unknown = JSON.parse(readFileSync(tablePath, 'utf-8'));
    defaultTable = Object.freeze(assertPermutation(parsed));
  }
  return defaultTable;
}

function assertPermutation(value: unknown): number[] {
  if (!Array.isArray(value) || value.length !== 256) {
    throw new Error('Gradient table must be an array of 256 entries');
  }
  const seen = new Set<number>();
  const table: number[] = [];
  for (const entry of value) {
    if (typeof entry !== 'number' || !Number.isInteger(entry) || entry < 0 || entry > 255 || seen.has(entry)) {
      throw new Error(`Gradient table is not a permutation of 0..255 (bad entry: ${String(entry)})`);
    }
    seen.add(entry);
    table.push(entry);
  }
  return table;
}

/**
 * Shuffle a copy of the table with an alea PRNG seeded by `seed` and repeat it
 * to 512 entries so corner lookups like p[X + 1] + Y never wrap.
 */
export function buildPermutation(table: readonly number[], seed: number): Uint8Array {
  const shuffled = [...table];
  const prng = Alea(seed);
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(prng() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  const p = new Uint8Array(512);
  for (let i = 0; i < 256; i++) {
    p[i] = shuffled[i];
    p[256 + i] = shuffled[i];
  }
  return p;
}

/**
 * Create a noise context. Seeded permutations are built lazily and cached per
 * seed, so one context can serve every octave of every layer.
 */
export function createNoiseContext(options: NoiseContextOptions = {}): NoiseContext {
  const gradient = options.gradient ?? 'lattice8';
  const table = options.table ? Object.freeze(assertPermutation([...options.table])) : loadGradientTable();
  const cache = new Map<number, Uint8Array>();

  return {
    gradient,
    table,
    permutation(seed: number): Uint8Array {
      let p = cache.get(seed);
      if (!p) {
        p = buildPermutation(table, seed);
        cache.set(seed, p);
      }
      return p;
    },
  };
}
