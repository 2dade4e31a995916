import type { GradientVariant } from '../noise/index.js';
import { WORLD_HEIGHT, WORLD_WIDTH } from '../terrain/index.js';

export interface CliOptions {
  seed: number;
  width: number;
  height: number;
  gradient: GradientVariant;
  preview: boolean;
}

const DEFAULT_SEED = 1;

function isGradientVariant(value: string): value is GradientVariant {
  return value === 'lattice8' || value === 'classic';
}

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new Error(`Invalid ${name}: "${raw}" is not an integer`);
  }
  return value;
}

function parseGradient(raw: string): GradientVariant {
  if (!isGradientVariant(raw)) {
    throw new Error(`Invalid gradient: "${raw}" (expected lattice8 or classic)`);
  }
  return raw;
}

/**
 * Read generation options. Environment variables (WORLD_SEED, WORLD_WIDTH,
 * WORLD_HEIGHT, WORLD_GRADIENT) set the defaults; flags override them.
 * Unknown flags are ignored.
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const args = argv.slice(2);
  let seed = env.WORLD_SEED ? parseInteger('seed', env.WORLD_SEED) : DEFAULT_SEED;
  let width = env.WORLD_WIDTH ? parseInteger('width', env.WORLD_WIDTH) : WORLD_WIDTH;
  let height = env.WORLD_HEIGHT ? parseInteger('height', env.WORLD_HEIGHT) : WORLD_HEIGHT;
  let gradient: GradientVariant = env.WORLD_GRADIENT ? parseGradient(env.WORLD_GRADIENT) : 'lattice8';
  let preview = true;

  const valueFor = (flag: string, i: number): string => {
    const value = args[i];
    if (value === undefined) throw new Error(`Missing value for ${flag}`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--seed':
        seed = parseInteger('seed', valueFor('--seed', ++i));
        break;
      case '--width':
        width = parseInteger('width', valueFor('--width', ++i));
        break;
      case '--height':
        height = parseInteger('height', valueFor('--height', ++i));
        break;
      case '--gradient':
        gradient = parseGradient(valueFor('--gradient', ++i));
        break;
      case '--no-preview':
        preview = false;
        break;
    }
  }

  return { seed, width, height, gradient, preview };
}
