import { describe, it, expect } from 'vitest';
import { parseArgs } from './args.js';

const argv = (...flags: string[]) => ['node', 'cli.js', ...flags];

describe('parseArgs', () => {
  it('falls back to the built-in defaults', () => {
    expect(parseArgs(argv(), {})).toEqual({
      seed: 1,
      width: 128,
      height: 128,
      gradient: 'lattice8',
      preview: true,
    });
  });

  it('reads defaults from the environment', () => {
    const env = { WORLD_SEED: '9', WORLD_WIDTH: '64', WORLD_HEIGHT: '32', WORLD_GRADIENT: 'classic' };
    expect(parseArgs(argv(), env)).toEqual({
      seed: 9,
      width: 64,
      height: 32,
      gradient: 'classic',
      preview: true,
    });
  });

  it('lets flags override the environment', () => {
    const options = parseArgs(
      argv('--seed', '42', '--width', '16', '--height', '8', '--gradient', 'lattice8', '--no-preview'),
      { WORLD_SEED: '9', WORLD_GRADIENT: 'classic' },
    );
    expect(options).toEqual({ seed: 42, width: 16, height: 8, gradient: 'lattice8', preview: false });
  });

  it('ignores unknown flags', () => {
    expect(parseArgs(argv('--verbose', '--seed', '3'), {}).seed).toBe(3);
  });

  it('rejects malformed values', () => {
    expect(() => parseArgs(argv('--width', 'abc'), {})).toThrow('Invalid width: "abc" is not an integer');
    expect(() => parseArgs(argv('--seed', '1.5'), {})).toThrow('Invalid seed: "1.5" is not an integer');
    expect(() => parseArgs(argv('--seed'), {})).toThrow('Missing value for --seed');
    expect(() => parseArgs(argv('--gradient', 'simplex'), {})).toThrow(
      'Invalid gradient: "simplex" (expected lattice8 or classic)',
    );
    expect(() => parseArgs(argv(), { WORLD_HEIGHT: ' ' })).toThrow('Invalid height: " " is not an integer');
  });
});
