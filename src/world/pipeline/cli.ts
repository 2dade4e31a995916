#!/usr/bin/env node
import 'dotenv/config';
import { generateWorld } from './pipeline.js';
import { parseArgs } from './args.js';
import { renderPreview } from './preview.js';
import { summarizeWorld } from '../query/world-stats.js';

function main() {
  const config = parseArgs(process.argv);
  const startTime = Date.now();

  console.log('=== Terrain Generation ===');
  console.log(`Seed: ${config.seed}`);
  console.log(`Grid: ${config.width}x${config.height} tiles`);
  console.log(`Gradient: ${config.gradient}`);
  console.log();

  const grid = generateWorld(config.width, config.height, config.seed, {
    gradient: config.gradient,
  });

  const stats = summarizeWorld(grid);
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log();
  console.log('=== Generation Complete ===');
  console.log(`Total tiles: ${stats.total}`);
  for (const [biome, count] of Object.entries(stats.biomes)) {
    if (count > 0) console.log(`  ${biome}: ${count}`);
  }
  console.log(`Time: ${elapsed}s`);

  if (config.preview) {
    console.log();
    console.log(renderPreview(grid));
  }
}

try {
  main();
} catch (err) {
  console.error('Generation failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
