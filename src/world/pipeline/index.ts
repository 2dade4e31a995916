export type { GenerateOptions } from './pipeline.js';
export { generateWorld } from './pipeline.js';
export type { Dimension } from './errors.js';
export { InvalidDimensionError, assertDimension } from './errors.js';
export type { CliOptions } from './args.js';
export { parseArgs } from './args.js';
export { BIOME_GLYPHS, renderPreview } from './preview.js';
