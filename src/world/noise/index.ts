export type { GradientVariant, NoiseContext, NoiseContextOptions } from './noise-context.js';
export { buildPermutation, createNoiseContext, loadGradientTable } from './noise-context.js';
export { fade, gradient, lerp, perlin } from './perlin.js';
export type { NoiseLayerConfig } from './layered-noise.js';
export { layeredNoise, sampleLayer } from './layered-noise.js';
