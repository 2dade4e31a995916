export { INITIAL_ELEVATION, groundElevationAt, isWalkableAt, tileAt } from './world-query.js';
export type { WorldStats } from './world-stats.js';
export { formatStats, summarizeWorld } from './world-stats.js';
